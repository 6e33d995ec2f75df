import { z } from 'zod';
import type { ActivityRange } from '../templates/activityGraphWidget';
import type { RenderContext } from '../templates/widgetRenderer';

const RANGE_BY_PARAM: Record<'7' | '30' | '90', ActivityRange> = { '7': 7, '30': 30, '90': 90 };

export const embedQuerySchema = z.object({
  token: z.string().optional(),
  theme: z.enum(['light', 'dark']).catch('light'),
  range: z
    .enum(['7', '30', '90'])
    .default('30')
    .transform((v) => RANGE_BY_PARAM[v]),
});

export type EmbedQuery = z.infer<typeof embedQuerySchema>;

function pageHref(basePath: string, query: EmbedQuery, range: ActivityRange): string {
  const params = new URLSearchParams();
  if (query.token) params.set('token', query.token);
  params.set('theme', query.theme);
  params.set('range', String(range));
  return `${basePath}?${params.toString()}`;
}

/** Render context for a page at `basePath`, keeping the token and theme in range links. */
export function renderContextFor(
  query: EmbedQuery,
  basePath: string,
  links: Pick<RenderContext, 'newsUrl' | 'stylesheetHref'> = {},
): RenderContext {
  return {
    ...links,
    theme: query.theme,
    range: query.range,
    rangeHref: (days) => pageHref(basePath, query, days),
    selfHref: () => pageHref(basePath, query, query.range),
  };
}

export function describeQueryError(err: z.ZodError): string {
  return err.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
}
