import { z } from 'zod';
import { SUPPORT_STATES } from '../embed/styles/widgets/supportBanner';

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected a YYYY-MM-DD date');
const count = z.number().int().nonnegative();

// rendered into href attributes
const httpUrl = z
  .string()
  .url()
  .refine((v) => /^https?:\/\//i.test(v), 'expected an http(s) URL');
const linkHref = z
  .string()
  .refine(
    (v) => /^https?:\/\//i.test(v) || (v.startsWith('/') && !v.startsWith('//')),
    'expected an http(s) URL or a path on this site',
  );

export const newsItemSchema = z.object({
  date: isoDate,
  title: z.string().min(1),
  url: httpUrl,
  isNew: z.boolean().optional().default(false),
});

export const cacheStatsSchema = z.object({
  memoryUsed: count,
  memoryLimit: count,
  hits: count,
  misses: count,
  items: count,
  connections: count,
  uptimeSeconds: count,
});

export const cacheServerSchema = z.object({
  hostname: z.string().min(1),
  // null when the server did not answer
  stats: cacheStatsSchema.nullable(),
});

export const activityPointSchema = z.object({
  date: isoDate,
  reviewRequests: count,
  reviews: count,
  changeDescriptions: count,
  comments: count,
});

export const repositorySchema = z.object({
  name: z.string().min(1),
  tool: z.string().min(1),
  url: linkHref.optional(),
  visible: z.boolean().optional().default(true),
});

export const userActivitySchema = z
  .object({
    now: count,
    sevenDays: count,
    thirtyDays: count,
    sixtyDays: count,
    ninetyDays: count,
    total: count,
  })
  .refine((u) => u.now + u.sevenDays + u.thirtyDays + u.sixtyDays + u.ninetyDays <= u.total, {
    message: 'activity buckets add up to more than the total user count',
  });

export const serverActivitySchema = z.object({
  reviewRequests: count,
  reviews: count,
  diffs: count,
  comments: count,
  users: count,
  groups: count,
});

export const supportStatusSchema = z.object({
  state: z.enum(SUPPORT_STATES).catch('unknown'),
  message: z.string().optional().default(''),
  expiresAt: isoDate.optional(),
  url: httpUrl.optional(),
});

export const dashboardDataSchema = z.object({
  siteName: z.string().optional().default('Review server'),
  generatedAt: z.string().optional(),
  news: z.array(newsItemSchema).default([]),
  cacheServers: z.array(cacheServerSchema).default([]),
  activity: z.array(activityPointSchema).default([]),
  repositories: z.array(repositorySchema).default([]),
  userActivity: userActivitySchema,
  serverActivity: serverActivitySchema,
  support: supportStatusSchema.optional().default({ state: 'unknown', message: '' }),
});

export type NewsItem = z.infer<typeof newsItemSchema>;
export type CacheStats = z.infer<typeof cacheStatsSchema>;
export type CacheServer = z.infer<typeof cacheServerSchema>;
export type ActivityPoint = z.infer<typeof activityPointSchema>;
export type RepositoryEntry = z.infer<typeof repositorySchema>;
export type UserActivity = z.infer<typeof userActivitySchema>;
export type ServerActivity = z.infer<typeof serverActivitySchema>;
export type SupportStatus = z.infer<typeof supportStatusSchema>;
export type DashboardData = z.infer<typeof dashboardDataSchema>;

/** Raw shape accepted by `dashboardDataSchema`, before defaults apply. */
export type DashboardDataInput = z.input<typeof dashboardDataSchema>;

export function parseDashboardData(raw: unknown): DashboardData {
  return dashboardDataSchema.parse(raw);
}
