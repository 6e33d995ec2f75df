import { Router, Request, Response } from 'express';
import { WIDGETS } from '../../embed/templates/widgetRenderer';
import { WIDGET_STYLES } from '../../embed/styles/widgets';
import { documentedClasses, documentedElements, documentedModifiers } from '../../embed/styles/contract';
import type { WidgetStyle } from '../../embed/styles/types';

function describeStyle(style: WidgetStyle) {
  return {
    id: style.id,
    block: style.block,
    description: style.description,
    elements: documentedElements(style),
    modifiers: documentedModifiers(style),
    classes: documentedClasses(style),
  };
}

const router = Router();

/**
 * GET /api/v1/widgets
 * Dashboard widgets with the class contract their markup follows.
 */
router.get('/', (_req: Request, res: Response) => {
  res.json({
    widgets: WIDGETS.map((w) => ({
      ...describeStyle(w.style),
      title: w.title,
      size: w.size,
      embedPath: `/embed/widget/${w.id}`,
    })),
  });
});

/**
 * GET /api/v1/widgets/styles
 * Every styled surface, including page chrome that is not a widget.
 */
router.get('/styles', (_req: Request, res: Response) => {
  res.json({ styles: WIDGET_STYLES.map(describeStyle) });
});

export default router;
