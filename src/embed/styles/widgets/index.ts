import type { WidgetStyle } from '../types';
import { adminPageStyle } from './adminPage';
import { adminWidgetStyle, adminWidgetsStyle } from './adminWidget';
import { sidebarStyle } from './sidebar';
import { supportBannerStyle } from './supportBanner';
import { newsWidgetStyle } from './newsWidget';
import { serverCacheWidgetStyle } from './serverCacheWidget';
import { activityGraphWidgetStyle } from './activityGraphWidget';
import { repositoriesWidgetStyle } from './repositoriesWidget';
import { userActivityWidgetStyle } from './userActivityWidget';
import { serverActivityWidgetStyle } from './serverActivityWidget';

/** In stylesheet order: later entries win ties in specificity. */
export const WIDGET_STYLES: readonly WidgetStyle[] = [
  adminPageStyle,
  sidebarStyle,
  supportBannerStyle,
  adminWidgetStyle,
  adminWidgetsStyle,
  newsWidgetStyle,
  serverCacheWidgetStyle,
  activityGraphWidgetStyle,
  repositoriesWidgetStyle,
  userActivityWidgetStyle,
  serverActivityWidgetStyle,
];

export function getWidgetStyle(id: string): WidgetStyle | undefined {
  return WIDGET_STYLES.find((s) => s.id === id);
}
