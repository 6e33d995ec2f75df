import { parseDashboardData, type DashboardData, type DashboardDataInput } from '../schema';

export const dashboardInput: DashboardDataInput = {
  siteName: 'Test server',
  generatedAt: '2026-10-01T08:00:00Z',
  news: [
    { date: '2026-09-10', title: 'Older post', url: 'https://news.example.com/older' },
    { date: '2026-09-28', title: 'Newest post', url: 'https://news.example.com/newest', isNew: true },
  ],
  cacheServers: [
    {
      hostname: 'cache-1:11211',
      stats: {
        memoryUsed: 52428800,
        memoryLimit: 67108864,
        hits: 9500,
        misses: 500,
        items: 1280,
        connections: 14,
        uptimeSeconds: 259200,
      },
    },
    { hostname: 'cache-2:11211', stats: null },
  ],
  activity: [
    { date: '2026-09-29', reviewRequests: 2, reviews: 3, changeDescriptions: 1, comments: 10 },
    { date: '2026-09-30', reviewRequests: 5, reviews: 4, changeDescriptions: 2, comments: 7 },
  ],
  repositories: [
    { name: 'web-frontend', tool: 'Git', url: '/admin/repos/1/' },
    { name: 'legacy', tool: 'Subversion', visible: false },
  ],
  userActivity: { now: 12, sevenDays: 30, thirtyDays: 18, sixtyDays: 6, ninetyDays: 4, total: 85 },
  serverActivity: { reviewRequests: 4210, reviews: 10233, diffs: 6120, comments: 48877, users: 85, groups: 9 },
  support: { state: 'expiring', message: 'Renew soon.', expiresAt: '2026-11-15', url: 'https://support.example.com/renew' },
};

export function fullData(): DashboardData {
  return parseDashboardData(dashboardInput);
}

export function emptyData(): DashboardData {
  return parseDashboardData({
    userActivity: { now: 0, sevenDays: 0, thirtyDays: 0, sixtyDays: 0, ninetyDays: 0, total: 0 },
    serverActivity: { reviewRequests: 0, reviews: 0, diffs: 0, comments: 0, users: 0, groups: 0 },
  });
}
