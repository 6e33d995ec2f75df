import { describe, it, expect } from 'vitest';
import * as cheerio from 'cheerio';
import { renderNewsWidget } from '../newsWidget';
import { cacheStatRows, renderServerCacheWidget } from '../serverCacheWidget';
import { pointsInRange, renderActivityGraphWidget } from '../activityGraphWidget';
import { renderRepositoriesWidget, repositorySummary } from '../repositoriesWidget';
import { activityBuckets, renderUserActivityWidget } from '../userActivityWidget';
import { renderSupportBanner } from '../supportBanner';
import { fullData } from '../../../data/__tests__/fixtures';

describe('news widget', () => {
  it('lists the newest items first', () => {
    const $ = cheerio.load(renderNewsWidget(fullData().news));
    const first = $('.rb-c-admin-news-widget__item').first();
    expect(first.hasClass('-is-new')).toBe(true);
    expect(first.find('.rb-c-admin-news-widget__item-title').text()).toBe('Newest post');
    expect(first.find('.rb-c-admin-news-widget__item-date').text()).toBe('Sep 28, 2026');
  });

  it('caps the list', () => {
    const $ = cheerio.load(renderNewsWidget(fullData().news, { maxItems: 1 }));
    expect($('.rb-c-admin-news-widget__item')).toHaveLength(1);
  });

  it('escapes titles and links', () => {
    const html = renderNewsWidget([
      { date: '2026-09-28', title: '<script>x</script>', url: 'https://news.example.com/?a=1&b=2', isNew: false },
    ]);
    expect(html).toContain('&lt;script&gt;x&lt;/script&gt;');
    expect(html).toContain('href="https://news.example.com/?a=1&amp;b=2"');
  });

  it('shows the empty state without a more link', () => {
    const $ = cheerio.load(renderNewsWidget([], { moreUrl: 'https://news.example.com/' }));
    expect($('.rb-c-admin-news-widget__empty').text()).toBe('There is no news right now.');
    expect($('.rb-c-admin-news-widget__more')).toHaveLength(0);
  });
});

describe('server cache widget', () => {
  it('formats cache statistics', () => {
    const server = fullData().cacheServers[0];
    if (!server.stats) throw new Error('fixture server has no stats');
    expect(cacheStatRows(server.stats)).toEqual([
      { label: 'Memory', value: '50 MB / 64 MB', warning: false },
      { label: 'Hit rate', value: '95.0%', warning: false },
      { label: 'Items', value: '1,280', warning: false },
      { label: 'Connections', value: '14', warning: false },
      { label: 'Uptime', value: '3 days', warning: false },
    ]);
  });

  it('flags high memory use and low hit rates', () => {
    const rows = cacheStatRows({
      memoryUsed: 62914560,
      memoryLimit: 67108864,
      hits: 1,
      misses: 3,
      items: 0,
      connections: 1,
      uptimeSeconds: 7200,
    });
    expect(rows[0]).toEqual({ label: 'Memory', value: '60 MB / 64 MB', warning: true });
    expect(rows[1]).toEqual({ label: 'Hit rate', value: '25.0%', warning: true });
    expect(rows[4].value).toBe('2 hours');
  });

  it('reports n/a before any lookups', () => {
    const rows = cacheStatRows({
      memoryUsed: 0,
      memoryLimit: 0,
      hits: 0,
      misses: 0,
      items: 0,
      connections: 0,
      uptimeSeconds: 30,
    });
    expect(rows[1]).toEqual({ label: 'Hit rate', value: 'n/a', warning: false });
  });

  it('marks servers that did not answer', () => {
    const $ = cheerio.load(renderServerCacheWidget(fullData().cacheServers));
    const down = $('.rb-c-admin-server-cache-widget__server.-is-unavailable');
    expect(down).toHaveLength(1);
    expect(down.find('.rb-c-admin-server-cache-widget__server-name').text()).toBe('cache-2:11211');
    expect(down.find('.rb-c-admin-server-cache-widget__unavailable').text()).toBe('This cache server is not responding.');
  });
});

describe('activity graph widget', () => {
  const point = (date: string) => ({ date, reviewRequests: 1, reviews: 1, changeDescriptions: 1, comments: 1 });

  it('keeps points within the range of the latest one, oldest first', () => {
    const points = [point('2026-09-30'), point('2026-09-01'), point('2026-09-24')];
    expect(pointsInRange(points, 7).map((p) => p.date)).toEqual(['2026-09-24', '2026-09-30']);
    expect(pointsInRange(points, 30).map((p) => p.date)).toEqual(['2026-09-01', '2026-09-24', '2026-09-30']);
    expect(pointsInRange([], 7)).toEqual([]);
  });

  it('highlights the selected range and totals each series', () => {
    const html = renderActivityGraphWidget(fullData().activity, {
      widgetId: 'w-activity-graph',
      range: 7,
      theme: 'light',
      rangeHref: (days) => `?range=${days}`,
    });
    const $ = cheerio.load(html);
    const active = $('.rb-c-admin-activity-graph-widget__range.-is-active');
    expect(active.text()).toBe('7 days');
    expect(active.attr('href')).toBe('?range=7');
    const totals = $('.rb-c-admin-activity-graph-widget__legend-total').map((_i, el) => $(el).text()).get();
    expect(totals).toEqual(['7', '7', '3', '17']);
    expect($('canvas').attr('id')).toBe('w-activity-graph-canvas');
    expect(html).toContain('"labels":["Sep 29","Sep 30"]');
  });
});

describe('repositories widget', () => {
  it('summarises the list', () => {
    expect(repositorySummary(0, 0)).toBe('No repositories are configured.');
    expect(repositorySummary(12, 10)).toBe('Showing 10 of 12 repositories.');
    expect(repositorySummary(1, 1)).toBe('1 repository configured.');
    expect(repositorySummary(2, 2)).toBe('2 repositories configured.');
  });

  it('dims hidden repositories and links named ones', () => {
    const $ = cheerio.load(renderRepositoriesWidget(fullData().repositories));
    expect($('.rb-c-admin-repositories-widget__repo.-is-hidden').text()).toContain('legacy');
    expect($('a.rb-c-admin-repositories-widget__repo-name').attr('href')).toBe('/admin/repos/1/');
    expect($('span.rb-c-admin-repositories-widget__repo-name').text()).toBe('legacy');
  });
});

describe('user activity widget', () => {
  it('counts users outside every bucket as inactive', () => {
    const buckets = activityBuckets(fullData().userActivity, 'light');
    expect(buckets.map((b) => b.count)).toEqual([12, 30, 18, 6, 4, 15]);
    expect(buckets[5].label).toBe('Inactive');
  });

  it('shows the total', () => {
    const $ = cheerio.load(renderUserActivityWidget(fullData().userActivity, { widgetId: 'u', theme: 'dark' }));
    expect($('.rb-c-admin-user-activity-widget__total').text()).toBe('85 users in total');
  });
});

describe('support banner', () => {
  it('renders the expired state', () => {
    const $ = cheerio.load(renderSupportBanner({ state: 'expired', message: 'Contact us.', expiresAt: '2026-01-05' }));
    const banner = $('[role="status"]');
    expect(banner.attr('class')).toBe('rb-c-admin-support-banner -is-expired');
    expect($('.rb-c-admin-support-banner__title').text()).toBe('Support has expired');
    expect($('.rb-c-admin-support-banner__expires').text()).toBe('Expired Jan 5, 2026');
    expect($('.rb-c-admin-support-banner__action')).toHaveLength(0);
  });

  it('links the renewal page when one is given', () => {
    const $ = cheerio.load(renderSupportBanner(fullData().support));
    const action = $('.rb-c-admin-support-banner__action');
    expect(action.text()).toBe('Renew support');
    expect(action.attr('href')).toBe('https://support.example.com/renew');
    expect($('.rb-c-admin-support-banner__expires').text()).toBe('Expires Nov 15, 2026');
  });
});
