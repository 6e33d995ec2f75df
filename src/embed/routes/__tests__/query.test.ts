import { describe, it, expect } from 'vitest';
import { embedQuerySchema, renderContextFor } from '../query';

describe('embed query', () => {
  it('defaults the theme and range', () => {
    expect(embedQuerySchema.parse({})).toEqual({ theme: 'light', range: 30 });
  });

  it('turns the range into days', () => {
    expect(embedQuerySchema.parse({ range: '90', theme: 'dark' }).range).toBe(90);
  });

  it('rejects ranges outside the choices', () => {
    expect(embedQuerySchema.safeParse({ range: '14' }).success).toBe(false);
  });

  it('builds range links that keep the token and theme', () => {
    const ctx = renderContextFor({ token: 'abc.def', theme: 'dark', range: 30 }, '/embed/widget/news', {
      newsUrl: 'https://news.example.com/',
    });
    expect(ctx.rangeHref(7)).toBe('/embed/widget/news?token=abc.def&theme=dark&range=7');
    expect(ctx.selfHref()).toBe('/embed/widget/news?token=abc.def&theme=dark&range=30');
    expect(ctx.newsUrl).toBe('https://news.example.com/');
    expect(ctx.stylesheetHref).toBeUndefined();
  });

  it('leaves the token out when there is none', () => {
    const ctx = renderContextFor({ theme: 'light', range: 7 }, '/embed/dashboard');
    expect(ctx.rangeHref(90)).toBe('/embed/dashboard?theme=light&range=90');
  });
});
