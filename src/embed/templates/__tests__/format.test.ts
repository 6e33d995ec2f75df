import { describe, it, expect } from 'vitest';
import { fmtBytes, fmtCount, fmtDate, fmtPercent, fmtShortDate, fmtUptime } from '../format';
import { escapeHtml, jsonEmbed } from '../layout';

describe('formatting', () => {
  it('formats counts with separators', () => {
    expect(fmtCount(48877)).toBe('48,877');
    expect(fmtCount(0)).toBe('0');
  });

  it('formats byte sizes', () => {
    expect(fmtBytes(0)).toBe('0 B');
    expect(fmtBytes(1023)).toBe('1023 B');
    expect(fmtBytes(1536)).toBe('1.5 KB');
    expect(fmtBytes(52428800)).toBe('50 MB');
  });

  it('formats ratios as percentages', () => {
    expect(fmtPercent(0.5)).toBe('50.0%');
    expect(fmtPercent(0.9567)).toBe('95.7%');
  });

  it('formats uptime in its largest unit', () => {
    expect(fmtUptime(59)).toBe('0 minutes');
    expect(fmtUptime(60)).toBe('1 minute');
    expect(fmtUptime(7200)).toBe('2 hours');
    expect(fmtUptime(86400)).toBe('1 day');
  });

  it('formats ISO dates and passes anything else through', () => {
    expect(fmtDate('2026-09-28')).toBe('Sep 28, 2026');
    expect(fmtShortDate('2026-09-28')).toBe('Sep 28');
    expect(fmtDate('2026-13-01')).toBe('2026-13-01');
    expect(fmtDate('soon')).toBe('soon');
    expect(fmtShortDate('soon')).toBe('soon');
  });
});

describe('escaping', () => {
  it('escapes markup characters', () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;');
    expect(escapeHtml(null)).toBe('');
    expect(escapeHtml(0)).toBe('0');
  });

  it('keeps embedded JSON from closing the script tag', () => {
    expect(jsonEmbed({ t: '</script>' })).toBe('{"t":"\\u003c/script\\u003e"}');
  });
});
