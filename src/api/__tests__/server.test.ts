import { describe, it, expect } from 'vitest';
import request from 'supertest';
import * as cheerio from 'cheerio';
import jwt from 'jsonwebtoken';
import { boundPort, createServer, startServer } from '../server';
import { StaticDataSource, type DashboardDataSource } from '../../data/dashboardSource';
import { generateEmbedToken, verifyEmbedToken } from '../../embed/auth/embedToken';
import { verifyMarkup } from '../../embed/styles/contract';
import { newsWidgetStyle } from '../../embed/styles/widgets/newsWidget';
import { getThemeStylesheet } from '../../embed/styles/theme';
import { dashboardInput } from '../../data/__tests__/fixtures';

const API_KEY = 'test-api-key';

const failingSource: DashboardDataSource = {
  load: () => Promise.reject(new Error('data file unavailable')),
};

describe('API server', () => {
  const app = createServer({ dataSource: new StaticDataSource(dashboardInput) });
  const token = generateEmbedToken(600);

  describe('GET /api/v1/health', () => {
    it('reports the stylesheet and data snapshot', async () => {
      const res = await request(app).get('/api/v1/health');
      expect(res.status).toBe(200);
      expect(res.body.status).toBe('ok');
      expect(res.body.stylesheet.rules).toBe(getThemeStylesheet().rules.length);
      expect(res.body.data.generatedAt).toBe('2026-10-01T08:00:00Z');
    });

    it('answers 503 when the data cannot be loaded', async () => {
      const res = await request(createServer({ dataSource: failingSource })).get('/api/v1/health');
      expect(res.status).toBe(503);
      expect(res.body).toEqual({ status: 'error', error: 'data file unavailable' });
    });
  });

  describe('GET /api/v1/widgets', () => {
    it('requires the API key', async () => {
      const res = await request(app).get('/api/v1/widgets');
      expect(res.status).toBe(401);
      expect(res.body).toEqual({ error: 'Unauthorized' });
    });

    it('describes each widget and its classes', async () => {
      const res = await request(app).get('/api/v1/widgets').set('x-api-key', API_KEY);
      expect(res.status).toBe(200);
      expect(res.body.widgets).toHaveLength(6);
      const first = res.body.widgets[0];
      expect(first.id).toBe('activity-graph');
      expect(first.block).toBe('rb-c-admin-activity-graph-widget');
      expect(first.size).toBe('large');
      expect(first.embedPath).toBe('/embed/widget/activity-graph');
      expect(first.modifiers).toEqual(['is-active']);
    });

    it('lists page chrome styles too', async () => {
      const res = await request(app).get('/api/v1/widgets/styles').set('x-api-key', API_KEY);
      expect(res.status).toBe(200);
      expect(res.body.styles[0].id).toBe('admin-page');
      expect(res.body.styles).toHaveLength(11);
    });
  });

  describe('POST /api/v1/embed-token', () => {
    it('clamps the lifetime', async () => {
      const short = await request(app).post('/api/v1/embed-token').set('x-api-key', API_KEY).send({ ttl: 10 });
      expect(short.status).toBe(200);
      expect(short.body.expiresIn).toBe(300);
      expect(verifyEmbedToken(short.body.token).scope).toBe('admin-dashboard');

      const long = await request(app).post('/api/v1/embed-token').set('x-api-key', API_KEY).send({ ttl: 999999 });
      expect(long.body.expiresIn).toBe(86400);
    });

    it('defaults to an hour and carries the viewer', async () => {
      const res = await request(app).post('/api/v1/embed-token').set('x-api-key', API_KEY).send({ viewer: 'admin' });
      expect(res.body.expiresIn).toBe(3600);
      expect(verifyEmbedToken(res.body.token).viewer).toBe('admin');
    });

    it('rejects a non-numeric ttl', async () => {
      const res = await request(app).post('/api/v1/embed-token').set('x-api-key', API_KEY).send({ ttl: 'abc' });
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'ttl must be a positive integer number of seconds' });
    });

    it('requires the API key', async () => {
      const res = await request(app).post('/api/v1/embed-token').send({ ttl: 600 });
      expect(res.status).toBe(401);
    });
  });

  describe('GET /embed/dashboard', () => {
    it('rejects a missing token', async () => {
      const res = await request(app).get('/embed/dashboard');
      expect(res.status).toBe(401);
      expect(res.text).toBe('Missing embed token');
    });

    it('rejects a token signed with another secret', async () => {
      const forged = jwt.sign({ scope: 'admin-dashboard' }, 'other-secret');
      const res = await request(app).get('/embed/dashboard').query({ token: forged });
      expect(res.status).toBe(401);
      expect(res.text).toBe('Invalid or expired embed token');
    });

    it('rejects a token for another scope', async () => {
      const other = jwt.sign({ scope: 'reports' }, 'test-secret');
      const res = await request(app).get('/embed/dashboard').query({ token: other });
      expect(res.status).toBe(401);
    });

    it('renders the page with range links that keep the token and theme', async () => {
      const res = await request(app).get('/embed/dashboard').query({ token, theme: 'dark', range: '7' });
      expect(res.status).toBe(200);
      expect(res.headers['content-type']).toBe('text/html; charset=utf-8');
      expect(res.headers['cache-control']).toBe('private, max-age=300');
      expect(res.text).toContain('<body class="dark">');
      expect(res.text).toContain(`href="/embed/dashboard?token=${token}&amp;theme=dark&amp;range=90"`);
    });

    it('links the sidebar back to the same embedded view', async () => {
      const res = await request(app).get('/embed/dashboard').query({ token, theme: 'dark' });
      const href = cheerio.load(res.text)('.rb-c-sidebar__nav-item.-is-active').attr('href');
      expect(href).toBe(`/embed/dashboard?token=${token}&theme=dark&range=30`);
      if (!href) return;

      const followed = await request(app).get(href);
      expect(followed.status).toBe(200);
      expect(followed.text).toContain('<body class="dark">');
    });

    it('falls back to the light theme', async () => {
      const res = await request(app).get('/embed/dashboard').query({ token, theme: 'sepia' });
      expect(res.status).toBe(200);
      expect(res.text).toContain('<body class="light">');
    });

    it('rejects an unsupported range', async () => {
      const res = await request(app).get('/embed/dashboard').query({ token, range: '15' });
      expect(res.status).toBe(400);
      expect(res.text).toMatch(/^Invalid query: range: /);
    });

    it('answers 500 when the data cannot be loaded', async () => {
      const res = await request(createServer({ dataSource: failingSource })).get('/embed/dashboard').query({ token });
      expect(res.status).toBe(500);
      expect(res.text).toBe('Internal error rendering dashboard');
    });
  });

  describe('GET /embed/widget/:id', () => {
    it('renders one widget', async () => {
      const res = await request(app).get('/embed/widget/news').query({ token });
      expect(res.status).toBe(200);
      expect(verifyMarkup(newsWidgetStyle, res.text)).toEqual([]);
    });

    it('answers 404 for unknown widgets', async () => {
      const res = await request(app).get('/embed/widget/nope').query({ token });
      expect(res.status).toBe(404);
      expect(res.text).toContain('<h3>Unknown widget: nope</h3>');
    });

    it('escapes the requested id', async () => {
      const res = await request(app).get('/embed/widget/%3Cb%3E').query({ token });
      expect(res.status).toBe(404);
      expect(res.text).toContain('Unknown widget: &lt;b&gt;');
    });

    it('checks the token before the id', async () => {
      const res = await request(app).get('/embed/widget/nope');
      expect(res.status).toBe(401);
    });

    it('answers 500 when the data cannot be loaded', async () => {
      const res = await request(createServer({ dataSource: failingSource })).get('/embed/widget/news').query({ token });
      expect(res.status).toBe(500);
      expect(res.text).toBe('Internal error rendering widget');
    });
  });

  it('serves the compiled stylesheet', async () => {
    const res = await request(app).get('/embed/styles.css');
    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toBe('text/css; charset=utf-8');
    expect(res.text).toBe(getThemeStylesheet().css);
  });

  it('answers unknown routes with JSON 404', async () => {
    const res = await request(app).get('/api/v1/nothing');
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: 'Not found' });
  });

  describe('startServer', () => {
    it('rejects when the port is already taken', async () => {
      const dataSource = new StaticDataSource(dashboardInput);
      const first = await startServer({ dataSource, port: 0 });
      try {
        const port = boundPort(first);
        expect(port).toBeGreaterThan(0);
        await expect(startServer({ dataSource, port })).rejects.toMatchObject({ code: 'EADDRINUSE' });
      } finally {
        await new Promise<void>((resolve) => first.close(() => resolve()));
      }
    });
  });
});
