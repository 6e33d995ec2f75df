import 'dotenv/config';

function required(name: string): string {
  const val = process.env[name];
  if (!val) throw new Error(`Missing required environment variable: ${name}`);
  return val;
}

function optional(name: string, fallback: string): string {
  return process.env[name] || fallback;
}

const env = optional('NODE_ENV', 'development');

export const config = {
  env,
  logLevel: optional('LOG_LEVEL', env === 'development' ? 'debug' : 'info'),

  api: {
    port: parseInt(optional('PORT', '4060'), 10),
    apiKey: optional('API_KEY', ''),
    // no fallback secret in production
    embedSecret: env === 'production' ? required('EMBED_SECRET') : optional('EMBED_SECRET', 'dev-secret-change-in-prod'),
    allowedOrigins: optional('ALLOWED_ORIGINS', '')
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean),
  },

  dashboard: {
    dataPath: optional('DASHBOARD_DATA_PATH', './data/dashboard.sample.json'),
    title: optional('DASHBOARD_TITLE', 'Administration'),
    newsUrl: optional('DASHBOARD_NEWS_URL', ''),
    // empty: inline the compiled theme in every page
    stylesheetHref: optional('DASHBOARD_STYLESHEET_HREF', ''),
    cacheMaxAgeSeconds: parseInt(optional('DASHBOARD_CACHE_MAX_AGE', '300'), 10),
  },
};
