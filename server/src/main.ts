import path from 'node:path';
import { existsSync } from 'node:fs';
import dotenv from 'dotenv';
import { serve } from '@hono/node-server';
import { serveStatic } from '@hono/node-server/serve-static';
import app from './index';
import { loadConfig } from './config';
import { JsonFileEntryStore } from './db/store';
import { createAnalyzer } from './services/analysis';
import type { Env } from './types';

// Load environment variables from .env file
dotenv.config();

const config = loadConfig();

const env: Env = {
  STORE: new JsonFileEntryStore(config.dataFile),
  ANALYZER: config.anthropicApiKey
    ? createAnalyzer({ apiKey: config.anthropicApiKey, model: config.analysisModel })
    : null,
  CLOCK: () => new Date(),
  CORS_ORIGIN: config.corsOrigin,
};

// Built frontend, with index.html as the fallback for client-side routes
if (existsSync(config.staticDir)) {
  const root = path.relative(process.cwd(), config.staticDir);
  app.use('*', serveStatic({ root }));
  app.get('*', serveStatic({ path: path.join(root, 'index.html') }));
} else {
  console.warn(`[Server] No frontend build at ${config.staticDir}; serving the API only`);
}

serve(
  {
    fetch: (request) => app.fetch(request, env),
    port: config.port,
    hostname: config.host,
  },
  (info) => {
    console.log(`[Server] Listening on http://${info.address}:${info.port}`);
    console.log(`[Server] Data file: ${config.dataFile}`);
    console.log(`[Server] Analysis ${env.ANALYZER ? `enabled (${config.analysisModel})` : 'disabled'}`);
  }
);
