import { serve } from '@hono/node-server';
import { db } from './db.js';
import { createApp } from './app.js';

const app = createApp(db);
const port = parseInt(process.env.PORT ?? '3000');

serve({ fetch: app.fetch, port }, (info) => {
  console.log(`Split-loan API v0.1.0 → http://localhost:${info.port}`);
});
