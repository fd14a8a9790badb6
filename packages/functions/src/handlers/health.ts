import express from 'express';
import cors from 'cors';
import { stripPathPrefix } from '../middleware/strip-path-prefix.js';
import { getConfig } from '../config.js';

// Health check doesn't need express.json()
const app = express();
app.use(cors({ origin: true }));
app.use(stripPathPrefix('health'));

app.get('/', (_req, res) => {
  res.json({
    success: true,
    data: {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: '1.0.0',
      environment: getConfig().env,
    },
  });
});

export const healthApp = app;
