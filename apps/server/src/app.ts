import express, { type ErrorRequestHandler } from 'express';
import cors from 'cors';
import multer from 'multer';
import { config } from './config';
import { createAnnotationsRouter } from './routes/annotations';
import { createSpeciesRouter } from './routes/species';
import { speciesRegistry, type SpeciesRegistry } from './species/registry';
import { createLogger } from './utils/logger';

const log = createLogger('SERVER');

export function createApp(registry: SpeciesRegistry = speciesRegistry) {
  const app = express();

  // Browser clients in development talk to the API from another port
  if (config.nodeEnv !== 'production') {
    app.use(cors({
      origin: config.corsOrigins,
      credentials: true,
    }));
  }

  app.use(express.json({ limit: config.uploadLimitBytes }));

  app.get('/api/health', (_, res) => res.json({ ok: true }));
  app.use('/api', createSpeciesRouter(registry));
  app.use('/api', createAnnotationsRouter(registry));

  // Body parser and upload failures never reach the route handlers
  const onError: ErrorRequestHandler = (err, _req, res, _next) => {
    if (err instanceof multer.MulterError) {
      return res.status(400).json({ error: 'Upload rejected', message: err.message });
    }
    if (err instanceof SyntaxError) {
      return res.status(400).json({ error: 'Invalid JSON body', message: err.message });
    }
    log.error('Unhandled error:', err);
    res.status(500).json({ error: 'Internal server error', message: err instanceof Error ? err.message : 'Unknown error' });
  };
  app.use(onError);

  return app;
}
