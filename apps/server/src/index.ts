import { createApp } from './app';
import { config } from './config';

const app = createApp();

app.listen(config.port, () => {
  console.log(`========================================`);
  console.log(`Follicle tile API listening on port ${config.port}`);
  console.log(`========================================`);
  console.log(`Health check: http://localhost:${config.port}/api/health`);
  console.log(`Species: http://localhost:${config.port}/api/species`);
  console.log(`Import endpoint: http://localhost:${config.port}/api/annotations/import`);
});
