// National Population Projections - API Server
// Run: tsx src/server.ts

import { createApp } from './app';
import { config } from './lib/config';
import { log } from './lib/db';
import { describeCause } from './lib/errors';
import { createProjections } from './projections';

async function main(): Promise<void> {
  const { query } = await createProjections();
  const app = createApp(query);

  app.listen(config.port, () => {
    log('info', `NPP projections API running on port ${config.port}`, {
      years: [query.minYear(), query.maxYear()],
    });
  });
}

main().catch((error: unknown) => {
  log('error', 'Server failed to start', { error: describeCause(error) });
  process.exit(1);
});
