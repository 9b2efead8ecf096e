// Cron Scheduler for Cache Warming
// Run as a separate process: tsx src/scheduler.ts

import cron from 'node-cron';
import { config } from './lib/config';
import { closePool, log } from './lib/db';
import { describeCause } from './lib/errors';
import { VARIANTS, isVariantCode } from './lib/npp';
import { publishVariant } from './lib/publish';
import { warmVariants } from './lib/warm';
import { createStore } from './projections';
import type { VariantCode } from './types';

function selectedVariants(): VariantCode[] {
  const requested = config.warmVariants.length > 0 ? config.warmVariants : Object.keys(VARIANTS);
  const variants: VariantCode[] = [];
  for (const code of requested) {
    if (isVariantCode(code)) {
      variants.push(code);
    } else {
      log('warn', `Ignoring unknown variant in WARM_VARIANTS: ${code}`);
    }
  }
  return variants;
}

// Track a running warm to prevent overlaps
let running = false;

async function runJob(variants: VariantCode[]): Promise<void> {
  if (running) {
    log('info', 'Skipping warm run - previous run still going');
    return;
  }

  running = true;
  try {
    log('info', 'Scheduled warm starting', { variants });
    // A fresh store each run, so the process does not hold every table
    const store = createStore();
    await warmVariants(store, variants, config.publishOnWarm ? publishVariant : undefined);
    log('info', 'Scheduled warm completed');
  } catch (error) {
    log('error', 'Scheduled warm failed', { error: describeCause(error) });
  } finally {
    running = false;
  }
}

function startScheduler(): void {
  log('info', 'Starting cache warming scheduler...');

  if (!cron.validate(config.warmCron)) {
    log('error', `Invalid cron expression in WARM_CRON: ${config.warmCron}`);
    process.exit(1);
  }

  const variants = selectedVariants();
  cron.schedule(config.warmCron, () => {
    void runJob(variants);
  }, {
    timezone: 'Europe/London'
  });

  log('info', `Scheduled: warm ${variants.length} variants @ ${config.warmCron}`);

  const shutdown = () => {
    log('info', 'Scheduler shutting down...');
    void closePool()
      .catch((error: unknown) => log('error', 'Failed to close pool', { error: describeCause(error) }))
      .finally(() => process.exit(0));
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  if (config.runInitialWarm) {
    void runJob(variants);
  }
}

startScheduler();
