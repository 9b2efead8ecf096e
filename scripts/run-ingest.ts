// Run Ingestion Script
// Usage: tsx scripts/run-ingest.ts <VARIANT...> | --all [--publish]

import { closePool, log } from '../src/lib/db';
import { VARIANTS, isVariantCode } from '../src/lib/npp';
import { publishVariant } from '../src/lib/publish';
import { warmVariants } from '../src/lib/warm';
import { createStore } from '../src/projections';
import type { VariantCode } from '../src/types';

function usage(): void {
  const codes = Object.entries(VARIANTS)
    .map(([code, name]) => `    ${code}   - ${name}`)
    .join('\n');

  console.log(`
National Population Projections - Ingestion Runner

Usage:
  tsx scripts/run-ingest.ts <VARIANT> [VARIANT...]   Build cached tables for the given variants
  tsx scripts/run-ingest.ts --all                    Build cached tables for every variant
  ... --publish                                      Also upsert the tables into Postgres (DATABASE_URL)

Variant codes:
${codes}

Examples:
  tsx scripts/run-ingest.ts hhh ppl
  tsx scripts/run-ingest.ts --all --publish
  `);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === '--help') {
    usage();
    process.exit(0);
  }

  const publish = args.includes('--publish');
  const codes = args.includes('--all')
    ? Object.keys(VARIANTS)
    : args.filter((a) => !a.startsWith('--'));

  const variants: VariantCode[] = [];
  for (const code of codes) {
    if (!isVariantCode(code)) {
      console.error(`Invalid variant: ${code}`);
      process.exit(1);
    }
    variants.push(code);
  }

  try {
    log('info', `Running ingestion for ${variants.length} variants`, { publish });
    const results = await warmVariants(createStore(), variants, publish ? publishVariant : undefined);

    console.log(`\nCompleted ${results.length} ingestion runs:`);
    for (const result of results) {
      console.log(`  ${result.variant} ${result.status}: records=${result.records}, published=${result.published}`);
      if (result.error) {
        console.error(`    Error: ${result.error}`);
      }
    }

    await closePool();
    process.exit(results.some((r) => r.status === 'failed') ? 1 : 0);
  } catch (error) {
    log('error', 'Ingestion failed', { error: String(error) });
    console.error('Ingestion failed:', error);
    process.exit(1);
  }
}

void main();
