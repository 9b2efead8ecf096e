// Demo: prints slices of the High population variant
// Usage: tsx scripts/run.ts

import { EW, range } from '../src/lib/npp';
import { createProjections } from '../src/projections';

async function main(): Promise<void> {
  const { query } = await createProjections();

  console.log(EW);

  const data = await query.detail('hhh', EW, range(2016, 2051));

  console.log([...new Set(data.map((o) => o.geography_code))]);
  console.log([...new Set(data.map((o) => o.year))]);
  console.log([...new Set(data.map((o) => o.age))]);
  console.log([...new Set(data.map((o) => o.gender))]);

  // sum over age and gender for each geography (and year)
  const agg = await query.aggregate('geography_code', 'hhh', EW, range(2016, 2051));
  console.table(agg);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
