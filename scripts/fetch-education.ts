#!/usr/bin/env node
/**
 * School Map - Education Data Fetch
 *
 * Pulls every education dataset from the data.education.gouv.fr records API and
 * writes one cache artifact per source under data/cache/.
 *
 * Data Sources:
 * - Directory: fr-en-annuaire-education
 * - IPS: écoles, collèges, lycées
 * - Enrollment: écoles (with class counts), collèges, lycées
 * - Language offerings (2nde), brevet results, bac results
 */

import { loadConfig, stageBanner } from './lib/config';
import { describeError } from './lib/errors';
import { RequestPacer } from './lib/pacer';
import {
  bacSource,
  brevetSource,
  directorySource,
  ENROLLMENT_SOURCES,
  IPS_SOURCES,
  languagesSource,
  runRecordSource,
  type SourceRun,
} from './lib/sources';

async function main(): Promise<void> {
  const config = loadConfig();
  console.log(`${stageBanner(config.region, 'Education Data Fetch')}\n`);
  console.log(`Region: ${config.region.name} (${config.region.departments.map((d) => d.code).join(', ')})`);
  console.log(`Cache:  ${config.cacheDir}\n`);

  // One pacer for the whole API: every source shares the quota.
  const pacer = RequestPacer.fromRateLimit(config.recordsApiRate);
  const client = { baseUrl: config.recordsApiBase, pacer };

  const tasks: { name: string; run: () => Promise<SourceRun<unknown>> }[] = [
    { name: directorySource.name, run: () => runRecordSource(directorySource, config.region, config.cacheDir, client) },
    ...IPS_SOURCES.map((s) => ({ name: s.name, run: () => runRecordSource(s, config.region, config.cacheDir, client) })),
    ...ENROLLMENT_SOURCES.map((s) => ({ name: s.name, run: () => runRecordSource(s, config.region, config.cacheDir, client) })),
    { name: languagesSource.name, run: () => runRecordSource(languagesSource, config.region, config.cacheDir, client) },
    { name: brevetSource.name, run: () => runRecordSource(brevetSource, config.region, config.cacheDir, client) },
    { name: bacSource.name, run: () => runRecordSource(bacSource, config.region, config.cacheDir, client) },
  ];

  console.log(`Fetching ${tasks.length} sources...`);
  const results = await Promise.allSettled(tasks.map((t) => t.run()));

  let failed = 0;
  results.forEach((r, i) => {
    const name = tasks[i]?.name ?? `source ${i}`;
    if (r.status === 'fulfilled') {
      const { count, fetched, skipped, skipReasons } = r.value;
      const reasons = Object.entries(skipReasons)
        .map(([k, v]) => `${k}: ${v}`)
        .join(', ');
      console.log(`  ✓ ${name}: ${count} records (${fetched} fetched, ${skipped} skipped${reasons ? `; ${reasons}` : ''})`);
    } else {
      failed++;
      console.error(`  ✗ ${name}: ${describeError(r.reason)}`);
    }
  });

  console.log(`\nDone. ${tasks.length - failed}/${tasks.length} sources refreshed.`);
  if (failed > 0) {
    console.error(`${failed} source(s) failed; their previous cache artifacts were left untouched.`);
    process.exit(1);
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
