#!/usr/bin/env node
/**
 * School Map - Data Validation
 *
 * Checks data/schools.json and data/political_data.json offline and prints a
 * coverage report. Exits 1 when any check fails.
 */

import * as path from 'path';
import { readJsonArtifact } from './lib/cache';
import { loadConfig, stageBanner } from './lib/config';
import { politicalArtifactSchema } from './lib/political/types';
import { schoolsArtifactSchema } from './lib/types';
import { checkPolitical, checkSchools, coverageReport, type Violation } from './lib/validation';

const MAX_LISTED = 20;

function pct(n: number, total: number): string {
  return total > 0 ? `${((n / total) * 100).toFixed(1)}%` : '-';
}

function printViolations(label: string, violations: Violation[]): void {
  if (violations.length === 0) {
    console.log(`  ✓ ${label}: no violations`);
    return;
  }
  const byCheck: Record<string, number> = {};
  for (const v of violations) byCheck[v.check] = (byCheck[v.check] ?? 0) + 1;
  console.error(`  ✗ ${label}: ${violations.length} violations`);
  for (const [check, n] of Object.entries(byCheck)) console.error(`    ${check}: ${n}`);
  for (const v of violations.slice(0, MAX_LISTED)) console.error(`    - [${v.check}] ${v.subject}: ${v.message}`);
  if (violations.length > MAX_LISTED) console.error(`    ... ${violations.length - MAX_LISTED} more`);
}

async function main(): Promise<void> {
  const config = loadConfig();
  console.log(`${stageBanner(config.region, 'Data Validation')}\n`);

  console.log('1. Loading artifacts...');
  const schools = readJsonArtifact(path.join(config.dataDir, 'schools.json'), schoolsArtifactSchema);
  const political = readJsonArtifact(path.join(config.dataDir, 'political_data.json'), politicalArtifactSchema);
  console.log(`  schools: ${schools.length}, communes: ${Object.keys(political).length}`);

  console.log('\n2. Checking...');
  const schoolViolations = checkSchools(schools, config.region);
  const politicalViolations = checkPolitical(political);
  printViolations('schools', schoolViolations);
  printViolations('political', politicalViolations);

  console.log('\n3. Coverage');
  const c = coverageReport(schools, political);
  for (const [category, n] of Object.entries(c.byCategory)) console.log(`  ${category}: ${n}`);
  console.log(`  With coordinates: ${c.withCoordinates} (${pct(c.withCoordinates, c.schools)})`);
  console.log(`  With IPS: ${c.withIps} (${pct(c.withIps, c.schools)})`);
  console.log(`  With enrollment: ${c.withEnrollment} (${pct(c.withEnrollment, c.schools)})`);
  console.log(`  With exam results: ${c.withExamResults} (${pct(c.withExamResults, c.schools)})`);
  console.log(`  With commune code: ${c.withInsee} (${pct(c.withInsee, c.schools)})`);
  console.log(`  Schools whose commune has a profile: ${c.schoolCommunesWithProfile}`);
  console.log(`  Communes: ${c.communes}, with mayor: ${c.withMayor} (${pct(c.withMayor, c.communes)})`);
  for (const [contest, n] of Object.entries(c.contests)) console.log(`  ${contest}: ${n} (${pct(n, c.communes)})`);
  console.log(`  Municipal 2020 with a second round: ${c.municipalRound2}`);

  const total = schoolViolations.length + politicalViolations.length;
  if (total > 0) {
    console.error(`\nValidation failed with ${total} violation(s).`);
    process.exit(1);
  }
  console.log('\nAll checks passed.');
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
