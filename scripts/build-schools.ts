#!/usr/bin/env node
/**
 * School Map - Schools Build
 *
 * Reads the education cache artifacts written by fetch-education, resolves
 * missing commune codes through geo.api.gouv.fr, joins everything on UAI and
 * writes data/schools.json.
 */

import * as path from 'path';
import { z } from 'zod';
import { readJsonArtifact, readOptionalArtifact, writeJsonAtomic } from './lib/cache';
import { loadConfig, type PipelineConfig, stageBanner } from './lib/config';
import { InseeMapper, lookupFailureSummary, MAPPING_FILE } from './lib/insee-mapper';
import { mergeSchools, type MergeInputs, type MergeReport } from './lib/merge';
import { RequestPacer } from './lib/pacer';
import {
  bacSource,
  brevetSource,
  directorySource,
  ENROLLMENT_SOURCES,
  IPS_SOURCES,
  languagesSource,
  type RecordSource,
} from './lib/sources';
import { schoolsArtifactSchema } from './lib/types';

function readCache<Row, Out>(config: PipelineConfig, source: RecordSource<Row, Out>): Out[] {
  return readOptionalArtifact(path.join(config.cacheDir, source.cacheFile), z.array(source.schema), []);
}

function loadInputs(config: PipelineConfig): MergeInputs {
  // The directory is the spine of the join; without it there is nothing to build.
  const directory = readJsonArtifact(path.join(config.cacheDir, directorySource.cacheFile), z.array(directorySource.schema));
  return {
    directory,
    ips: IPS_SOURCES.flatMap((s) => readCache(config, s)),
    enrollment: ENROLLMENT_SOURCES.flatMap((s) => readCache(config, s)),
    languages: readCache(config, languagesSource),
    brevet: readCache(config, brevetSource),
    bac: readCache(config, bacSource),
  };
}

function printReport(report: MergeReport): void {
  console.log(`  Directory rows: ${report.input}`);
  for (const [reason, n] of Object.entries(report.filtered)) console.log(`  Filtered (${reason}): ${n}`);
  console.log(`  Duplicate UAIs collapsed: ${report.duplicatesCollapsed}`);
  console.log(`  Schools: ${report.output}`);
  console.log(`    primary: ${report.byCategory.primary}`);
  console.log(`    middle:  ${report.byCategory.middle}`);
  console.log(`    high:    ${report.byCategory.high}`);
  console.log(`  With coordinates: ${report.withCoordinates}`);
  const { ips, enrollment, languages, exams } = report.joined;
  console.log(`  Joined: ips ${ips}, enrollment ${enrollment}, languages ${languages}, exams ${exams}`);
  const { directory, mapped, missing } = report.insee;
  console.log(`  Commune codes: ${directory} from directory, ${mapped} mapped, ${missing} missing`);
}

async function main(): Promise<void> {
  const config = loadConfig();
  console.log(`${stageBanner(config.region, 'Schools Build')}\n`);

  console.log('1. Loading cache artifacts...');
  const inputs = loadInputs(config);
  console.log(`  directory: ${inputs.directory.length}`);
  console.log(`  ips: ${inputs.ips.length}, enrollment: ${inputs.enrollment.length}`);
  console.log(`  languages: ${inputs.languages.length}, brevet: ${inputs.brevet.length}, bac: ${inputs.bac.length}`);

  console.log('\n2. Resolving commune codes...');
  const mapper = new InseeMapper({
    baseUrl: config.geoApiBase,
    pacer: RequestPacer.fromRateLimit(config.geoApiRate),
    cacheFile: path.join(config.cacheDir, MAPPING_FILE),
  });
  console.log(`  Mapping cache: ${mapper.cachedPostalCodes} postal codes`);
  const needsLookup = inputs.directory.filter((r) => (r.code_commune?.trim() ?? '').length !== 5);
  const stats = await mapper.lookupPostalCodes(needsLookup.map((r) => r.postal_code));
  console.log(
    `  Postal codes: ${stats.requested} requested, ${stats.fromCache} cached, ${stats.fetched} fetched, ${stats.failed} failed`
  );

  console.log('\n3. Merging...');
  const { schools, report } = mergeSchools(inputs, {
    resolveCommune: (postalCode, city) => {
      const r = mapper.resolve(postalCode, city);
      return r.status === 'resolved' ? r.commune.insee_code : null;
    },
  });
  mapper.save();
  printReport(report);
  if (mapper.unresolved.size > 0) {
    console.log(`  Unresolved postal code/city pairs: ${mapper.unresolved.size}`);
    for (const [key, status] of [...mapper.unresolved].slice(0, 10)) console.log(`    ${key} (${status})`);
  }

  schoolsArtifactSchema.parse(schools);
  const outPath = path.join(config.dataDir, 'schools.json');
  writeJsonAtomic(outPath, schools);
  console.log(`\nWrote ${schools.length} schools to ${outPath}`);

  const failure = lookupFailureSummary(stats);
  if (failure) {
    console.error(failure);
    process.exit(1);
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
