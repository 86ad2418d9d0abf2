#!/usr/bin/env node
/**
 * School Map - Political Data Build
 *
 * Downloads the election result files, builds one cache artifact per contest
 * under data/political_cache/, then merges them into data/political_data.json
 * keyed by INSEE commune code.
 *
 * Data Sources:
 * - Mayors: Répertoire national des élus (RNE)
 * - Municipal 2020: rounds 1 and 2 (data.gouv.fr)
 * - Presidential 2022: rounds 1 and 2 (data.gouv.fr)
 * - Legislative 2024: rounds 1 and 2 (data.gouv.fr)
 */

import * as path from 'path';
import { readOptionalArtifact, writeJsonAtomic } from './lib/cache';
import { isRegionDepartment, loadConfig, type PipelineConfig, stageBanner } from './lib/config';
import { describeError } from './lib/errors';
import { InseeMapper, MAPPING_FILE } from './lib/insee-mapper';
import { RequestPacer } from './lib/pacer';
import { downloadBuffer } from './lib/records-api';
import { readBallotTable, type BallotParser, type BallotRow, type ContestBuild, type RowReport } from './lib/political/ballots';
import { buildLegislativeContest, LEGISLATIVE_ROUND_1, LEGISLATIVE_ROUND_2 } from './lib/political/legislative';
import { buildMayors } from './lib/political/mayors';
import { buildMunicipalContest, MUNICIPAL_ROUND_1, MUNICIPAL_ROUND_2 } from './lib/political/municipal';
import { loadPartyLabels, type PartyLabels } from './lib/political/party-labels';
import { buildPresidentialContest, PRESIDENTIAL_ROUND_1, PRESIDENTIAL_ROUND_2 } from './lib/political/presidential';
import { mergePoliticalProfiles } from './lib/political/profiles';
import { contestCacheSchema, mayorCacheSchema, politicalArtifactSchema } from './lib/political/types';

const CACHE_FILES = {
  mayors: 'mayors.json',
  municipal: 'municipal_2020.json',
  presidential: 'presidential_2022.json',
  legislative: 'legislative_2024.json',
};

function formatReasons(reasons: Record<string, number>): string {
  const parts = Object.entries(reasons).map(([k, v]) => `${k}: ${v}`);
  return parts.length ? parts.join(', ') : 'none';
}

function logReport(label: string, report: RowReport<unknown>): void {
  console.log(
    `  ${label}: ${report.read} rows, ${report.kept} kept, ${report.filtered} out of region, ${report.skipped} skipped (${formatReasons(report.skipReasons)})`
  );
}

async function readRound(url: string, parser: BallotParser, config: PipelineConfig, pacer: RequestPacer): Promise<BallotRow[]> {
  const buf = await downloadBuffer(parser.name, url, { pacer });
  const report = readBallotTable(buf, parser, config.region);
  logReport(parser.name, report);
  return report.rows;
}

interface RoundSource {
  url: string;
  parser: BallotParser;
}

type ContestBuilder = (round1: BallotRow[], round2: BallotRow[], labels: PartyLabels) => ContestBuild;

async function buildContest(
  name: string,
  file: string,
  round1: RoundSource,
  round2: RoundSource,
  build: ContestBuilder,
  config: PipelineConfig,
  pacer: RequestPacer,
  labels: PartyLabels
): Promise<number> {
  const [r1, r2] = await Promise.all([
    readRound(round1.url, round1.parser, config, pacer),
    readRound(round2.url, round2.parser, config, pacer),
  ]);
  const { entries, counts } = build(r1, r2, labels);
  writeJsonAtomic(path.join(config.politicalCacheDir, file), entries);
  const communes = Object.keys(entries).length;
  console.log(`  ✓ ${name}: ${communes} communes (${formatReasons(counts)})`);
  return communes;
}

async function buildMayorCache(config: PipelineConfig, pacer: RequestPacer): Promise<number> {
  const buf = await downloadBuffer('mayors', config.elections.mayors, { pacer });
  const { mayors, report, duplicates } = buildMayors(buf, config.region);
  logReport('mayors', report);
  writeJsonAtomic(path.join(config.politicalCacheDir, CACHE_FILES.mayors), mayors);
  const count = Object.keys(mayors).length;
  console.log(`  ✓ mayors: ${count} communes (${duplicates} duplicate mayor rows ignored)`);
  return count;
}

/** INSEE code -> name for communes of the region, from the postal-code mapping cache. */
function loadCommuneNames(config: PipelineConfig): Record<string, string> {
  const mapper = new InseeMapper({
    baseUrl: config.geoApiBase,
    pacer: RequestPacer.fromRateLimit(config.geoApiRate),
    cacheFile: path.join(config.cacheDir, MAPPING_FILE),
  });
  return Object.fromEntries(
    Object.entries(mapper.communeNames()).filter(([code]) => isRegionDepartment(config.region, code.slice(0, 2)))
  );
}

async function main(): Promise<void> {
  const config = loadConfig();
  console.log(`${stageBanner(config.region, 'Political Data Build')}\n`);
  const labels = loadPartyLabels();
  // Bulk downloads are few and large; they share one modest pacer.
  const pacer = new RequestPacer(2);
  const { elections } = config;

  console.log('1. Downloading and parsing election sources...');
  const tasks: { name: string; run: () => Promise<number> }[] = [
    { name: 'mayors', run: () => buildMayorCache(config, pacer) },
    {
      name: 'municipal_2020',
      run: () =>
        buildContest(
          'municipal_2020',
          CACHE_FILES.municipal,
          { url: elections.municipalRound1, parser: MUNICIPAL_ROUND_1 },
          { url: elections.municipalRound2, parser: MUNICIPAL_ROUND_2 },
          buildMunicipalContest,
          config,
          pacer,
          labels
        ),
    },
    {
      name: 'presidential_2022',
      run: () =>
        buildContest(
          'presidential_2022',
          CACHE_FILES.presidential,
          { url: elections.presidentialRound1, parser: PRESIDENTIAL_ROUND_1 },
          { url: elections.presidentialRound2, parser: PRESIDENTIAL_ROUND_2 },
          (r1, r2, l) => buildPresidentialContest(r1, r2, l),
          config,
          pacer,
          labels
        ),
    },
    {
      name: 'legislative_2024',
      run: () =>
        buildContest(
          'legislative_2024',
          CACHE_FILES.legislative,
          { url: elections.legislativeRound1, parser: LEGISLATIVE_ROUND_1 },
          { url: elections.legislativeRound2, parser: LEGISLATIVE_ROUND_2 },
          buildLegislativeContest,
          config,
          pacer,
          labels
        ),
    },
  ];

  const results = await Promise.allSettled(tasks.map((t) => t.run()));
  const failures: string[] = [];
  results.forEach((r, i) => {
    if (r.status === 'rejected') {
      const name = tasks[i]?.name ?? `task ${i}`;
      failures.push(name);
      console.error(`  ✗ ${name}: ${describeError(r.reason)} (previous cache kept)`);
    }
  });

  console.log('\n2. Merging commune profiles...');
  const dir = config.politicalCacheDir;
  const profiles = mergePoliticalProfiles(
    {
      mayors: readOptionalArtifact(path.join(dir, CACHE_FILES.mayors), mayorCacheSchema, {}),
      municipal: readOptionalArtifact(path.join(dir, CACHE_FILES.municipal), contestCacheSchema, {}),
      presidential: readOptionalArtifact(path.join(dir, CACHE_FILES.presidential), contestCacheSchema, {}),
      legislative: readOptionalArtifact(path.join(dir, CACHE_FILES.legislative), contestCacheSchema, {}),
      communeNames: loadCommuneNames(config),
    },
    labels
  );
  politicalArtifactSchema.parse(profiles);

  const outPath = path.join(config.dataDir, 'political_data.json');
  writeJsonAtomic(outPath, profiles);
  const all = Object.values(profiles);
  console.log(`  Communes: ${all.length}`);
  console.log(`  With mayor: ${all.filter((p) => p.mayor).length}`);
  console.log(`  With municipal 2020: ${all.filter((p) => p.municipal_2020).length}`);
  console.log(`  With presidential 2022: ${all.filter((p) => p.presidential_2022).length}`);
  console.log(`  With legislative 2024: ${all.filter((p) => p.legislative_2024).length}`);
  console.log(`  Wrote ${outPath}`);

  if (failures.length > 0) {
    console.error(`\n${failures.length} source(s) failed: ${failures.join(', ')}`);
    process.exit(1);
  }
  console.log('\nDone.');
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});

