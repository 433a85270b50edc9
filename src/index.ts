#!/usr/bin/env node
import { loadConfig } from './config';
import { createFamilyDex } from './services/familyDex';
import { logError } from './utils/errors';
import { metrics } from './utils/metrics';

async function main() {
  const config = loadConfig();
  const summary = await createFamilyDex(config, metrics).run();
  const { requests, cacheHits, skippedSpecies, skippedChains } = summary.metrics;

  console.log(
    `[FamilyDex] ${summary.entries} entries in ${summary.families} families written to ${summary.outputPath} ` +
      `(${requests} requests, ${cacheHits} cache hits, ${skippedSpecies} species and ${skippedChains} chains skipped)`,
  );
}

main().catch((error: unknown) => {
  logError('FamilyDex', error);
  process.exitCode = 1;
});
