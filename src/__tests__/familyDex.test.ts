import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { FamilyDexBuilder } from '../services/familyDex';
import { JsonFileCache } from '../services/cacheStore';
import { PokeApiClient } from '../services/poke-api';
import { Metrics } from '../utils/metrics';
import { isFormRecordList, isSpeciesRecord } from '../utils/guards';
import { IOError } from '../utils/errors';
import {
  CHAIN_LIST_PATH,
  EXPECTED_LISTING,
  FakePokeApi,
  chainPath,
  seedDataset,
  silentLogger,
  speciesPath,
} from './helpers/fakePokeApi';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'family-dex-test-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function makeBuilder(api: FakePokeApi, outputFile = join(dir, 'pokedex_by_family.txt')) {
  const metrics = new Metrics();
  const builder = new FamilyDexBuilder({
    client: new PokeApiClient({ http: api.http, requestDelayMs: 0, metrics }),
    speciesCache: new JsonFileCache(join(dir, 'species_cache.json'), { validate: isSpeciesRecord, logger: silentLogger }),
    variantCache: new JsonFileCache(join(dir, 'variant_cache.json'), { validate: isFormRecordList, logger: silentLogger }),
    outputFile,
    metrics,
    logger: silentLogger,
  });
  return { builder, metrics };
}

const readLines = async (file: string) => (await readFile(file, 'utf-8')).split('\n').slice(0, -1);

describe('FamilyDexBuilder', () => {
  it('writes families in dex order with variants after their base form', async () => {
    const api = seedDataset(new FakePokeApi());
    const { builder } = makeBuilder(api);

    const summary = await builder.run();

    expect(await readLines(join(dir, 'pokedex_by_family.txt'))).toEqual(EXPECTED_LISTING);
    expect(summary.families).toBe(3);
    expect(summary.entries).toBe(13);
  });

  it('lists Meowth, its regional forms, then its evolutions', async () => {
    const api = seedDataset(new FakePokeApi());
    const { builder } = makeBuilder(api);
    await builder.run();

    const lines = await readLines(join(dir, 'pokedex_by_family.txt'));
    const start = lines.indexOf('Meowth');
    expect(lines.slice(start)).toEqual([
      'Meowth',
      'Meowth (Alola)',
      'Meowth (Galar)',
      'Persian',
      'Persian (Alola)',
      'Perrserker',
    ]);
  });

  it('never writes Mega, Gigantamax or costume forms', async () => {
    const api = seedDataset(new FakePokeApi());
    const { builder, metrics } = makeBuilder(api);
    await builder.run();

    const text = await readFile(join(dir, 'pokedex_by_family.txt'), 'utf-8');
    expect(text).not.toMatch(/Mega|Gmax|Rock Star|Cap\)/);
    // meowth-gmax, venusaur-mega, venusaur-gmax and three Pikachu forms
    expect(metrics.getMetrics().excludedForms).toBe(6);
  });

  it('skips a species whose fetch fails and still writes everything else', async () => {
    const api = seedDataset(new FakePokeApi()).fail(speciesPath('ivysaur'), 500);
    const { builder, metrics } = makeBuilder(api);

    await builder.run();

    const lines = await readLines(join(dir, 'pokedex_by_family.txt'));
    expect(lines).not.toContain('Ivysaur');
    expect(lines).toEqual(EXPECTED_LISTING.filter((name) => name !== 'Ivysaur'));
    expect(metrics.getMetrics().skippedSpecies).toBe(1);
  });

  it('skips a chain that cannot be fetched', async () => {
    const api = seedDataset(new FakePokeApi()).fail(chainPath(10), 404);
    const { builder, metrics } = makeBuilder(api);

    const summary = await builder.run();

    const lines = await readLines(join(dir, 'pokedex_by_family.txt'));
    expect(lines).toEqual(EXPECTED_LISTING.filter((name) => !/^(Pichu|Pikachu|Raichu)/.test(name)));
    expect(summary.families).toBe(2);
    expect(metrics.getMetrics().skippedChains).toBe(1);
  });

  it('skips a species whose payload has no varieties', async () => {
    const api = seedDataset(new FakePokeApi()).reply(speciesPath('perrserker'), { id: 863, name: 'perrserker' });
    const { builder } = makeBuilder(api);

    await builder.run();

    const lines = await readLines(join(dir, 'pokedex_by_family.txt'));
    expect(lines).not.toContain('Perrserker');
    expect(lines[lines.length - 1]).toBe('Persian (Alola)');
  });

  it('makes no species requests on a warm rerun and writes identical output', async () => {
    const api = seedDataset(new FakePokeApi());
    const outputFile = join(dir, 'pokedex_by_family.txt');

    await makeBuilder(api).builder.run();
    const firstOutput = await readFile(outputFile, 'utf-8');
    expect(api.requested).toHaveLength(13);

    api.requested.length = 0;
    const { builder, metrics } = makeBuilder(api);
    await builder.run();

    expect(api.requested).toEqual([CHAIN_LIST_PATH, chainPath(52), chainPath(1), chainPath(10)]);
    expect(metrics.getMetrics().cacheHits).toBe(9);
    expect(metrics.getMetrics().cacheMisses).toBe(0);
    expect(await readFile(outputFile, 'utf-8')).toBe(firstOutput);
  });

  it('persists species and variant caches keyed by species name', async () => {
    const api = seedDataset(new FakePokeApi());
    await makeBuilder(api).builder.run();

    const species = JSON.parse(await readFile(join(dir, 'species_cache.json'), 'utf-8'));
    expect(Object.keys(species)).toHaveLength(9);
    expect(species.perrserker).toEqual({
      id: 863,
      name: 'perrserker',
      dexNumber: 863,
      varieties: [{ name: 'perrserker', isDefault: true }],
      evolutionChainUrl: 'http://pokeapi.test/api/v2/evolution-chain/52/',
    });

    const variants = JSON.parse(await readFile(join(dir, 'variant_cache.json'), 'utf-8'));
    expect(variants.meowth.map((form: { name: string; boxable: boolean }) => [form.name, form.boxable])).toEqual([
      ['meowth-alola', true],
      ['meowth-galar', true],
      ['meowth-gmax', false],
    ]);
  });

  it('reclassifies variants from a cache written under other rules', async () => {
    await writeFile(
      join(dir, 'variant_cache.json'),
      JSON.stringify({
        meowth: [
          { name: 'meowth-gmax', species: 'meowth', regionTag: 'gmax', boxable: true, displayName: 'Meowth (Gmax)' },
        ],
      }),
    );
    const api = seedDataset(new FakePokeApi());
    const { builder } = makeBuilder(api);

    await builder.run();

    expect(await readLines(join(dir, 'pokedex_by_family.txt'))).toEqual(EXPECTED_LISTING);
    const variants = JSON.parse(await readFile(join(dir, 'variant_cache.json'), 'utf-8'));
    expect(variants.meowth.map((form: { name: string; boxable: boolean }) => [form.name, form.boxable])).toEqual([
      ['meowth-alola', true],
      ['meowth-galar', true],
      ['meowth-gmax', false],
    ]);
  });

  it('keeps fetched species in the cache when the output write fails', async () => {
    const api = seedDataset(new FakePokeApi());
    const blocker = join(dir, 'not-a-dir');
    await writeFile(blocker, 'x');
    const { builder } = makeBuilder(api, join(blocker, 'pokedex_by_family.txt'));

    await expect(builder.run()).rejects.toBeInstanceOf(IOError);

    const species = JSON.parse(await readFile(join(dir, 'species_cache.json'), 'utf-8'));
    expect(Object.keys(species)).toHaveLength(9);
  });

  it('fails the run when the chain list cannot be fetched', async () => {
    const api = new FakePokeApi().drop(CHAIN_LIST_PATH);
    const { builder } = makeBuilder(api);

    await expect(builder.run()).rejects.toThrow(`GET ${CHAIN_LIST_PATH} failed: socket hang up`);
  });
});
