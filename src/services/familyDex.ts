import { Config } from '../config';
import { ChainReference, EvolutionChain, Family, FormRecord, Logger, RunSummary, SpeciesRecord } from '../types';
import { classifyVarieties } from '../utils/classifier';
import { getErrorMessage, isRecoverable, logError } from '../utils/errors';
import { flattenChain, buildFamily, flattenFamilies, orderFamilies } from '../utils/grouping';
import { isFormRecordList, isSpeciesRecord } from '../utils/guards';
import { Metrics } from '../utils/metrics';
import { JsonFileCache } from './cacheStore';
import { writeListing } from './outputWriter';
import { PokeApiClient, chainIdFromUrl, toSpeciesRecord } from './poke-api';

export interface FamilyDexOptions {
  client: PokeApiClient;
  speciesCache: JsonFileCache<SpeciesRecord>;
  variantCache: JsonFileCache<FormRecord[]>;
  outputFile: string;
  metrics: Metrics;
  logger?: Logger;
}

// Entrada em cache só vale se bate com as variedades e as regras atuais
const sameForms = (cached: FormRecord[], current: FormRecord[]) =>
  cached.length === current.length &&
  cached.every(
    (form, i) =>
      form.name === current[i].name &&
      form.boxable === current[i].boxable &&
      form.displayName === current[i].displayName,
  );

/**
 * Pipeline de uma passada: cadeias evolutivas → espécies (cache ou API) →
 * classificação das formas → famílias ordenadas → arquivo de saída.
 */
export class FamilyDexBuilder {
  private readonly client: PokeApiClient;
  private readonly speciesCache: JsonFileCache<SpeciesRecord>;
  private readonly variantCache: JsonFileCache<FormRecord[]>;
  private readonly outputFile: string;
  private readonly metrics: Metrics;
  private readonly logger: Logger;

  constructor(options: FamilyDexOptions) {
    this.client = options.client;
    this.speciesCache = options.speciesCache;
    this.variantCache = options.variantCache;
    this.outputFile = options.outputFile;
    this.metrics = options.metrics;
    this.logger = options.logger ?? console;
  }

  public async run(): Promise<RunSummary> {
    const cachedSpecies = await this.speciesCache.load();
    const cachedVariants = await this.variantCache.load();
    this.logger.log(`[Cache] Loaded ${cachedSpecies} species and ${cachedVariants} variant entries`);

    let summary: RunSummary;
    try {
      summary = await this.buildAndWrite();
    } catch (error) {
      // O progresso já buscado continua valendo para a próxima execução
      await this.flushCaches().catch((flushError: unknown) => logError('Cache', flushError));
      throw error;
    }
    await this.flushCaches();
    return summary;
  }

  private async buildAndWrite(): Promise<RunSummary> {
    const chains = await this.client.listEvolutionChains();
    this.logger.log(`[FamilyDex] Found ${chains.length} evolution chains`);

    const families: Family[] = [];
    for (const [index, reference] of chains.entries()) {
      const family = await this.processChain(reference, index + 1, chains.length);
      if (family) families.push(family);
    }

    const ordered = orderFamilies(families);
    const names = flattenFamilies(ordered);
    await writeListing(this.outputFile, names);
    this.logger.log(`[FamilyDex] Saved ${names.length} entries to ${this.outputFile}`);

    return {
      families: ordered.length,
      entries: names.length,
      outputPath: this.outputFile,
      metrics: this.metrics.getMetrics(),
    };
  }

  private async processChain(reference: ChainReference, position: number, total: number): Promise<Family | null> {
    let chain: EvolutionChain;
    try {
      chain = await this.client.fetchEvolutionChain(reference.url);
    } catch (error) {
      if (!isRecoverable(error)) throw error;
      this.metrics.increment('skippedChains');
      this.logger.warn(`[${position}/${total}] Skipping chain ${chainIdFromUrl(reference.url)}: ${getErrorMessage(error)}`);
      return null;
    }

    const stages = flattenChain(chain.chain);
    const species = new Map<string, SpeciesRecord>();
    const forms = new Map<string, FormRecord[]>();

    for (const { species: name } of stages) {
      const record = await this.resolveSpecies(name);
      if (!record) continue;
      species.set(name, record);

      const variants = this.resolveForms(record);
      forms.set(name, variants);
      this.metrics.increment('excludedForms', variants.filter((form) => !form.boxable).length);
    }

    const family = buildFamily(chain.id, stages, species, forms);
    const labels = family.members.map((member) => member.displayName).join(', ');
    this.logger.log(`[${position}/${total}] ${labels || '(no boxable members)'}`);
    return family;
  }

  private async resolveSpecies(name: string): Promise<SpeciesRecord | null> {
    const cached = this.speciesCache.get(name);
    if (cached) {
      this.metrics.increment('cacheHits');
      return cached;
    }
    this.metrics.increment('cacheMisses');

    try {
      const record = toSpeciesRecord(await this.client.fetchSpecies(name));
      this.speciesCache.set(name, record);
      return record;
    } catch (error) {
      if (!isRecoverable(error)) throw error;
      this.metrics.increment('skippedSpecies');
      this.logger.warn(`[FamilyDex] Skipping species ${name}: ${getErrorMessage(error)}`);
      return null;
    }
  }

  private resolveForms(record: SpeciesRecord): FormRecord[] {
    const forms = classifyVarieties(record.name, record.varieties);
    const cached = this.variantCache.get(record.name);
    if (cached && sameForms(cached, forms)) return cached;

    this.variantCache.set(record.name, forms);
    return forms;
  }

  private async flushCaches() {
    await this.speciesCache.flush();
    await this.variantCache.flush();
  }
}

export function createFamilyDex(config: Config, metrics: Metrics, logger: Logger = console): FamilyDexBuilder {
  const client = new PokeApiClient({
    baseUrl: config.baseUrl,
    requestDelayMs: config.requestDelayMs,
    timeoutMs: config.requestTimeoutMs,
    metrics,
  });

  return new FamilyDexBuilder({
    client,
    speciesCache: new JsonFileCache(config.speciesCacheFile, { validate: isSpeciesRecord, logger }),
    variantCache: new JsonFileCache(config.variantCacheFile, { validate: isFormRecordList, logger }),
    outputFile: config.outputFile,
    metrics,
    logger,
  });
}
