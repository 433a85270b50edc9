import axios, { AxiosInstance } from 'axios';
import {
  ChainLink,
  ChainReference,
  EvolutionChain,
  NamedResource,
  PokemonSpecies,
  ResourceKind,
  SpeciesRecord,
} from '../types';
import { DataShapeError, NetworkError, NotFoundError } from '../utils/errors';
import { isObject } from '../utils/guards';
import { Metrics, metrics as defaultMetrics } from '../utils/metrics';
import { DEFAULT_BASE_URL } from '../config';

export interface PokeApiClientOptions {
  baseUrl?: string;
  requestDelayMs?: number;
  timeoutMs?: number;
  http?: AxiosInstance;
  metrics?: Metrics;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

const wait = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const readNamedResource = (value: unknown, resource: string, field: string): NamedResource => {
  if (!isObject(value) || typeof value.name !== 'string') {
    throw new DataShapeError(resource, field);
  }
  return { name: value.name, url: typeof value.url === 'string' ? value.url : '' };
};

export const parseChainList = (payload: unknown, resource: string): ChainReference[] => {
  if (!isObject(payload) || !Array.isArray(payload.results)) {
    throw new DataShapeError(resource, 'results');
  }
  return payload.results.map((entry) => {
    if (!isObject(entry) || typeof entry.url !== 'string') {
      throw new DataShapeError(resource, 'results.url');
    }
    return { url: entry.url };
  });
};

const parseChainLink = (value: unknown, resource: string): ChainLink => {
  if (!isObject(value)) throw new DataShapeError(resource, 'chain');
  const evolvesTo = value.evolves_to ?? [];
  if (!Array.isArray(evolvesTo)) throw new DataShapeError(resource, 'evolves_to');
  return {
    is_baby: value.is_baby === true,
    species: readNamedResource(value.species, resource, 'species'),
    evolves_to: evolvesTo.map((link) => parseChainLink(link, resource)),
  };
};

export const parseEvolutionChain = (payload: unknown, resource: string): EvolutionChain => {
  if (!isObject(payload) || typeof payload.id !== 'number') {
    throw new DataShapeError(resource, 'id');
  }
  return { id: payload.id, chain: parseChainLink(payload.chain, resource) };
};

export const parseSpecies = (payload: unknown, resource: string): PokemonSpecies => {
  if (!isObject(payload)) throw new DataShapeError(resource, 'body');
  if (typeof payload.id !== 'number') throw new DataShapeError(resource, 'id');
  if (typeof payload.name !== 'string') throw new DataShapeError(resource, 'name');
  if (!Array.isArray(payload.varieties)) throw new DataShapeError(resource, 'varieties');

  const numbers = Array.isArray(payload.pokedex_numbers) ? payload.pokedex_numbers : [];
  const chain = payload.evolution_chain;

  return {
    id: payload.id,
    name: payload.name,
    pokedex_numbers: numbers.map((entry) => {
      if (!isObject(entry) || typeof entry.entry_number !== 'number') {
        throw new DataShapeError(resource, 'pokedex_numbers');
      }
      return {
        entry_number: entry.entry_number,
        pokedex: readNamedResource(entry.pokedex, resource, 'pokedex_numbers.pokedex'),
      };
    }),
    varieties: payload.varieties.map((variety) => {
      if (!isObject(variety) || typeof variety.is_default !== 'boolean') {
        throw new DataShapeError(resource, 'varieties.is_default');
      }
      return {
        is_default: variety.is_default,
        pokemon: readNamedResource(variety.pokemon, resource, 'varieties.pokemon'),
      };
    }),
    evolution_chain: isObject(chain) && typeof chain.url === 'string' ? { url: chain.url } : null,
  };
};

/** Número da Pokédex Nacional; a PokeAPI usa o mesmo valor como id da espécie. */
export const nationalDexNumber = (species: PokemonSpecies): number =>
  species.pokedex_numbers.find((entry) => entry.pokedex.name === 'national')?.entry_number ?? species.id;

export const toSpeciesRecord = (species: PokemonSpecies): SpeciesRecord => ({
  id: species.id,
  name: species.name,
  dexNumber: nationalDexNumber(species),
  varieties: species.varieties.map((v) => ({ name: v.pokemon.name, isDefault: v.is_default })),
  evolutionChainUrl: species.evolution_chain?.url ?? null,
});

export const chainIdFromUrl = (url: string): number => {
  const match = url.match(/evolution-chain\/(\d+)\/?$/);
  return match ? parseInt(match[1], 10) : Number.NaN;
};

export class PokeApiClient {
  private readonly http: AxiosInstance;
  private readonly delayMs: number;
  private readonly metrics: Metrics;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private lastRequestAt: number | null = null;

  constructor(options: PokeApiClientOptions = {}) {
    this.http = options.http ?? axios.create({
      baseURL: options.baseUrl ?? DEFAULT_BASE_URL,
      timeout: options.timeoutMs ?? 30000,
      headers: { Accept: 'application/json' },
    });
    this.delayMs = options.requestDelayMs ?? 200;
    this.metrics = options.metrics ?? defaultMetrics;
    this.sleep = options.sleep ?? wait;
    this.now = options.now ?? Date.now;
  }

  public async listEvolutionChains(): Promise<ChainReference[]> {
    const path = 'evolution-chain/?limit=9999';
    return parseChainList(await this.get(path), path);
  }

  public async fetchEvolutionChain(urlOrId: string | number): Promise<EvolutionChain> {
    const path = this.resourcePath('evolution-chain', urlOrId);
    return parseEvolutionChain(await this.get(path), path);
  }

  public async fetchSpecies(nameOrUrl: string | number): Promise<PokemonSpecies> {
    const path = this.resourcePath('pokemon-species', nameOrUrl);
    return parseSpecies(await this.get(path), path);
  }

  public async fetchResource(kind: ResourceKind, id: string | number): Promise<unknown> {
    return this.get(this.resourcePath(kind, id));
  }

  private resourcePath(kind: ResourceKind, id: string | number): string {
    const value = String(id);
    if (/^https?:\/\//.test(value)) return value;
    return `${kind}/${encodeURIComponent(value)}/`;
  }

  // Pausa fixa entre chamadas, compartilhada por todo o processo
  private async pace() {
    if (this.lastRequestAt !== null) {
      const remaining = this.delayMs - (this.now() - this.lastRequestAt);
      if (remaining > 0) await this.sleep(remaining);
    }
    this.lastRequestAt = this.now();
  }

  private async get(path: string): Promise<unknown> {
    await this.pace();
    this.metrics.increment('requests');
    try {
      const response = await this.http.get<unknown>(path);
      return response.data;
    } catch (error) {
      this.metrics.increment('fetchErrors');
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        if (status === 404) throw new NotFoundError(path);
        throw new NetworkError(path, `GET ${path} failed: ${error.message}`, status, { cause: error });
      }
      throw new NetworkError(path, `GET ${path} failed: ${String(error)}`, undefined, { cause: error });
    }
  }
}
