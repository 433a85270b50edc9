// Interfaces de Dados da PokeAPI
export interface NamedResource {
  name: string;
  url: string;
}

export interface ChainReference {
  url: string;
}

export interface ChainLink {
  is_baby?: boolean;
  species: NamedResource;
  evolves_to: ChainLink[];
}

export interface EvolutionChain {
  id: number;
  chain: ChainLink;
}

export interface PokedexNumber {
  entry_number: number;
  pokedex: NamedResource;
}

export interface SpeciesVariety {
  is_default: boolean;
  pokemon: NamedResource;
}

export interface PokemonSpecies {
  id: number;
  name: string;
  pokedex_numbers: PokedexNumber[];
  varieties: SpeciesVariety[];
  evolution_chain: ChainReference | null;
}

export type ResourceKind = 'evolution-chain' | 'pokemon-species';

// Registros mantidos em cache
export interface SpeciesRecord {
  id: number;
  name: string;
  dexNumber: number;
  varieties: { name: string; isDefault: boolean }[];
  evolutionChainUrl: string | null;
}

export type FormCategory =
  | 'mega'
  | 'primal'
  | 'gigantamax'
  | 'cosmetic'
  | 'battle-only'
  | 'fusion'
  | 'item-form';

export interface FormRule {
  pattern: string;
  category: FormCategory;
}

export interface FormRecord {
  name: string;
  species: string;
  regionTag: string;
  boxable: boolean;
  excludedBy?: FormRule;
  displayName: string;
}

// Famílias evolutivas
export interface ChainStage {
  species: string;
  stage: number;
}

export interface FamilyMember {
  name: string;
  displayName: string;
  species: string;
  dexNumber: number;
  stage: number;
  regionTag: string;
}

export interface Family {
  chainId: number;
  members: FamilyMember[];
  lowestDex: number;
}

export interface RunMetrics {
  requests: number;
  cacheHits: number;
  cacheMisses: number;
  fetchErrors: number;
  skippedSpecies: number;
  skippedChains: number;
  excludedForms: number;
}

export interface RunSummary {
  families: number;
  entries: number;
  outputPath: string;
  metrics: RunMetrics;
}

export interface Logger {
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}
