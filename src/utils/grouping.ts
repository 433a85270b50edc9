import { ChainLink, ChainStage, Family, FamilyMember, FormRecord, SpeciesRecord } from '../types';
import { classifyForm } from './classifier';

// Ordem das variantes logo depois da forma base
export const REGION_PRIORITY: Record<string, number> = {
  '': 0,
  alola: 1,
  galar: 2,
  hisui: 3,
  paldea: 4,
  'white-striped': 5,
  'blue-striped': 6,
  'red-striped': 7,
  totem: 8,
};

const UNLISTED_REGION = 99;

const regionPriority = (tag: string) => REGION_PRIORITY[tag] ?? UNLISTED_REGION;

const compareText = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

/** Percorre a cadeia em largura; a raiz é o estágio 0. */
export function flattenChain(root: ChainLink): ChainStage[] {
  const seen = new Set<string>();
  const stages: ChainStage[] = [];
  const queue: { node: ChainLink; stage: number }[] = [{ node: root, stage: 0 }];

  while (queue.length > 0) {
    const next = queue.shift();
    if (!next) break;
    const { node, stage } = next;
    if (!seen.has(node.species.name)) {
      seen.add(node.species.name);
      stages.push({ species: node.species.name, stage });
    }
    for (const evolution of node.evolves_to) {
      queue.push({ node: evolution, stage: stage + 1 });
    }
  }
  return stages;
}

export function compareMembers(a: FamilyMember, b: FamilyMember): number {
  return (
    a.stage - b.stage ||
    a.dexNumber - b.dexNumber ||
    compareText(a.species, b.species) ||
    regionPriority(a.regionTag) - regionPriority(b.regionTag) ||
    compareText(a.regionTag, b.regionTag) ||
    compareText(a.name, b.name)
  );
}

/**
 * Monta a família de uma cadeia. Espécies sem registro (falha na busca) ficam de fora;
 * variantes herdam estágio e número da Dex da espécie base.
 */
export function buildFamily(
  chainId: number,
  stages: ChainStage[],
  species: Map<string, SpeciesRecord>,
  forms: Map<string, FormRecord[]>,
): Family {
  const members: FamilyMember[] = [];

  for (const { species: name, stage } of stages) {
    const record = species.get(name);
    if (!record) continue;

    const base = classifyForm(name, name);
    if (base.boxable) {
      members.push({
        name,
        displayName: base.displayName,
        species: name,
        dexNumber: record.dexNumber,
        stage,
        regionTag: '',
      });
    }

    for (const cached of forms.get(name) ?? []) {
      // O veredito em cache pode ter vindo de outra versão da tabela de regras
      const form = classifyForm(cached.name, name);
      if (!form.boxable) continue;
      members.push({
        name: form.name,
        displayName: form.displayName,
        species: name,
        dexNumber: record.dexNumber,
        stage,
        regionTag: form.regionTag,
      });
    }
  }

  members.sort(compareMembers);
  const lowestDex = members.reduce((min, m) => Math.min(min, m.dexNumber), Number.POSITIVE_INFINITY);
  return { chainId, members, lowestDex };
}

export function orderFamilies(families: Family[]): Family[] {
  return families
    .filter((family) => family.members.length > 0)
    .sort((a, b) => a.lowestDex - b.lowestDex || a.chainId - b.chainId);
}

/** Lista final de nomes; um nome já emitido não se repete. */
export function flattenFamilies(families: Family[]): string[] {
  const emitted = new Set<string>();
  const lines: string[] = [];
  for (const family of families) {
    for (const member of family.members) {
      if (emitted.has(member.name)) continue;
      emitted.add(member.name);
      lines.push(member.displayName);
    }
  }
  return lines;
}
