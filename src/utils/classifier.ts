import { FormRecord } from '../types';
import { displayName } from './displayName';
import { FORM_RULES, FormRuleSet, matchRules } from './formRules';

/** Sufixo depois do nome da espécie: `meowth-galar` → `galar`, `meowth` → ``. */
export const regionTag = (name: string, species: string): string => {
  if (name === species) return '';
  if (name.startsWith(`${species}-`)) return name.slice(species.length + 1);
  return name;
};

export function classifyForm(name: string, species: string, rules: FormRuleSet = FORM_RULES): FormRecord {
  const verdict = matchRules(name, rules);
  const record: FormRecord = {
    name,
    species,
    regionTag: regionTag(name, species),
    boxable: verdict.boxable,
    displayName: displayName(name),
  };
  if (!verdict.boxable) record.excludedBy = verdict.rule;
  return record;
}

/** Classifica as variedades não padrão de uma espécie. */
export const classifyVarieties = (
  species: string,
  varieties: { name: string; isDefault: boolean }[],
  rules: FormRuleSet = FORM_RULES,
): FormRecord[] =>
  varieties
    .filter((variety) => !variety.isDefault)
    .map((variety) => classifyForm(variety.name, species, rules))
    .sort((a, b) => a.name.localeCompare(b.name));
