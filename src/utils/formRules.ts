import ruleTable from '../data/formRules.json';
import { FormCategory, FormRule } from '../types';

const CATEGORIES: ReadonlySet<string> = new Set<FormCategory>([
  'mega',
  'primal',
  'gigantamax',
  'cosmetic',
  'battle-only',
  'fusion',
  'item-form',
]);

export const isFormCategory = (value: string): value is FormCategory => CATEGORIES.has(value);

export interface FormRuleSet {
  allow: string[];
  deny: FormRule[];
}

export const parseRuleSet = (table: { allow: string[]; deny: { pattern: string; category: string }[] }): FormRuleSet => ({
  allow: [...table.allow],
  deny: table.deny.map(({ pattern, category }) => {
    if (!isFormCategory(category)) {
      throw new Error(`Unknown form rule category '${category}' for pattern '${pattern}'`);
    }
    return { pattern, category };
  }),
});

/** Formas que não podem ser guardadas nas caixas (Mega, Gigantamax, fantasias, fusões...). */
export const FORM_RULES: FormRuleSet = parseRuleSet(ruleTable);

export type Verdict = { boxable: true } | { boxable: false; rule: FormRule };

/** A lista de permissões vence; depois vale a primeira regra de exclusão que casar. */
export const matchRules = (name: string, rules: FormRuleSet = FORM_RULES): Verdict => {
  if (rules.allow.some((pattern) => name.includes(pattern))) {
    return { boxable: true };
  }
  const rule = rules.deny.find(({ pattern }) => name.includes(pattern));
  return rule ? { boxable: false, rule } : { boxable: true };
};
