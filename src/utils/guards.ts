import { FormRecord, SpeciesRecord } from '../types';
import { isFormCategory } from './formRules';

type JsonObject = Record<string, unknown>;

export const isObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isVariety = (value: unknown) =>
  isObject(value) && typeof value.name === 'string' && typeof value.isDefault === 'boolean';

// Entradas lidas de species_cache.json
export function isSpeciesRecord(value: unknown): value is SpeciesRecord {
  return (
    isObject(value) &&
    typeof value.id === 'number' &&
    typeof value.name === 'string' &&
    typeof value.dexNumber === 'number' &&
    Number.isFinite(value.dexNumber) &&
    Array.isArray(value.varieties) &&
    value.varieties.every(isVariety) &&
    (value.evolutionChainUrl === null || typeof value.evolutionChainUrl === 'string')
  );
}

const isFormRecord = (value: unknown) => {
  if (!isObject(value)) return false;
  if (
    typeof value.name !== 'string' ||
    typeof value.species !== 'string' ||
    typeof value.regionTag !== 'string' ||
    typeof value.boxable !== 'boolean' ||
    typeof value.displayName !== 'string'
  ) {
    return false;
  }
  const rule = value.excludedBy;
  if (rule === undefined) return true;
  return isObject(rule) && typeof rule.pattern === 'string' && typeof rule.category === 'string' && isFormCategory(rule.category);
};

// Entradas lidas de variant_cache.json
export function isFormRecordList(value: unknown): value is FormRecord[] {
  return Array.isArray(value) && value.every(isFormRecord);
}
