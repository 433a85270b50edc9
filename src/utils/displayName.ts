const SPECIAL_CASES: Record<string, string> = {
  'nidoran-f': 'Nidoran♀',
  'nidoran-m': 'Nidoran♂',
  'mime-jr': 'Mime Jr',
  'mr-mime': 'Mr. Mime',
  'mr-mime-galar': 'Mr. Mime (Galar)',
  'mr-rime': 'Mr. Rime',
  'type-null': 'Type: Null',
  'ho-oh': 'Ho-Oh',
  'porygon-z': 'Porygon-Z',
};

// Nomes de duas palavras: Tapus, Paradoxos e os tesouros da ruína
const TWO_WORD_PREFIXES = new Set([
  'tapu', 'great', 'scream', 'brute', 'flutter', 'slither', 'sandy',
  'iron', 'wo', 'chien', 'ting', 'chi', 'roaring', 'walking', 'gouging', 'raging',
]);

const HYPHENATED_O_LINE = ['jangmo-o', 'hakamo-o', 'kommo-o'];

const capitalize = (word: string) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();

const words = (parts: string[]) => parts.map(capitalize).join(' ');

/**
 * Converte o nome da API no rótulo gravado na lista,
 * ex.: `mr-mime-galar` → `Mr. Mime (Galar)`, `meowth-alola` → `Meowth (Alola)`.
 */
export function displayName(name: string): string {
  const special = SPECIAL_CASES[name];
  if (special) return special;

  const parts = name.split('-');

  if (name.startsWith('tauros-paldea')) {
    return `Tauros (Paldea ${words(parts.slice(2))})`;
  }

  if (HYPHENATED_O_LINE.some((base) => name.startsWith(base))) {
    if (name.endsWith('-totem')) {
      return `${capitalize(name.slice(0, -'-totem'.length))} (Totem)`;
    }
    return capitalize(name);
  }

  if (TWO_WORD_PREFIXES.has(parts[0]) && parts.length >= 2) {
    const base = words(parts.slice(0, 2));
    const suffix = parts.slice(2);
    return suffix.length > 0 ? `${base} (${words(suffix)})` : base;
  }

  const base = capitalize(parts[0]);
  if (parts.length === 1) return base;
  return `${base} (${words(parts.slice(1))})`;
}
