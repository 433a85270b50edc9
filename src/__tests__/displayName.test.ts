import { describe, it, expect } from 'vitest';
import { displayName } from '../utils/displayName';

describe('displayName', () => {
  it.each([
    ['pikachu', 'Pikachu'],
    ['meowth-alola', 'Meowth (Alola)'],
    ['darmanitan-galar-standard', 'Darmanitan (Galar Standard)'],
    ['nidoran-f', 'Nidoran♀'],
    ['nidoran-m', 'Nidoran♂'],
    ['mr-mime-galar', 'Mr. Mime (Galar)'],
    ['mime-jr', 'Mime Jr'],
    ['type-null', 'Type: Null'],
    ['ho-oh', 'Ho-Oh'],
    ['porygon-z', 'Porygon-Z'],
  ])('formats %s as %s', (name, expected) => {
    expect(displayName(name)).toBe(expected);
  });

  it('keeps two-word species names together', () => {
    expect(displayName('iron-bundle')).toBe('Iron Bundle');
    expect(displayName('tapu-koko')).toBe('Tapu Koko');
    expect(displayName('great-tusk')).toBe('Great Tusk');
    expect(displayName('chi-yu')).toBe('Chi Yu');
  });

  it('puts the form of a two-word species in parentheses', () => {
    expect(displayName('sandy-shocks-test')).toBe('Sandy Shocks (Test)');
  });

  it('names the Paldean Tauros breeds', () => {
    expect(displayName('tauros-paldea-combat-breed')).toBe('Tauros (Paldea Combat Breed)');
    expect(displayName('tauros-paldea-aqua-breed')).toBe('Tauros (Paldea Aqua Breed)');
  });

  it('keeps the hyphen in the Jangmo-o line', () => {
    expect(displayName('jangmo-o')).toBe('Jangmo-o');
    expect(displayName('hakamo-o')).toBe('Hakamo-o');
    expect(displayName('kommo-o-totem')).toBe('Kommo-o (Totem)');
  });
});
