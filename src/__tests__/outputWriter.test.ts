import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdir, readFile, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { formatListing, writeListing } from '../services/outputWriter';
import { IOError } from '../utils/errors';

const TMP = join(tmpdir(), 'family-dex-output-test-' + Date.now());

beforeAll(async () => {
  await mkdir(TMP, { recursive: true });
});

afterAll(async () => {
  await rm(TMP, { recursive: true, force: true });
});

describe('formatListing', () => {
  it('writes one name per line with a trailing newline', () => {
    expect(formatListing(['Nidoran♀', 'Nidorina'])).toBe('Nidoran♀\nNidorina\n');
    expect(formatListing([])).toBe('');
  });
});

describe('writeListing', () => {
  it('overwrites an existing file', async () => {
    const file = join(TMP, 'listing.txt');
    await writeFile(file, 'stale\ncontent\nfrom\nbefore\n');

    await writeListing(file, ['Bulbasaur', 'Ivysaur']);

    expect(await readFile(file, 'utf-8')).toBe('Bulbasaur\nIvysaur\n');
  });

  it('creates missing directories', async () => {
    const file = join(TMP, 'out', 'deeper', 'listing.txt');

    await writeListing(file, ['Pichu']);

    expect(await readFile(file, 'utf-8')).toBe('Pichu\n');
  });

  it('raises IOError when the target is a directory', async () => {
    await expect(writeListing(TMP, ['Pichu'])).rejects.toBeInstanceOf(IOError);
  });
});
