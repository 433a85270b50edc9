import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { IOError, getErrorMessage } from '../utils/errors';

export const formatListing = (names: string[]): string => names.map((name) => `${name}\n`).join('');

/** Grava um nome por linha, substituindo o que houver em `filePath`. */
export async function writeListing(filePath: string, names: string[]): Promise<void> {
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, formatListing(names), 'utf-8');
  } catch (err) {
    throw new IOError(filePath, `Could not write listing: ${getErrorMessage(err)}`, { cause: err });
  }
}
