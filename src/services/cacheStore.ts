import NodeCache from 'node-cache';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { Logger } from '../types';
import { IOError, getErrorMessage } from '../utils/errors';

export interface JsonFileCacheOptions<T> {
  /** Descarta entradas do arquivo que não passam nesta checagem. */
  validate: (value: unknown) => value is T;
  logger?: Logger;
}

/**
 * Cache chave/valor em memória (node-cache, sem TTL) espelhado em um arquivo JSON.
 * Sem expiração e sem proteção contra escritores concorrentes: um processo, uma execução.
 */
export class JsonFileCache<T> {
  private cache = new NodeCache({ stdTTL: 0, checkperiod: 0, useClones: false });
  private readonly validate: (value: unknown) => value is T;
  private readonly logger: Logger;
  private dirty = false;

  constructor(public readonly filePath: string, options: JsonFileCacheOptions<T>) {
    this.validate = options.validate;
    this.logger = options.logger ?? console;
  }

  public async load(): Promise<number> {
    this.cache.flushAll();
    this.dirty = false;

    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return 0;
      }
      throw new IOError(this.filePath, `Could not read cache: ${getErrorMessage(err)}`, { cause: err });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      this.logger.warn(`[Cache] ${this.filePath} is not valid JSON, starting empty`);
      return 0;
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      this.logger.warn(`[Cache] ${this.filePath} is not a JSON object, starting empty`);
      return 0;
    }

    let dropped = 0;
    for (const [key, value] of Object.entries(parsed)) {
      if (this.validate(value)) {
        this.cache.set(key, value);
      } else {
        dropped++;
      }
    }
    if (dropped > 0) {
      this.logger.warn(`[Cache] Dropped ${dropped} malformed entries from ${this.filePath}`);
    }
    return this.cache.keys().length;
  }

  public get(key: string): T | undefined {
    return this.cache.get<T>(key);
  }

  public set(key: string, value: T) {
    this.cache.set(key, value);
    this.dirty = true;
  }

  public keys(): string[] {
    return this.cache.keys().sort();
  }

  public isDirty(): boolean {
    return this.dirty;
  }

  public toJSON(): Record<string, T> {
    const out: Record<string, T> = {};
    for (const key of this.keys()) {
      const value = this.cache.get<T>(key);
      if (value !== undefined) out[key] = value;
    }
    return out;
  }

  /** Grava o mapeamento inteiro; não faz nada se nada mudou desde o load. */
  public async flush(): Promise<boolean> {
    if (!this.isDirty()) return false;
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(this.filePath, JSON.stringify(this.toJSON()), 'utf-8');
    } catch (err) {
      throw new IOError(this.filePath, `Could not write cache: ${getErrorMessage(err)}`, { cause: err });
    }
    this.dirty = false;
    return true;
  }
}
