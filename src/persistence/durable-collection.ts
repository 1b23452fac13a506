import { randomUUID } from 'node:crypto';
import { open, readFile, rename, rm } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';

import { InternalServerErrorException, Logger } from '@nestjs/common';
import Joi from 'joi';
import type { ObjectSchema } from 'joi';

import { ErrorCode } from '../common/error-codes';
import { SerialLock } from '../utils/serial-lock';

export const STORE_FORMAT_VERSION = 1;

export type DurableCollectionOptions<T> = {
  name: string;
  filePath: string;
  keyOf: (record: T) => string;
  schema: ObjectSchema<T>;
};

type StoreEnvelope = {
  version: number;
  records: unknown[];
};

const envelopeSchema = Joi.object<StoreEnvelope>({
  version: Joi.number().valid(STORE_FORMAT_VERSION).required(),
  records: Joi.array().required(),
});

/**
 * Raised while loading a store that exists but cannot be trusted. The process must not
 * start serving on top of it.
 */
export class PersistenceLoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceLoadError';
  }
}

/**
 * In-memory keyed collection backed by a single JSON file.
 *
 * Each mutation takes the write lock, is applied to memory, and the whole collection is
 * then written to a temporary file, fsynced and renamed over the store, all before the
 * mutating call resolves. A snapshot therefore holds committed state plus its own change
 * and nothing else. A failed write restores the affected keys and rejects with a
 * `PersistenceFailure`, so callers can treat the mutation as not committed.
 *
 * Records keep insertion order across reloads.
 */
export class DurableCollection<T> {
  private readonly logger: Logger;
  private readonly records = new Map<string, T>();
  private readonly writeLock = new SerialLock();

  constructor(private readonly options: DurableCollectionOptions<T>) {
    this.logger = new Logger(`${DurableCollection.name}:${options.name}`);
  }

  get size(): number {
    return this.records.size;
  }

  get(key: string): T | undefined {
    return this.records.get(key);
  }

  has(key: string): boolean {
    return this.records.has(key);
  }

  values(): T[] {
    return [...this.records.values()];
  }

  find(predicate: (record: T) => boolean): T | undefined {
    for (const record of this.records.values()) {
      if (predicate(record)) {
        return record;
      }
    }
    return undefined;
  }

  async load(): Promise<void> {
    let raw: string;
    try {
      raw = await readFile(this.options.filePath, 'utf-8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        this.records.clear();
        this.logger.log(`No ${this.options.name} store found; starting empty`);
        return;
      }
      throw new PersistenceLoadError(`Unable to read ${this.options.name} store`, {
        cause: error,
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new PersistenceLoadError(`${this.options.name} store is not valid JSON`, {
        cause: error,
      });
    }

    const envelope = envelopeSchema.validate(parsed);
    if (envelope.error) {
      throw new PersistenceLoadError(
        `${this.options.name} store has an invalid layout: ${envelope.error.message}`,
      );
    }

    const loaded = new Map<string, T>();
    envelope.value.records.forEach((candidate, index) => {
      const result = this.options.schema.validate(candidate);
      if (result.error) {
        throw new PersistenceLoadError(
          `${this.options.name} record #${index} is invalid: ${result.error.message}`,
        );
      }

      const key = this.options.keyOf(result.value);
      if (loaded.has(key)) {
        throw new PersistenceLoadError(`${this.options.name} record #${index} repeats a key`);
      }
      loaded.set(key, result.value);
    });

    this.records.clear();
    loaded.forEach((record, key) => this.records.set(key, record));
    this.logger.log(`Loaded ${this.records.size} ${this.options.name} record(s)`);
  }

  async put(record: T): Promise<void> {
    await this.putMany([record]);
  }

  async putMany(records: readonly T[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    await this.commit(() => {
      const previous = new Map<string, T | undefined>();
      for (const record of records) {
        const key = this.options.keyOf(record);
        if (!previous.has(key)) {
          previous.set(key, this.records.get(key));
        }
        this.records.set(key, record);
      }

      return () => {
        previous.forEach((record, key) => {
          if (record === undefined) {
            this.records.delete(key);
          } else {
            this.records.set(key, record);
          }
        });
      };
    });
  }

  async delete(key: string): Promise<boolean> {
    return this.commit(() => {
      const existing = this.records.get(key);
      if (existing === undefined) {
        return null;
      }

      const position = [...this.records.keys()].indexOf(key);
      this.records.delete(key);

      return () => {
        const entries = [...this.records.entries()];
        entries.splice(position, 0, [key, existing]);
        this.records.clear();
        entries.forEach(([entryKey, record]) => this.records.set(entryKey, record));
      };
    });
  }

  /**
   * Apply `mutate` and persist the result under the write lock. `mutate` returns the undo
   * for its change, or `null` when there is nothing to write. Resolves to whether a write
   * happened.
   */
  private async commit(mutate: () => (() => void) | null): Promise<boolean> {
    try {
      return await this.writeLock.runExclusive(async () => {
        const rollback = mutate();
        if (!rollback) {
          return false;
        }

        try {
          await this.writeSnapshot();
        } catch (error) {
          rollback();
          throw error;
        }
        return true;
      });
    } catch (error) {
      this.logger.error(
        `Failed to persist ${this.options.name} store: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw new InternalServerErrorException('State could not be persisted', {
        description: ErrorCode.PersistenceFailure,
        cause: error,
      });
    }
  }

  private async writeSnapshot(): Promise<void> {
    const target = this.options.filePath;
    const tempPath = join(dirname(target), `.${basename(target)}.${process.pid}.${randomUUID()}.tmp`);
    const payload = JSON.stringify(
      { version: STORE_FORMAT_VERSION, records: [...this.records.values()] },
      null,
      2,
    );

    try {
      const handle = await open(tempPath, 'w');
      try {
        await handle.writeFile(payload, 'utf-8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tempPath, target);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
  }
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}
