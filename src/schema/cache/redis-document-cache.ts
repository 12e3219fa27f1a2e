import { DocumentNode, parse, print } from 'graphql';
import { Redis, RedisOptions } from 'ioredis';
import { DocumentCacheError, SchemaBuildError } from '../../errors/errors.js';
import { RedisConfig } from '../../config/config.schema.js';
import { DocumentASTCache, DocumentBuilder } from './document-cache.js';

/**
 * The subset of key value operations the document cache relies on.
 */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  /**
   * Stores the value only if the key does not exist yet. Resolves to false when another writer won.
   */
  setIfAbsent(key: string, value: string): Promise<boolean>;
  delete(key: string): Promise<boolean>;
  /**
   * Closes the connection. Only present on stores that own their connection.
   */
  close?(): Promise<void>;
}

export interface RedisKeyValueStoreOptions {
  /**
   * The store quits the connection when it is closed.
   */
  ownsConnection?: boolean;
}

export function createRedisKeyValueStore(redis: Redis, opts: RedisKeyValueStoreOptions = {}): KeyValueStore {
  const store: KeyValueStore = {
    get: (key) => redis.get(key),
    setIfAbsent: async (key, value) => (await redis.set(key, value, 'NX')) === 'OK',
    delete: async (key) => (await redis.del(key)) > 0,
  };
  if (opts.ownsConnection) {
    store.close = async () => {
      await redis.quit();
    };
  }
  return store;
}

export function createRedisConnection(config: RedisConfig): Redis {
  const options: RedisOptions = {
    host: config.host,
    port: config.port,
    password: config.password,
    connectionName: 'strata-schema-cache',
    lazyConnect: true,
  };
  return new Redis(options);
}

/**
 * Stores the printed schema document. Stored entries are parsed again on read, so every process
 * sharing the store works with an equivalent document.
 */
export class RedisDocumentCache implements DocumentASTCache {
  constructor(private readonly store: KeyValueStore) {}

  async rememberForever(key: string, build: DocumentBuilder): Promise<DocumentNode> {
    const cached = await this.read(key);
    if (cached) {
      return cached;
    }

    const document = await build();

    let stored: boolean;
    try {
      stored = await this.store.setIfAbsent(key, print(document));
    } catch (e) {
      throw new DocumentCacheError(`The schema document could not be written to the cache key "${key}".`, e);
    }
    if (stored) {
      return document;
    }

    // Another process stored a document first. Use it so all processes agree on the schema.
    return (await this.read(key)) ?? document;
  }

  async forget(key: string): Promise<boolean> {
    try {
      return await this.store.delete(key);
    } catch (e) {
      throw new DocumentCacheError(`The cache key "${key}" could not be removed.`, e);
    }
  }

  async close(): Promise<void> {
    try {
      await this.store.close?.();
    } catch (e) {
      throw new DocumentCacheError('The cache connection could not be closed.', e);
    }
  }

  private async read(key: string): Promise<DocumentNode | undefined> {
    let value: string | null;
    try {
      value = await this.store.get(key);
    } catch (e) {
      throw new DocumentCacheError(`The schema document could not be read from the cache key "${key}".`, e);
    }
    if (value === null) {
      return undefined;
    }
    try {
      return parse(value, { noLocation: true });
    } catch (e) {
      throw new SchemaBuildError(`The cached schema document under the key "${key}" could not be parsed.`, e);
    }
  }
}
