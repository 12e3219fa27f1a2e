import { DocumentNode } from 'graphql';
import { lru } from 'tiny-lru';
import { DocumentASTCache, DocumentBuilder } from './document-cache.js';

/**
 * Process wide document cache. A single instance can be shared by several engines, which then
 * build the schema document only once.
 */
export class MemoryDocumentCache implements DocumentASTCache {
  // A ttl of 0 keeps entries until they are evicted or forgotten.
  #cache = lru<DocumentNode>(100, 0);
  #pending = new Map<string, Promise<DocumentNode>>();

  async rememberForever(key: string, build: DocumentBuilder): Promise<DocumentNode> {
    const cached = this.#cache.get(key);
    if (cached) {
      return cached;
    }

    const pending = this.#pending.get(key);
    if (pending) {
      return pending;
    }

    const building = build()
      .then((document) => {
        this.#cache.set(key, document);
        return document;
      })
      .finally(() => {
        this.#pending.delete(key);
      });
    this.#pending.set(key, building);
    return building;
  }

  forget(key: string): Promise<boolean> {
    const existed = this.#cache.has(key);
    this.#cache.delete(key);
    return Promise.resolve(existed);
  }
}
