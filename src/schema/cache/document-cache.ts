import { DocumentNode } from 'graphql';

export type DocumentBuilder = () => Promise<DocumentNode>;

/**
 * Persistent storage of the built schema document. Entries never expire, they are only removed
 * through `forget`.
 */
export interface DocumentASTCache {
  /**
   * Returns the stored document for the key. When there is none, the builder runs and its result
   * is stored. Concurrent callers must all observe the same stored document.
   */
  rememberForever(key: string, build: DocumentBuilder): Promise<DocumentNode>;
  forget(key: string): Promise<boolean>;
  /**
   * Releases the connections the cache holds.
   */
  close?(): Promise<void>;
}
