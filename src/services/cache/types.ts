/**
 * Cache Interface Definitions
 * Defines the contract for result cache providers.
 */

import type { TabularResult } from '../../types/models.js';

export interface ResultCache {
  /**
   * Location of the artifact for a key.
   */
  path(cacheKey: string): string;

  /**
   * Read a cached result.
   */
  get(cacheKey: string): Promise<TabularResult | undefined>;

  /**
   * Store a result, replacing any previous artifact.
   */
  set(cacheKey: string, result: TabularResult): Promise<void>;

  /**
   * Delete one artifact.
   */
  delete(cacheKey: string): Promise<boolean>;

  /**
   * Delete every artifact. Returns the number removed.
   */
  clear(): Promise<number>;

  /**
   * List cached keys.
   */
  keys(): Promise<string[]>;
}
