/**
 * Search operations interface.
 *
 * This module defines the backend primitives a repository delegates to,
 * allowing for dependency injection of different implementations.
 */

import type { EntityMetadata } from "./metadata";
import type {
  DeleteQuery,
  GetQuery,
  IndexRequest,
  MoreLikeThisQuery,
  Page,
  SearchQuery,
} from "./types";

/**
 * Abstract search backend for dependency injection.
 *
 * Implementations can be swapped for testing or alternative search backends.
 *
 * @example
 * ```typescript
 * // Production
 * const operations = new OpenSearchOperations("http://localhost:9200");
 *
 * // Testing
 * const operations = new InMemorySearchOperations();
 *
 * // Use the same interface
 * const books = new SearchRepository(bookEntity, operations);
 * ```
 */
export interface SearchOperations {
  /**
   * Create the entity's index.
   *
   * @returns false if the index already existed
   */
  createIndex<T extends object>(entity: EntityMetadata<T>): Promise<boolean>;

  /**
   * Apply the entity's declared mapping.
   *
   * @returns false if the entity declares no mapping
   */
  putMapping<T extends object>(entity: EntityMetadata<T>): Promise<boolean>;

  /**
   * Fetch one document by id.
   *
   * @returns the deserialized entity, or null if no such document exists
   */
  queryForObject<T extends object>(
    query: GetQuery,
    entity: EntityMetadata<T>
  ): Promise<T | null>;

  queryForPage<T extends object>(
    query: SearchQuery,
    entity: EntityMetadata<T>
  ): Promise<Page<T>>;

  count<T extends object>(
    query: SearchQuery,
    entity: EntityMetadata<T>
  ): Promise<number>;

  /**
   * Write a single document.
   *
   * @returns the id the document was stored under
   */
  index<T extends object>(
    request: IndexRequest<T>,
    entity: EntityMetadata<T>
  ): Promise<string>;

  /**
   * Write several documents in one backend call.
   *
   * @throws BackendError if any document failed
   */
  bulkIndex<T extends object>(
    requests: IndexRequest<T>[],
    entity: EntityMetadata<T>
  ): Promise<void>;

  /**
   * Delete one document. Deleting a missing id is not an error.
   */
  delete(indexName: string, type: string, id: string): Promise<void>;

  deleteByQuery<T extends object>(
    query: DeleteQuery,
    entity: EntityMetadata<T>
  ): Promise<void>;

  moreLikeThis<T extends object>(
    query: MoreLikeThisQuery,
    entity: EntityMetadata<T>
  ): Promise<Page<T>>;

  /**
   * Make recent writes to the index visible to searches.
   */
  refresh(indexName: string): Promise<void>;
}
