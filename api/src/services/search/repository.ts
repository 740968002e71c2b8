/**
 * Generic search repository.
 *
 * Exposes a uniform CRUD and search surface over one entity type and
 * delegates every call to a SearchOperations backend. Writes are followed
 * by an index refresh according to the repository's refresh policy.
 */

import { createLogger, type ServiceLogger } from "../logger";
import type { SearchOperations } from "./client";
import { assertEntityMetadata, type EntityMetadata } from "./metadata";
import { emptyPage } from "./page";
import {
  DEFAULT_PAGE,
  isCriteria,
  matchAllQuery,
  pageRequest,
  searchQuery,
  termsQuery,
} from "./queries";
import {
  RepositoryError,
  type Criteria,
  type IndexRequest,
  type MoreLikeThisQuery,
  type Page,
  type PageRequest,
  type RefreshPolicy,
  type SearchQuery,
  type SortOrder,
} from "./types";

export interface SearchRepositoryOptions {
  /** Default: "immediate". */
  refreshPolicy?: RefreshPolicy;
  logger?: ServiceLogger;
}

/**
 * Tuning for similarity searches.
 */
export type SimilarityOptions = Pick<
  MoreLikeThisQuery,
  "fields" | "minTermFreq" | "minDocFreq"
>;

/**
 * Repository over a single entity type.
 *
 * @example
 * ```typescript
 * class BookRepository extends SearchRepository<Book> {
 *   constructor(operations: SearchOperations) {
 *     super(bookEntity, operations);
 *   }
 *
 *   findByAuthor(author: string) {
 *     return this.search(termQuery("author", author));
 *   }
 * }
 * ```
 */
export class SearchRepository<T extends object> {
  private readonly entityInformation: EntityMetadata<T>;
  private readonly operations: SearchOperations;
  private readonly refreshPolicy: RefreshPolicy;
  private readonly logger: ServiceLogger;
  private refreshPending = false;

  /**
   * @throws RepositoryError of type Configuration if the metadata or the
   * operations are missing or malformed
   */
  constructor(
    metadata: EntityMetadata<T>,
    operations: SearchOperations,
    options: SearchRepositoryOptions = {}
  ) {
    assertEntityMetadata(metadata);
    if (!operations) {
      throw RepositoryError.configuration(
        "Search operations are required to create a repository"
      );
    }

    this.entityInformation = metadata;
    this.operations = operations;
    this.refreshPolicy = options.refreshPolicy ?? "immediate";
    this.logger = options.logger ?? createLogger();
  }

  getEntityMetadata(): EntityMetadata<T> {
    return this.entityInformation;
  }

  getRefreshPolicy(): RefreshPolicy {
    return this.refreshPolicy;
  }

  /**
   * Create the index and apply the entity's mapping.
   */
  async initialize(): Promise<void> {
    await this.operations.createIndex(this.entityInformation);
    await this.operations.putMapping(this.entityInformation);
  }

  /**
   * @returns the entity, or null if no document has this id
   */
  async findOne(id: string): Promise<T | null> {
    await this.flush();
    return this.operations.queryForObject({ id }, this.entityInformation);
  }

  /**
   * Without arguments (or with a sort) every document is returned in a
   * single page sized to the current count. With a page request, only
   * that page is fetched.
   */
  findAll(): Promise<Page<T>>;
  findAll(sort: SortOrder[]): Promise<Page<T>>;
  findAll(page: PageRequest): Promise<Page<T>>;
  async findAll(sortOrPage?: SortOrder[] | PageRequest): Promise<Page<T>> {
    if (sortOrPage === undefined || Array.isArray(sortOrPage)) {
      const itemCount = await this.count();
      if (itemCount === 0) {
        return emptyPage();
      }
      return this.operations.queryForPage(
        searchQuery(matchAllQuery(), pageRequest(0, Math.max(1, itemCount), sortOrPage)),
        this.entityInformation
      );
    }

    await this.flush();
    return this.operations.queryForPage(
      searchQuery(matchAllQuery(), sortOrPage),
      this.entityInformation
    );
  }

  async findAllById(ids: Iterable<string>): Promise<Page<T>> {
    requireValue(ids, "Cannot find entities for 'null' ids.");
    await this.flush();
    return this.operations.queryForPage(
      searchQuery(termsQuery(this.entityInformation.idAttribute, ids)),
      this.entityInformation
    );
  }

  async count(): Promise<number> {
    await this.flush();
    return this.operations.count(searchQuery(), this.entityInformation);
  }

  /**
   * Index one entity.
   *
   * @returns the same instance that was passed in
   */
  async save<S extends T>(entity: S): Promise<S> {
    requireValue(entity, "Cannot save 'null' entity.");
    const request = this.createIndexRequest(entity);
    this.logger.debug("[Repository][save] Indexing document", {
      index: this.entityInformation.indexName,
      id: request.id,
    });

    await this.operations.index(request, this.entityInformation);
    await this.afterWrite();
    return entity;
  }

  /**
   * Alias of {@link save}.
   */
  async index<S extends T>(entity: S): Promise<S> {
    return this.save(entity);
  }

  /**
   * Index a collection of entities with one bulk call.
   *
   * @throws RepositoryError of type InvalidUsage if the input is null, empty,
   * or an iterable that is not an Array or a Set
   */
  async saveAll<S extends T, C extends Iterable<S>>(entities: C): Promise<C> {
    if (entities === null || entities === undefined) {
      throw RepositoryError.invalidUsage("Cannot insert 'null' as a List.");
    }
    if (!Array.isArray(entities) && !(entities instanceof Set)) {
      throw RepositoryError.invalidUsage("Entities have to be inside a collection");
    }

    const items: S[] = [...entities];
    if (items.length === 0) {
      throw RepositoryError.invalidUsage("Cannot insert empty List.");
    }

    this.logger.debug("[Repository][saveAll] Bulk indexing documents", {
      index: this.entityInformation.indexName,
      count: items.length,
    });
    await this.operations.bulkIndex(
      items.map((item) => this.createIndexRequest(item)),
      this.entityInformation
    );
    await this.afterWrite();
    return entities;
  }

  /**
   * Fetches the document; there is no cheaper existence check.
   */
  async exists(id: string): Promise<boolean> {
    return (await this.findOne(id)) !== null;
  }

  /**
   * Search with a predicate, a predicate and a page, or a full query.
   *
   * A predicate without a page returns every match in one page. That page
   * is sized by the count of the whole index, not of the predicate, and
   * the call only short-circuits when the index is empty.
   */
  search(criteria: Criteria): Promise<Page<T>>;
  search(criteria: Criteria, page: PageRequest): Promise<Page<T>>;
  search(query: SearchQuery): Promise<Page<T>>;
  async search(
    criteriaOrQuery: Criteria | SearchQuery,
    page?: PageRequest
  ): Promise<Page<T>> {
    requireValue(criteriaOrQuery, "Cannot search with a 'null' query.");
    await this.flush();

    if (!isCriteria(criteriaOrQuery)) {
      return this.operations.queryForPage(criteriaOrQuery, this.entityInformation);
    }
    if (page) {
      return this.operations.queryForPage(
        searchQuery(criteriaOrQuery, page),
        this.entityInformation
      );
    }

    // TODO: count with the predicate itself once callers no longer rely on
    // the whole-index page size.
    const count = await this.operations.count(searchQuery(), this.entityInformation);
    if (count === 0) {
      return emptyPage();
    }
    return this.operations.queryForPage(
      searchQuery(criteriaOrQuery, pageRequest(0, count)),
      this.entityInformation
    );
  }

  /**
   * Find documents resembling a stored entity. The entity itself is not
   * part of the result.
   */
  async searchSimilar(
    entity: T,
    page: PageRequest = DEFAULT_PAGE,
    options: SimilarityOptions = {}
  ): Promise<Page<T>> {
    requireValue(entity, "Cannot search similar records for 'null'.");
    requireValue(page, "Pageable cannot be 'null'.");
    const id = this.entityInformation.getId(entity);
    requireValue(id, "Cannot search similar records for an entity without an id.");

    await this.flush();
    return this.operations.moreLikeThis({ ...options, id, page }, this.entityInformation);
  }

  /**
   * Delete by id, by entity, or every entity of an iterable one at a time.
   *
   * An iterable that carries the id attribute is deleted as one entity.
   */
  delete(id: string): Promise<void>;
  delete(entity: T): Promise<void>;
  delete(entities: Iterable<T>): Promise<void>;
  async delete(target: string | T | Iterable<T>): Promise<void> {
    requireValue(target, "Cannot delete 'null'.");
    if (typeof target === "string") {
      return this.deleteById(target);
    }
    if (this.isCollection(target)) {
      for (const entity of target) {
        await this.deleteEntity(entity);
      }
      return;
    }
    return this.deleteEntity(target);
  }

  async deleteAll(): Promise<void> {
    this.logger.debug("[Repository][deleteAll] Deleting all documents", {
      index: this.entityInformation.indexName,
    });
    await this.operations.deleteByQuery(
      { criteria: matchAllQuery() },
      this.entityInformation
    );
    await this.afterWrite();
  }

  /**
   * Run the refresh a deferred write left pending, if any.
   */
  async flush(): Promise<void> {
    if (!this.refreshPending) {
      return;
    }
    // cleared first so a write landing during the refresh stays pending
    this.refreshPending = false;
    try {
      await this.refresh();
    } catch (error) {
      this.refreshPending = true;
      throw error;
    }
  }

  private async deleteById(id: string): Promise<void> {
    requireValue(id, "Cannot delete entity with id 'null'.");
    this.logger.debug("[Repository][delete] Deleting document", {
      index: this.entityInformation.indexName,
      id,
    });
    await this.operations.delete(
      this.entityInformation.indexName,
      this.entityInformation.type,
      id
    );
    await this.afterWrite();
  }

  private async deleteEntity(entity: T): Promise<void> {
    requireValue(entity, "Cannot delete 'null' entity.");
    const id = this.entityInformation.getId(entity);
    requireValue(id, "Cannot delete entity with id 'null'.");
    await this.deleteById(id);
    await this.afterWrite();
  }

  private isCollection(target: T | Iterable<T>): target is Iterable<T> {
    if (Array.isArray(target) || target instanceof Set) {
      return true;
    }
    return isIterable(target) && !(this.entityInformation.idAttribute in target);
  }

  private createIndexRequest<S extends T>(entity: S): IndexRequest<T> {
    return {
      id: this.entityInformation.getId(entity),
      version: this.entityInformation.getVersion(entity),
      document: entity,
    };
  }

  private async afterWrite(): Promise<void> {
    switch (this.refreshPolicy) {
      case "immediate":
        await this.refresh();
        return;
      case "deferred":
        this.refreshPending = true;
        return;
      case "none":
        return;
    }
  }

  private async refresh(): Promise<void> {
    this.logger.debug("[Repository][refresh] Refreshing index", {
      index: this.entityInformation.indexName,
    });
    await this.operations.refresh(this.entityInformation.indexName);
  }
}

/**
 * Construct a repository and create its index and mapping.
 */
export async function createSearchRepository<T extends object>(
  metadata: EntityMetadata<T>,
  operations: SearchOperations,
  options: SearchRepositoryOptions = {}
): Promise<SearchRepository<T>> {
  const repository = new SearchRepository(metadata, operations, options);
  await repository.initialize();
  return repository;
}

function requireValue<V>(
  value: V | null | undefined,
  message: string
): asserts value is V {
  if (value === null || value === undefined) {
    throw RepositoryError.precondition(message);
  }
}

function isIterable<E extends object>(value: E | Iterable<E>): value is Iterable<E> {
  return Symbol.iterator in value;
}
