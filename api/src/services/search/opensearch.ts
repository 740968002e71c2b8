/**
 * OpenSearch operations implementation.
 *
 * This module provides the concrete implementation of the SearchOperations
 * interface using OpenSearch as the backend.
 */

import { Client } from "@opensearch-project/opensearch";
import { z } from "zod";
import { createLogger, type ServiceLogger } from "../logger";
import type { SearchOperations } from "./client";
import { toMoreLikeThisDsl, toQueryDsl, toSortDsl, type QueryDsl } from "./dsl";
import type { EntityMetadata } from "./metadata";
import { createPage } from "./page";
import { DEFAULT_PAGE, matchAllQuery } from "./queries";
import {
  BackendError,
  type DeleteQuery,
  type GetQuery,
  type IndexRequest,
  type MoreLikeThisQuery,
  type Page,
  type PageRequest,
  type SearchQuery,
} from "./types";

const searchResponseSchema = z.object({
  hits: z.object({
    // OpenSearch 1.x reports a number, 2.x an object
    total: z.union([z.number(), z.object({ value: z.number() })]),
    hits: z.array(z.object({ _id: z.string(), _source: z.unknown() })),
  }),
});

// A 404 is a missing document only when the body is a document response;
// a missing index answers 404 with an error body instead.
const getResponseSchema = z.object({
  found: z.boolean(),
  _source: z.unknown().optional(),
});

const deleteResponseSchema = z.object({ result: z.string() });

const countResponseSchema = z.object({ count: z.number() });

const indexResponseSchema = z.object({ _id: z.string() });

const bulkResponseSchema = z.object({
  errors: z.boolean(),
  items: z.array(
    z.record(
      z.object({
        _id: z.string().nullish(),
        status: z.number(),
        error: z.unknown().optional(),
      })
    )
  ),
});

/**
 * OpenSearch operations implementation.
 *
 * @example
 * ```typescript
 * const operations = new OpenSearchOperations("http://localhost:9200");
 * const books = await createSearchRepository(bookEntity, operations);
 * ```
 */
export class OpenSearchOperations implements SearchOperations {
  private client: Client;
  private logger: ServiceLogger;

  /**
   * Create new OpenSearch operations.
   *
   * @param client - The OpenSearch server URL, or a configured client
   * @param logger - Logger for index and bulk events
   */
  constructor(client: Client | string, logger: ServiceLogger = createLogger()) {
    this.client = typeof client === "string" ? new Client({ node: client }) : client;
    this.logger = logger;
  }

  async createIndex<T extends object>(entity: EntityMetadata<T>): Promise<boolean> {
    const exists = await this.client.indices.exists({ index: entity.indexName });
    if (exists.body) {
      return false;
    }

    await this.client.indices.create({
      index: entity.indexName,
      body: entity.settings ? { settings: entity.settings } : {},
    });
    this.logger.info("[OpenSearch][createIndex] Created index", {
      index: entity.indexName,
    });
    return true;
  }

  async putMapping<T extends object>(entity: EntityMetadata<T>): Promise<boolean> {
    if (!entity.mapping) {
      return false;
    }

    await this.client.indices.putMapping({
      index: entity.indexName,
      body: { properties: entity.mapping },
    });
    return true;
  }

  async queryForObject<T extends object>(
    query: GetQuery,
    entity: EntityMetadata<T>
  ): Promise<T | null> {
    const response = await this.client.get(
      { index: entity.indexName, id: query.id },
      { ignore: [404] }
    );

    const document = getResponseSchema.safeParse(response.body);
    if (!document.success) {
      throw new BackendError(
        `Get '${query.id}' from index [${entity.indexName}] failed with status ${response.statusCode}`,
        response.body
      );
    }
    if (!document.data.found) {
      return null;
    }
    return entity.schema.parse(document.data._source);
  }

  async queryForPage<T extends object>(
    query: SearchQuery,
    entity: EntityMetadata<T>
  ): Promise<Page<T>> {
    return this.searchPage(
      { query: toQueryDsl(query.criteria ?? matchAllQuery()) },
      query.page ?? DEFAULT_PAGE,
      entity
    );
  }

  async count<T extends object>(
    query: SearchQuery,
    entity: EntityMetadata<T>
  ): Promise<number> {
    const response = await this.client.count({
      index: entity.indexName,
      body: { query: toQueryDsl(query.criteria ?? matchAllQuery()) },
    });
    return countResponseSchema.parse(response.body).count;
  }

  async index<T extends object>(
    request: IndexRequest<T>,
    entity: EntityMetadata<T>
  ): Promise<string> {
    const response = await this.client.index({
      index: entity.indexName,
      body: request.document,
      ...(request.id !== null ? { id: request.id } : {}),
      ...(request.version !== null
        ? { version: request.version, version_type: "external" as const }
        : {}),
    });
    return indexResponseSchema.parse(response.body)._id;
  }

  async bulkIndex<T extends object>(
    requests: IndexRequest<T>[],
    entity: EntityMetadata<T>
  ): Promise<void> {
    const body = requests.flatMap((request) => [
      {
        index: {
          _index: entity.indexName,
          ...(request.id !== null ? { _id: request.id } : {}),
          ...(request.version !== null
            ? { version: request.version, version_type: "external" }
            : {}),
        },
      },
      request.document,
    ]);

    const response = await this.client.bulk({ body });
    const result = bulkResponseSchema.parse(response.body);
    if (!result.errors) {
      return;
    }

    const failures = result.items
      .flatMap((item) => Object.values(item))
      .filter((item) => item.error !== undefined)
      .map((item) => ({ id: item._id ?? null, status: item.status, error: item.error }));

    this.logger.warn("[OpenSearch][bulkIndex] Bulk index had failures", {
      index: entity.indexName,
      failed: failures.length,
    });
    throw new BackendError(
      `Bulk index failed for ids: ${failures.map((failure) => failure.id).join(", ")}`,
      failures
    );
  }

  async delete(indexName: string, type: string, id: string): Promise<void> {
    this.logger.debug("[OpenSearch][delete] Deleting document", {
      index: indexName,
      type,
      id,
    });
    const response = await this.client.delete({ index: indexName, id }, { ignore: [404] });
    if (!deleteResponseSchema.safeParse(response.body).success) {
      throw new BackendError(
        `Delete '${id}' from index [${indexName}] failed with status ${response.statusCode}`,
        response.body
      );
    }
  }

  async deleteByQuery<T extends object>(
    query: DeleteQuery,
    entity: EntityMetadata<T>
  ): Promise<void> {
    await this.client.deleteByQuery({
      index: entity.indexName,
      body: { query: toQueryDsl(query.criteria) },
    });
  }

  async moreLikeThis<T extends object>(
    query: MoreLikeThisQuery,
    entity: EntityMetadata<T>
  ): Promise<Page<T>> {
    return this.searchPage(
      { query: toMoreLikeThisDsl(query, entity.indexName) },
      query.page,
      entity
    );
  }

  async refresh(indexName: string): Promise<void> {
    await this.client.indices.refresh({ index: indexName });
  }

  /**
   * Run a search body with paging and sorting, and deserialize the hits.
   */
  private async searchPage<T extends object>(
    body: QueryDsl,
    page: PageRequest,
    entity: EntityMetadata<T>
  ): Promise<Page<T>> {
    const response = await this.client.search({
      index: entity.indexName,
      from: page.offset,
      size: page.size,
      body: page.sort && page.sort.length > 0
        ? { ...body, sort: toSortDsl(page.sort) }
        : body,
    });

    const result = searchResponseSchema.parse(response.body);
    const content = result.hits.hits.map((hit) => entity.schema.parse(hit._source));
    const total =
      typeof result.hits.total === "number"
        ? result.hits.total
        : result.hits.total.value;

    return createPage(content, total, page);
  }
}
