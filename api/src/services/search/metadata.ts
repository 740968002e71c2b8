/**
 * Entity metadata.
 *
 * Describes how an entity type maps onto the search backend: which index
 * it lives in, how its id and version are read, and which schema turns a
 * stored document back into an entity.
 */

import type { z } from "zod";
import { RepositoryError } from "./types";

/**
 * Schema used as the deserialization target for stored documents.
 */
export type EntitySchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Entity metadata provider consumed by repositories and backends.
 */
export interface EntityMetadata<T extends object> {
  readonly indexName: string;
  /** Mapping type name. OpenSearch 2 only knows "_doc". */
  readonly type: string;
  readonly idAttribute: string;
  readonly versionAttribute: string | null;
  readonly schema: EntitySchema<T>;
  /** Field properties sent on putMapping, if any. */
  readonly mapping: Record<string, unknown> | null;
  /** Index settings sent on index creation, if any. */
  readonly settings: Record<string, unknown> | null;

  getId(entity: T): string | null;
  getVersion(entity: T): number | null;
}

/**
 * Options accepted by {@link defineEntity}.
 */
export interface EntityOptions<T extends object> {
  indexName: string;
  /** Defaults to "_doc". */
  type?: string;
  /** Defaults to "id". */
  idAttribute?: keyof T & string;
  versionAttribute?: keyof T & string;
  schema: EntitySchema<T>;
  mapping?: Record<string, unknown>;
  settings?: Record<string, unknown>;
}

/**
 * OpenSearch index names: lowercase, no leading `_`, `-` or `+`, none of
 * the reserved characters.
 */
const INDEX_NAME_PATTERN = /^[a-z0-9][^A-Z\\\/*?"<>|,# ]*$/;

/**
 * Define the metadata for an entity type.
 *
 * @example
 * ```typescript
 * const bookEntity = defineEntity({
 *   indexName: "books",
 *   schema: z.object({ id: z.string(), title: z.string() }),
 * });
 * ```
 */
export function defineEntity<T extends object>(
  options: EntityOptions<T>
): EntityMetadata<T> {
  const idAttribute: string = options.idAttribute ?? "id";
  const versionAttribute: string | null = options.versionAttribute ?? null;

  const metadata: EntityMetadata<T> = {
    indexName: options.indexName,
    type: options.type ?? "_doc",
    idAttribute,
    versionAttribute,
    schema: options.schema,
    mapping: options.mapping ?? null,
    settings: options.settings ?? null,

    getId(entity: T): string | null {
      const value: unknown = Reflect.get(entity, idAttribute);
      if (value === undefined || value === null) {
        return null;
      }
      if (typeof value === "string") {
        return value;
      }
      if (typeof value === "number" || typeof value === "bigint") {
        return String(value);
      }
      throw RepositoryError.precondition(
        `Id attribute '${idAttribute}' must be a string or a number`,
        { value }
      );
    },

    getVersion(entity: T): number | null {
      if (versionAttribute === null) {
        return null;
      }
      const value: unknown = Reflect.get(entity, versionAttribute);
      return typeof value === "number" && Number.isInteger(value) ? value : null;
    },
  };

  assertEntityMetadata(metadata);
  return metadata;
}

/**
 * Check that metadata can drive a repository.
 *
 * @throws RepositoryError of type Configuration when it cannot
 */
export function assertEntityMetadata<T extends object>(
  metadata: EntityMetadata<T>
): void {
  if (!metadata) {
    throw RepositoryError.configuration(
      "Entity metadata is required to create a repository"
    );
  }
  if (
    typeof metadata.indexName !== "string" ||
    !INDEX_NAME_PATTERN.test(metadata.indexName)
  ) {
    throw RepositoryError.configuration(
      `Invalid index name '${String(metadata.indexName)}'`
    );
  }
  if (!metadata.schema || typeof metadata.schema.parse !== "function") {
    throw RepositoryError.configuration(
      `Entity metadata for index '${metadata.indexName}' has no schema`
    );
  }
  if (typeof metadata.getId !== "function") {
    throw RepositoryError.configuration(
      `Entity metadata for index '${metadata.indexName}' cannot extract ids`
    );
  }
}
