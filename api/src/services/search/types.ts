/**
 * Search repository types.
 *
 * These types define the contract between a repository and the search
 * backend it delegates to. They are backend-neutral: the OpenSearch
 * implementation translates them into query DSL.
 */

/**
 * Sort direction for a single field.
 */
export type SortDirection = "asc" | "desc";

/**
 * A single sort instruction.
 */
export interface SortOrder {
  field: string;
  direction: SortDirection;
}

/**
 * Offset-based page specification.
 */
export interface PageRequest {
  /** Index of the first item to return. */
  offset: number;
  /** Maximum number of items to return. */
  size: number;
  /** Optional sort applied before paging. */
  sort?: SortOrder[];
}

/**
 * A bounded, ordered slice of a result set with total-count metadata.
 */
export interface Page<T> {
  /** The items of this page, in result order. */
  content: T[];
  /** Total number of matching documents, across all pages. */
  totalElements: number;
  offset: number;
  size: number;
}

export type FieldValue = string | number | boolean;

/**
 * Backend-neutral search predicate.
 */
export type Criteria =
  | { type: "match_all" }
  | { type: "ids"; values: string[] }
  | { type: "term"; field: string; value: FieldValue }
  | { type: "terms"; field: string; values: FieldValue[] }
  | { type: "match"; field: string; text: string }
  | {
      type: "range";
      field: string;
      gt?: number | string;
      gte?: number | string;
      lt?: number | string;
      lte?: number | string;
    }
  | {
      type: "bool";
      must?: Criteria[];
      should?: Criteria[];
      filter?: Criteria[];
      mustNot?: Criteria[];
    };

/**
 * Search request: a predicate plus an optional page.
 * Missing criteria match everything; a missing page means `DEFAULT_PAGE`.
 */
export interface SearchQuery {
  criteria?: Criteria;
  page?: PageRequest;
}

export interface GetQuery {
  id: string;
}

export interface DeleteQuery {
  criteria: Criteria;
}

/**
 * Similarity query keyed on a stored document's id.
 */
export interface MoreLikeThisQuery {
  id: string;
  page: PageRequest;
  /** Fields compared for similarity; all text fields when omitted. */
  fields?: string[];
  minTermFreq?: number;
  minDocFreq?: number;
}

/**
 * A single document write.
 */
export interface IndexRequest<T> {
  /** Document id, or null to let the backend generate one. */
  id: string | null;
  /** External version; null skips optimistic-concurrency checks. */
  version: number | null;
  document: T;
}

/**
 * When writes become visible to subsequent reads.
 *
 * - `immediate`: refresh after every write, before the call resolves
 * - `deferred`: refresh once before the next read
 * - `none`: leave it to the backend's refresh interval
 */
export type RefreshPolicy = "immediate" | "deferred" | "none";

/**
 * Repository error types.
 */
export enum RepositoryErrorType {
  InvalidUsage = "InvalidUsage",
  Configuration = "Configuration",
  Precondition = "Precondition",
}

/**
 * Error raised locally by the repository, before any backend call.
 */
export class RepositoryError extends Error {
  constructor(
    public readonly type: RepositoryErrorType,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = "RepositoryError";
    Object.setPrototypeOf(this, RepositoryError.prototype);
  }

  static invalidUsage(message: string, details?: unknown): RepositoryError {
    return new RepositoryError(RepositoryErrorType.InvalidUsage, message, details);
  }

  static configuration(message: string, details?: unknown): RepositoryError {
    return new RepositoryError(RepositoryErrorType.Configuration, message, details);
  }

  static precondition(message: string, details?: unknown): RepositoryError {
    return new RepositoryError(RepositoryErrorType.Precondition, message, details);
  }
}

/**
 * Type guard to check if a value is a RepositoryError.
 */
export function isRepositoryError(value: unknown): value is RepositoryError {
  return value instanceof RepositoryError;
}

/**
 * Failure reported by the search backend itself.
 */
export class BackendError extends Error {
  readonly _tag = "BackendError";

  constructor(
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = "BackendError";
    Object.setPrototypeOf(this, BackendError.prototype);
  }
}
