/**
 * Search repository module.
 *
 * Re-exports all search repository components.
 */

export type { SearchOperations } from "./client";
export { connectSearchRepository } from "./connect";
export { toMoreLikeThisDsl, toQueryDsl, toSortDsl } from "./dsl";
export type { QueryDsl } from "./dsl";
export { assertEntityMetadata, defineEntity } from "./metadata";
export type { EntityMetadata, EntityOptions, EntitySchema } from "./metadata";
export { OpenSearchOperations } from "./opensearch";
export { createPage, emptyPage, hasNextPage } from "./page";
export {
  DEFAULT_PAGE,
  boolQuery,
  idsQuery,
  isCriteria,
  matchAllQuery,
  matchQuery,
  pageRequest,
  rangeQuery,
  searchQuery,
  termQuery,
  termsQuery,
} from "./queries";
export { SearchRepository, createSearchRepository } from "./repository";
export type { SearchRepositoryOptions, SimilarityOptions } from "./repository";
export type {
  Criteria,
  DeleteQuery,
  FieldValue,
  GetQuery,
  IndexRequest,
  MoreLikeThisQuery,
  Page,
  PageRequest,
  RefreshPolicy,
  SearchQuery,
  SortDirection,
  SortOrder,
} from "./types";
export {
  BackendError,
  RepositoryError,
  RepositoryErrorType,
  isRepositoryError,
} from "./types";
