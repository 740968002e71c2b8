/**
 * Query builders.
 *
 * Small constructors for backend-neutral criteria and page requests.
 */

import type {
  Criteria,
  FieldValue,
  PageRequest,
  SearchQuery,
  SortOrder,
} from "./types";

/**
 * Page used when a query does not specify one.
 */
export const DEFAULT_PAGE: PageRequest = Object.freeze({ offset: 0, size: 10 });

export function matchAllQuery(): Criteria {
  return { type: "match_all" };
}

export function idsQuery(values: Iterable<string>): Criteria {
  return { type: "ids", values: [...values] };
}

export function termQuery(field: string, value: FieldValue): Criteria {
  return { type: "term", field, value };
}

/**
 * Match documents whose `field` is one of `values`.
 */
export function termsQuery(field: string, values: Iterable<FieldValue>): Criteria {
  return { type: "terms", field, values: [...values] };
}

/**
 * Full-text match on a single field.
 */
export function matchQuery(field: string, text: string): Criteria {
  return { type: "match", field, text };
}

export function rangeQuery(
  field: string,
  bounds: {
    gt?: number | string;
    gte?: number | string;
    lt?: number | string;
    lte?: number | string;
  }
): Criteria {
  return { type: "range", field, ...bounds };
}

export function boolQuery(clauses: {
  must?: Criteria[];
  should?: Criteria[];
  filter?: Criteria[];
  mustNot?: Criteria[];
}): Criteria {
  return { type: "bool", ...clauses };
}

export function pageRequest(
  offset: number,
  size: number,
  sort?: SortOrder[]
): PageRequest {
  return sort && sort.length > 0 ? { offset, size, sort } : { offset, size };
}

export function searchQuery(criteria?: Criteria, page?: PageRequest): SearchQuery {
  const query: SearchQuery = {};
  if (criteria) {
    query.criteria = criteria;
  }
  if (page) {
    query.page = page;
  }
  return query;
}

/**
 * Tell a predicate apart from a full search query.
 */
export function isCriteria(value: Criteria | SearchQuery): value is Criteria {
  return "type" in value && typeof value.type === "string";
}
