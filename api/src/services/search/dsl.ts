/**
 * Criteria to OpenSearch query DSL translation.
 */

import type { Criteria, MoreLikeThisQuery, SortOrder } from "./types";

export type QueryDsl = Record<string, unknown>;

/**
 * Translate backend-neutral criteria into an OpenSearch query clause.
 */
export function toQueryDsl(criteria: Criteria): QueryDsl {
  switch (criteria.type) {
    case "match_all":
      return { match_all: {} };

    case "ids":
      return { ids: { values: criteria.values } };

    case "term":
      return { term: { [criteria.field]: criteria.value } };

    case "terms":
      return { terms: { [criteria.field]: criteria.values } };

    case "match":
      return { match: { [criteria.field]: { query: criteria.text } } };

    case "range": {
      const bounds: Record<string, number | string> = {};
      if (criteria.gt !== undefined) bounds.gt = criteria.gt;
      if (criteria.gte !== undefined) bounds.gte = criteria.gte;
      if (criteria.lt !== undefined) bounds.lt = criteria.lt;
      if (criteria.lte !== undefined) bounds.lte = criteria.lte;
      return { range: { [criteria.field]: bounds } };
    }

    case "bool": {
      const bool: Record<string, QueryDsl[]> = {};
      if (criteria.must?.length) bool.must = criteria.must.map(toQueryDsl);
      if (criteria.should?.length) bool.should = criteria.should.map(toQueryDsl);
      if (criteria.filter?.length) bool.filter = criteria.filter.map(toQueryDsl);
      if (criteria.mustNot?.length) {
        bool.must_not = criteria.mustNot.map(toQueryDsl);
      }
      return { bool };
    }
  }
}

/**
 * Translate sort orders into the OpenSearch `sort` array.
 */
export function toSortDsl(sort: SortOrder[]): QueryDsl[] {
  return sort.map((order) => ({ [order.field]: { order: order.direction } }));
}

/**
 * Build a `more_like_this` clause that uses a stored document as its
 * reference. The reference document itself is excluded from the results.
 */
export function toMoreLikeThisDsl(
  query: MoreLikeThisQuery,
  indexName: string
): QueryDsl {
  const clause: QueryDsl = {
    like: [{ _index: indexName, _id: query.id }],
  };
  if (query.fields && query.fields.length > 0) {
    clause.fields = query.fields;
  }
  if (query.minTermFreq !== undefined) {
    clause.min_term_freq = query.minTermFreq;
  }
  if (query.minDocFreq !== undefined) {
    clause.min_doc_freq = query.minDocFreq;
  }
  return { more_like_this: clause };
}
