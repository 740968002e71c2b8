import { describe, expect, it } from "vitest";
import { toMoreLikeThisDsl, toQueryDsl, toSortDsl } from "./dsl";
import {
  boolQuery,
  idsQuery,
  matchAllQuery,
  matchQuery,
  pageRequest,
  rangeQuery,
  termQuery,
  termsQuery,
} from "./queries";

describe("toQueryDsl", () => {
  it("translates leaf criteria", () => {
    expect(toQueryDsl(matchAllQuery())).toEqual({ match_all: {} });
    expect(toQueryDsl(idsQuery(["a", "b"]))).toEqual({ ids: { values: ["a", "b"] } });
    expect(toQueryDsl(termQuery("author", "Jane Austen"))).toEqual({
      term: { author: "Jane Austen" },
    });
    expect(toQueryDsl(termsQuery("id", new Set(["b1", "b3"])))).toEqual({
      terms: { id: ["b1", "b3"] },
    });
    expect(toQueryDsl(matchQuery("title", "dune messiah"))).toEqual({
      match: { title: { query: "dune messiah" } },
    });
  });

  it("only sends the range bounds that are set", () => {
    expect(toQueryDsl(rangeQuery("year", { gte: 1900, lt: 2000 }))).toEqual({
      range: { year: { gte: 1900, lt: 2000 } },
    });
  });

  it("translates nested bool clauses and drops empty ones", () => {
    const criteria = boolQuery({
      must: [matchQuery("title", "dune")],
      should: [],
      mustNot: [boolQuery({ filter: [termQuery("author", "Brian Herbert")] })],
    });

    expect(toQueryDsl(criteria)).toEqual({
      bool: {
        must: [{ match: { title: { query: "dune" } } }],
        must_not: [{ bool: { filter: [{ term: { author: "Brian Herbert" } }] } }],
      },
    });
  });
});

describe("toSortDsl", () => {
  it("keeps sort order", () => {
    expect(
      toSortDsl([
        { field: "year", direction: "desc" },
        { field: "title", direction: "asc" },
      ])
    ).toEqual([{ year: { order: "desc" } }, { title: { order: "asc" } }]);
  });
});

describe("toMoreLikeThisDsl", () => {
  it("references the stored document", () => {
    expect(toMoreLikeThisDsl({ id: "b1", page: pageRequest(0, 10) }, "books")).toEqual({
      more_like_this: { like: [{ _index: "books", _id: "b1" }] },
    });
  });

  it("passes fields and frequencies", () => {
    expect(
      toMoreLikeThisDsl(
        {
          id: "b1",
          page: pageRequest(0, 10),
          fields: ["title"],
          minTermFreq: 1,
          minDocFreq: 2,
        },
        "books"
      )
    ).toEqual({
      more_like_this: {
        like: [{ _index: "books", _id: "b1" }],
        fields: ["title"],
        min_term_freq: 1,
        min_doc_freq: 2,
      },
    });
  });
});
