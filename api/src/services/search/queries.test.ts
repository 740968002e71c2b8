import { describe, expect, it } from "vitest";
import { createPage, emptyPage, hasNextPage } from "./page";
import { isCriteria, matchAllQuery, pageRequest, searchQuery } from "./queries";

describe("queries", () => {
  it("omits an empty sort from page requests", () => {
    expect(pageRequest(0, 5, [])).toEqual({ offset: 0, size: 5 });
    expect(pageRequest(5, 5, [{ field: "year", direction: "asc" }])).toEqual({
      offset: 5,
      size: 5,
      sort: [{ field: "year", direction: "asc" }],
    });
  });

  it("builds search queries with only the parts given", () => {
    expect(searchQuery()).toEqual({});
    expect(searchQuery(matchAllQuery())).toEqual({ criteria: { type: "match_all" } });
  });

  it("tells criteria from search queries", () => {
    expect(isCriteria(matchAllQuery())).toBe(true);
    expect(isCriteria(searchQuery(matchAllQuery()))).toBe(false);
    expect(isCriteria({})).toBe(false);
  });
});

describe("page", () => {
  it("empty page has no next page", () => {
    expect(hasNextPage(emptyPage())).toBe(false);
  });

  it("has a next page while items remain", () => {
    expect(hasNextPage(createPage(["a", "b"], 3, pageRequest(0, 2)))).toBe(true);
    expect(hasNextPage(createPage(["c"], 3, pageRequest(2, 2)))).toBe(false);
  });
});
