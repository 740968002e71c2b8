import { beforeEach, describe, expect, it, vi } from "vitest";
import { bookEntity, dune, emma } from "../../test/fixtures";
import type { ServiceLogger } from "../logger";
import { OpenSearchOperations } from "./opensearch";
import { DEFAULT_PAGE, pageRequest, searchQuery, termQuery } from "./queries";
import { BackendError } from "./types";

const client = vi.hoisted(() => ({
  get: vi.fn(),
  search: vi.fn(),
  count: vi.fn(),
  index: vi.fn(),
  bulk: vi.fn(),
  delete: vi.fn(),
  deleteByQuery: vi.fn(),
  indices: {
    exists: vi.fn(),
    create: vi.fn(),
    putMapping: vi.fn(),
    refresh: vi.fn(),
  },
}));

vi.mock("@opensearch-project/opensearch", () => ({
  Client: function Client() {
    return client;
  },
}));

const indexNotFound = {
  statusCode: 404,
  body: {
    error: { type: "index_not_found_exception", reason: "no such index [books]" },
    status: 404,
  },
};

describe("OpenSearchOperations", () => {
  let logger: ServiceLogger;
  let operations: OpenSearchOperations;

  beforeEach(() => {
    vi.resetAllMocks();
    logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    operations = new OpenSearchOperations("http://localhost:9200", logger);
  });

  describe("createIndex", () => {
    it("creates a missing index", async () => {
      client.indices.exists.mockResolvedValueOnce({ statusCode: 404, body: false });
      client.indices.create.mockResolvedValueOnce({
        statusCode: 200,
        body: { acknowledged: true },
      });

      expect(await operations.createIndex(bookEntity)).toBe(true);
      expect(client.indices.exists).toHaveBeenCalledWith({ index: "books" });
      expect(client.indices.create).toHaveBeenCalledWith({ index: "books", body: {} });
      expect(logger.info).toHaveBeenCalledWith(
        "[OpenSearch][createIndex] Created index",
        { index: "books" }
      );
    });

    it("leaves an existing index alone", async () => {
      client.indices.exists.mockResolvedValueOnce({ statusCode: 200, body: true });

      expect(await operations.createIndex(bookEntity)).toBe(false);
      expect(client.indices.create).not.toHaveBeenCalled();
    });
  });

  describe("putMapping", () => {
    it("sends the declared properties", async () => {
      client.indices.putMapping.mockResolvedValueOnce({
        statusCode: 200,
        body: { acknowledged: true },
      });

      expect(await operations.putMapping(bookEntity)).toBe(true);
      expect(client.indices.putMapping).toHaveBeenCalledWith({
        index: "books",
        body: { properties: bookEntity.mapping },
      });
    });
  });

  describe("queryForObject", () => {
    it("parses a found document", async () => {
      client.get.mockResolvedValueOnce({
        statusCode: 200,
        body: { _index: "books", _id: "b1", found: true, _source: dune },
      });

      expect(await operations.queryForObject({ id: "b1" }, bookEntity)).toEqual(dune);
      expect(client.get).toHaveBeenCalledWith(
        { index: "books", id: "b1" },
        { ignore: [404] }
      );
    });

    it("returns null for a missing document", async () => {
      client.get.mockResolvedValueOnce({
        statusCode: 404,
        body: { _index: "books", _id: "b9", found: false },
      });

      expect(await operations.queryForObject({ id: "b9" }, bookEntity)).toBeNull();
    });

    it("rejects when the index does not exist", async () => {
      client.get.mockResolvedValueOnce(indexNotFound);

      const result = operations.queryForObject({ id: "b1" }, bookEntity);

      await expect(result).rejects.toBeInstanceOf(BackendError);
      await expect(result).rejects.toThrow(
        "Get 'b1' from index [books] failed with status 404"
      );
    });
  });

  describe("queryForPage", () => {
    it("sends paging and sorting and parses the hits", async () => {
      client.search.mockResolvedValueOnce({
        statusCode: 200,
        body: {
          hits: {
            total: { value: 12, relation: "eq" },
            hits: [{ _id: "b1", _source: dune }],
          },
        },
      });
      const page = pageRequest(10, 5, [{ field: "year", direction: "desc" }]);

      const result = await operations.queryForPage(
        searchQuery(termQuery("author", "Frank Herbert"), page),
        bookEntity
      );

      expect(client.search).toHaveBeenCalledWith({
        index: "books",
        from: 10,
        size: 5,
        body: {
          query: { term: { author: "Frank Herbert" } },
          sort: [{ year: { order: "desc" } }],
        },
      });
      expect(result).toEqual({ content: [dune], totalElements: 12, offset: 10, size: 5 });
    });

    it("accepts a numeric total and defaults to match-all", async () => {
      client.search.mockResolvedValueOnce({
        statusCode: 200,
        body: { hits: { total: 1, hits: [{ _id: "b3", _source: emma }] } },
      });

      const result = await operations.queryForPage(searchQuery(), bookEntity);

      expect(client.search).toHaveBeenCalledWith({
        index: "books",
        from: 0,
        size: 10,
        body: { query: { match_all: {} } },
      });
      expect(result.totalElements).toBe(1);
      expect(result.content).toEqual([emma]);
    });
  });

  describe("count", () => {
    it("returns the backend count", async () => {
      client.count.mockResolvedValueOnce({ statusCode: 200, body: { count: 3 } });

      expect(await operations.count(searchQuery(), bookEntity)).toBe(3);
      expect(client.count).toHaveBeenCalledWith({
        index: "books",
        body: { query: { match_all: {} } },
      });
    });
  });

  describe("index", () => {
    it("sends the id and an external version", async () => {
      client.index.mockResolvedValueOnce({ statusCode: 201, body: { _id: "b1" } });

      const id = await operations.index({ id: "b1", version: 3, document: dune }, bookEntity);

      expect(id).toBe("b1");
      expect(client.index).toHaveBeenCalledWith({
        index: "books",
        body: dune,
        id: "b1",
        version: 3,
        version_type: "external",
      });
    });

    it("leaves id generation to the backend", async () => {
      client.index.mockResolvedValueOnce({ statusCode: 201, body: { _id: "generated-1" } });

      const id = await operations.index({ id: null, version: null, document: dune }, bookEntity);

      expect(id).toBe("generated-1");
      expect(client.index).toHaveBeenCalledWith({ index: "books", body: dune });
    });
  });

  describe("bulkIndex", () => {
    it("sends one action line per document", async () => {
      client.bulk.mockResolvedValueOnce({
        statusCode: 200,
        body: {
          errors: false,
          items: [
            { index: { _id: "b1", status: 201 } },
            { index: { _id: "b3", status: 201 } },
          ],
        },
      });

      await operations.bulkIndex(
        [
          { id: "b1", version: null, document: dune },
          { id: "b3", version: 2, document: emma },
        ],
        bookEntity
      );

      expect(client.bulk).toHaveBeenCalledWith({
        body: [
          { index: { _index: "books", _id: "b1" } },
          dune,
          { index: { _index: "books", _id: "b3", version: 2, version_type: "external" } },
          emma,
        ],
      });
    });

    it("raises a backend error listing the failed ids", async () => {
      const conflict = { type: "version_conflict_engine_exception" };
      client.bulk.mockResolvedValueOnce({
        statusCode: 200,
        body: {
          errors: true,
          items: [
            { index: { _id: "b1", status: 201 } },
            { index: { _id: "b3", status: 409, error: conflict } },
          ],
        },
      });

      const result = operations.bulkIndex(
        [
          { id: "b1", version: null, document: dune },
          { id: "b3", version: 1, document: emma },
        ],
        bookEntity
      );

      await expect(result).rejects.toThrow("Bulk index failed for ids: b3");
      await expect(result).rejects.toMatchObject({
        details: [{ id: "b3", status: 409, error: conflict }],
      });
      expect(logger.warn).toHaveBeenCalledWith(
        "[OpenSearch][bulkIndex] Bulk index had failures",
        { index: "books", failed: 1 }
      );
    });
  });

  describe("delete", () => {
    it("deletes by index and id", async () => {
      client.delete.mockResolvedValueOnce({ statusCode: 200, body: { result: "deleted" } });

      await operations.delete("books", "_doc", "b1");

      expect(client.delete).toHaveBeenCalledWith(
        { index: "books", id: "b1" },
        { ignore: [404] }
      );
    });

    it("accepts a missing document", async () => {
      client.delete.mockResolvedValueOnce({ statusCode: 404, body: { result: "not_found" } });

      await expect(operations.delete("books", "_doc", "b9")).resolves.toBeUndefined();
    });

    it("rejects when the index does not exist", async () => {
      client.delete.mockResolvedValueOnce(indexNotFound);

      await expect(operations.delete("books", "_doc", "b1")).rejects.toThrow(
        "Delete 'b1' from index [books] failed with status 404"
      );
    });
  });

  describe("deleteByQuery", () => {
    it("sends the translated query", async () => {
      client.deleteByQuery.mockResolvedValueOnce({ statusCode: 200, body: { deleted: 2 } });

      await operations.deleteByQuery({ criteria: termQuery("author", "Jane Austen") }, bookEntity);

      expect(client.deleteByQuery).toHaveBeenCalledWith({
        index: "books",
        body: { query: { term: { author: "Jane Austen" } } },
      });
    });
  });

  describe("moreLikeThis", () => {
    it("searches with the stored document as reference", async () => {
      client.search.mockResolvedValueOnce({
        statusCode: 200,
        body: { hits: { total: { value: 0 }, hits: [] } },
      });

      const result = await operations.moreLikeThis({ id: "b1", page: DEFAULT_PAGE }, bookEntity);

      expect(client.search).toHaveBeenCalledWith({
        index: "books",
        from: 0,
        size: 10,
        body: { query: { more_like_this: { like: [{ _index: "books", _id: "b1" }] } } },
      });
      expect(result).toEqual({ content: [], totalElements: 0, offset: 0, size: 10 });
    });
  });

  describe("refresh", () => {
    it("refreshes the index", async () => {
      client.indices.refresh.mockResolvedValueOnce({ statusCode: 200, body: {} });

      await operations.refresh("books");

      expect(client.indices.refresh).toHaveBeenCalledWith({ index: "books" });
    });
  });
});
