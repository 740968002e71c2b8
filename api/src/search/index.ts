/**
 * Repository route handler.
 *
 * Provides HTTP endpoints for reading and writing the documents of one
 * search repository.
 */

import { Hono, type Context } from "hono";
import { createLogger, type ServiceLogger } from "../services/logger";
import {
  RepositoryErrorType,
  hasNextPage,
  isRepositoryError,
  pageRequest,
  type Page,
  type SearchRepository,
  type SortDirection,
} from "../services/search";

const DEFAULT_LIMIT = 20;
const MAX_LIMIT = 100;

type ParseResult = { ok: true; value: number } | { ok: false; message: string };

/**
 * Create the repository router with dependency-injected repository.
 *
 * @param repository - The repository to expose
 * @param logger - Logger for failed operations
 * @returns Configured Hono router
 *
 * @example
 * ```typescript
 * import { createRepositoryRouter } from "./src/search";
 * import { connectSearchRepository } from "./src/services/search";
 *
 * const books = await connectSearchRepository(bookEntity);
 * app.route("/books", createRepositoryRouter(books));
 * ```
 */
export function createRepositoryRouter<T extends object>(
  repository: SearchRepository<T>,
  logger: ServiceLogger = createLogger()
) {
  const router = new Hono();
  const entity = repository.getEntityMetadata();

  const failure = (c: Context, operation: string, error: unknown) => {
    const message =
      error instanceof Error ? error.message : "An unexpected error occurred";

    if (
      isRepositoryError(error) &&
      (error.type === RepositoryErrorType.InvalidUsage ||
        error.type === RepositoryErrorType.Precondition)
    ) {
      return c.json({ error: "Invalid request", message }, 400);
    }

    logger.error(`[Repository][${operation}] Operation failed`, {
      index: entity.indexName,
      message,
    });
    return c.json({ error: "Repository operation failed", message }, 500);
  };

  /**
   * GET /
   *
   * List documents.
   *
   * Query Parameters:
   * - limit: Page size (optional, default: 20, max: 100)
   * - offset: Pagination offset (optional, default: 0)
   * - sort: Field to sort by (optional)
   * - order: asc or desc (optional, default: asc)
   *
   * Without limit and offset, every document is returned in one page.
   */
  router.get("/", async (c) => {
    const limitParam = c.req.query("limit");
    const offsetParam = c.req.query("offset");
    const sortField = c.req.query("sort");
    const order = c.req.query("order") ?? "asc";

    if (order !== "asc" && order !== "desc") {
      return c.json(
        {
          error: "Invalid parameter",
          message: `Invalid order '${order}'. Valid values: asc, desc`,
        },
        400
      );
    }
    const direction: SortDirection = order;
    const sort = sortField ? [{ field: sortField, direction }] : undefined;

    try {
      let page: Page<T>;
      if (limitParam !== undefined || offsetParam !== undefined) {
        const limit = parseLimit(limitParam);
        if (!limit.ok) {
          return c.json({ error: "Invalid parameter", message: limit.message }, 400);
        }
        const offset = parseOffset(offsetParam);
        if (!offset.ok) {
          return c.json({ error: "Invalid parameter", message: offset.message }, 400);
        }
        page = await repository.findAll(pageRequest(offset.value, limit.value, sort));
      } else if (sort) {
        page = await repository.findAll(sort);
      } else {
        page = await repository.findAll();
      }

      return c.json(toResponse(page));
    } catch (error) {
      return failure(c, "findAll", error);
    }
  });

  /**
   * GET /count
   *
   * Response:
   * - 200: { count }
   */
  router.get("/count", async (c) => {
    try {
      return c.json({ count: await repository.count() });
    } catch (error) {
      return failure(c, "count", error);
    }
  });

  /**
   * GET /:id
   *
   * Response:
   * - 200: The document
   * - 404: No document with this id
   */
  router.get("/:id", async (c) => {
    const id = c.req.param("id");
    try {
      const found = await repository.findOne(id);
      if (found === null) {
        return c.json({ error: "Not found", message: `No document with id '${id}'` }, 404);
      }
      return c.json(found);
    } catch (error) {
      return failure(c, "findOne", error);
    }
  });

  /**
   * GET /:id/similar
   *
   * Find documents resembling the stored document with this id.
   *
   * Query Parameters:
   * - limit: Page size (optional, default: 20, max: 100)
   * - offset: Pagination offset (optional, default: 0)
   */
  router.get("/:id/similar", async (c) => {
    const id = c.req.param("id");
    const limit = parseLimit(c.req.query("limit"));
    if (!limit.ok) {
      return c.json({ error: "Invalid parameter", message: limit.message }, 400);
    }
    const offset = parseOffset(c.req.query("offset"));
    if (!offset.ok) {
      return c.json({ error: "Invalid parameter", message: offset.message }, 400);
    }

    try {
      const reference = await repository.findOne(id);
      if (reference === null) {
        return c.json({ error: "Not found", message: `No document with id '${id}'` }, 404);
      }
      const page = await repository.searchSimilar(
        reference,
        pageRequest(offset.value, limit.value)
      );
      return c.json(toResponse(page));
    } catch (error) {
      return failure(c, "searchSimilar", error);
    }
  });

  /**
   * POST /
   *
   * Save a document. The body is validated against the entity schema.
   *
   * Response:
   * - 201: The saved document
   * - 400: Body is not a valid entity
   */
  router.post("/", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: "Invalid body", message: "Body must be valid JSON" }, 400);
    }

    const parsed = entity.schema.safeParse(body);
    if (!parsed.success) {
      return c.json(
        {
          error: "Invalid entity",
          issues: parsed.error.issues.map((issue) => ({
            path: issue.path.join("."),
            message: issue.message,
          })),
        },
        400
      );
    }

    try {
      return c.json(await repository.save(parsed.data), 201);
    } catch (error) {
      return failure(c, "save", error);
    }
  });

  /**
   * DELETE /:id
   *
   * Response:
   * - 204: Deleted, or no such document
   */
  router.delete("/:id", async (c) => {
    try {
      await repository.delete(c.req.param("id"));
      return c.body(null, 204);
    } catch (error) {
      return failure(c, "delete", error);
    }
  });

  return router;
}

function toResponse<T>(page: Page<T>) {
  return {
    results: page.content,
    total: page.totalElements,
    offset: page.offset,
    size: page.size,
    hasNext: hasNextPage(page),
  };
}

function parseLimit(param: string | undefined): ParseResult {
  if (!param) {
    return { ok: true, value: DEFAULT_LIMIT };
  }
  const parsed = parseInt(param, 10);
  if (isNaN(parsed) || parsed < 1) {
    return { ok: false, message: "limit must be a positive integer" };
  }
  return { ok: true, value: Math.min(parsed, MAX_LIMIT) };
}

function parseOffset(param: string | undefined): ParseResult {
  if (!param) {
    return { ok: true, value: 0 };
  }
  const parsed = parseInt(param, 10);
  if (isNaN(parsed) || parsed < 0) {
    return { ok: false, message: "offset must be a non-negative integer" };
  }
  return { ok: true, value: parsed };
}
