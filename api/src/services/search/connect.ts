import { loadEnvironment, type Environment } from "../environment";
import { createLogger } from "../logger";
import type { EntityMetadata } from "./metadata";
import { OpenSearchOperations } from "./opensearch";
import { createSearchRepository, type SearchRepository } from "./repository";

/**
 * Connect a repository to the OpenSearch cluster named by the environment,
 * creating the index and mapping if needed.
 *
 * @example
 * ```typescript
 * const books = await connectSearchRepository(bookEntity);
 * await books.save({ id: "1", title: "Dune" });
 * ```
 */
export async function connectSearchRepository<T extends object>(
  metadata: EntityMetadata<T>,
  environment: Environment = loadEnvironment()
): Promise<SearchRepository<T>> {
  const logger = createLogger(environment.logLevel);
  const operations = new OpenSearchOperations(environment.opensearchUrl, logger);

  return createSearchRepository(metadata, operations, {
    refreshPolicy: environment.refreshPolicy,
    logger,
  });
}
