import { HashMap, Logger, LogLevel, Option } from "effect";
import { beforeEach, describe, expect, it } from "vitest";
import { createLogger } from "./logger";

describe("createLogger", () => {
  let records: Array<{ level: string; index: unknown }>;

  const capture = Logger.make(({ logLevel, annotations }) => {
    records.push({
      level: logLevel.label,
      index: Option.getOrUndefined(HashMap.get(annotations, "index")),
    });
  });

  beforeEach(() => {
    records = [];
  });

  it("drops messages below the minimum level", () => {
    const logger = createLogger(LogLevel.Info, capture);

    logger.debug("[Repository][save] Indexing document", { index: "books" });
    logger.info("[OpenSearch][createIndex] Created index", { index: "books" });
    logger.warn("[OpenSearch][bulkIndex] Bulk index had failures", { index: "books" });
    logger.error("[Repository][count] Operation failed", { index: "books" });

    expect(records).toEqual([
      { level: "INFO", index: "books" },
      { level: "WARN", index: "books" },
      { level: "ERROR", index: "books" },
    ]);
  });

  it("writes debug messages at the debug level", () => {
    const logger = createLogger(LogLevel.Debug, capture);

    logger.debug("[Repository][refresh] Refreshing index");

    expect(records).toEqual([{ level: "DEBUG", index: undefined }]);
  });

  it("writes nothing at level None", () => {
    const logger = createLogger(LogLevel.None, capture);

    logger.error("[Repository][count] Operation failed");

    expect(records).toEqual([]);
  });
});
