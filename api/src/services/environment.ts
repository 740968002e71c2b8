import { Config, ConfigProvider, Effect, Either, LogLevel } from "effect";
import { RepositoryError, type RefreshPolicy } from "./search/types";

export interface Environment {
  opensearchUrl: string;
  refreshPolicy: RefreshPolicy;
  logLevel: LogLevel.LogLevel;
}

export const EnvironmentConfig: Config.Config<Environment> = Config.all({
  opensearchUrl: Config.string("OPENSEARCH_URL").pipe(
    Config.withDefault("http://localhost:9200")
  ),
  refreshPolicy: Config.literal("immediate", "deferred", "none")(
    "OPENSEARCH_REFRESH_POLICY"
  ).pipe(Config.withDefault("immediate")),
  logLevel: Config.logLevel("LOG_LEVEL").pipe(Config.withDefault(LogLevel.Info)),
});

/**
 * Read the environment, from process.env unless another provider is given.
 *
 * @throws RepositoryError of type Configuration on invalid values
 */
export function loadEnvironment(
  provider: ConfigProvider.ConfigProvider = ConfigProvider.fromEnv()
): Environment {
  const result = Effect.runSync(
    Effect.either(Effect.withConfigProvider(EnvironmentConfig, provider))
  );

  if (Either.isLeft(result)) {
    throw RepositoryError.configuration(
      `Environment configuration validation failed: ${String(result.left)}`,
      result.left
    );
  }
  return result.right;
}
