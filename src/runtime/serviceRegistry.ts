import { ConfigManager, type ConfigProvider, type ServiceConfig } from "../config/configManager.js";
import { createYouTubeApiKeyResolver, type SecretResolution } from "../config/secretResolver.js";
import type { KeyVaultReaderFactory } from "../storage/secretStore.js";
import { ConsoleLogger, type Logger } from "../telemetry/logger.js";

export interface AppContext {
  readonly config: ServiceConfig;
  readonly youtubeApiKey: SecretResolution;
  readonly logger: Logger;
}

export interface BuildAppContextOptions {
  readonly env?: NodeJS.ProcessEnv;
  readonly cwd?: string;
  readonly configProvider?: ConfigProvider;
  readonly logger?: Logger;
  readonly createKeyVaultReader?: KeyVaultReaderFactory;
}

export async function buildAppContext(options: BuildAppContextOptions = {}): Promise<AppContext> {
  const env = options.env ?? process.env;
  const config = (options.configProvider ?? new ConfigManager(env)).getServiceConfig();
  const logger = options.logger ?? new ConsoleLogger("server");

  const resolver = createYouTubeApiKeyResolver({
    config: config.youtubeApiKey,
    logger: options.logger ?? new ConsoleLogger("config"),
    env,
    cwd: options.cwd,
    createKeyVaultReader: options.createKeyVaultReader,
  });
  const youtubeApiKey = await resolver.resolve();

  return Object.freeze({ config, youtubeApiKey, logger });
}
