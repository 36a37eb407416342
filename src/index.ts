export { ConfigManager, SERVICE_METADATA } from "./config/configManager.js";
export type { ConfigProvider, ServiceConfig } from "./config/configManager.js";
export { SecretResolver, createYouTubeApiKeyResolver } from "./config/secretResolver.js";
export type { SecretAttempt, SecretResolution } from "./config/secretResolver.js";
export {
  EnvSecretSource,
  KeyVaultSecretSource,
  SettingsFileSecretSource,
} from "./storage/secretStore.js";
export type { SecretProbeResult, SecretSource, SecretSourceKind } from "./storage/secretStore.js";
export { buildAppContext } from "./runtime/serviceRegistry.js";
export type { AppContext } from "./runtime/serviceRegistry.js";
export { createServer } from "./server.js";
export { ConsoleLogger } from "./telemetry/logger.js";
export type { Logger } from "./telemetry/logger.js";
