import type { YouTubeApiKeyConfig } from "./configManager.js";
import {
  EnvSecretSource,
  KeyVaultSecretSource,
  SettingsFileSecretSource,
  type KeyVaultReaderFactory,
  type SecretProbeResult,
  type SecretSource,
  type SecretSourceKind,
} from "../storage/secretStore.js";
import { describeError, type Logger } from "../telemetry/logger.js";

export type ResolvedSecretSource = SecretSourceKind | "none";

export interface SecretAttempt {
  readonly source: SecretSourceKind;
  readonly outcome: SecretProbeResult["status"];
  readonly reason?: string;
}

export interface SecretResolution {
  readonly value?: string;
  readonly source: ResolvedSecretSource;
  readonly attempts: readonly SecretAttempt[];
}

export interface SecretResolverOptions {
  readonly sources: readonly SecretSource[];
  readonly logger: Logger;
  readonly subject?: string;
  readonly missingNotice?: string;
}

const DEFAULT_SUBJECT = "YouTube API key";
const DEFAULT_MISSING_NOTICE = "No YouTube API key found - transcript API will work without it";

/**
 * Walks the configured sources in order and keeps the first non-empty value.
 * Never rejects: every source failure becomes a warning and the walk moves on.
 * The walk runs once per resolver; later calls share the first result.
 */
export class SecretResolver {
  private resolution?: Promise<SecretResolution>;

  constructor(private readonly options: SecretResolverOptions) {}

  resolve(): Promise<SecretResolution> {
    this.resolution ??= this.walk();
    return this.resolution;
  }

  private async walk(): Promise<SecretResolution> {
    const { sources, logger } = this.options;
    const subject = this.options.subject ?? DEFAULT_SUBJECT;
    const attempts: SecretAttempt[] = [];

    for (const source of sources) {
      const result = await this.probe(source);

      if (result.status === "found") {
        attempts.push({ source: source.kind, outcome: "found" });
        logger.info(`${subject} loaded from ${source.label}`);
        return { value: result.value, source: source.kind, attempts };
      }

      attempts.push({ source: source.kind, outcome: result.status, reason: result.reason });
      if (result.status === "failed") {
        logger.warn(`Failed to load from ${source.label}`, { reason: result.reason });
      }
    }

    logger.info(this.options.missingNotice ?? DEFAULT_MISSING_NOTICE);
    return { value: undefined, source: "none", attempts };
  }

  private async probe(source: SecretSource): Promise<SecretProbeResult> {
    try {
      return await source.probe();
    } catch (error) {
      return { status: "failed", reason: describeError(error) };
    }
  }
}

export interface YouTubeApiKeyResolverOptions {
  readonly config: YouTubeApiKeyConfig;
  readonly logger: Logger;
  readonly env?: NodeJS.ProcessEnv;
  readonly cwd?: string;
  readonly createKeyVaultReader?: KeyVaultReaderFactory;
}

export function createYouTubeApiKeyResolver(options: YouTubeApiKeyResolverOptions): SecretResolver {
  const { config } = options;
  return new SecretResolver({
    logger: options.logger,
    sources: [
      new KeyVaultSecretSource({
        vaultUrl: config.keyVault.url,
        secretName: config.keyVault.secretName,
        timeoutMs: config.keyVault.timeoutMs,
        createReader: options.createKeyVaultReader,
      }),
      new EnvSecretSource(config.envVar, options.env),
      new SettingsFileSecretSource({
        filePath: config.settingsFile,
        field: config.settingsField,
        cwd: options.cwd,
      }),
    ],
  });
}
