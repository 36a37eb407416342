export interface ServiceMetadata {
  readonly title: string;
  readonly description: string;
  readonly version: string;
}

export interface KeyVaultConfig {
  readonly url?: string;
  readonly secretName: string;
  readonly timeoutMs: number;
}

export interface YouTubeApiKeyConfig {
  readonly keyVault: KeyVaultConfig;
  readonly envVar: string;
  readonly settingsFile: string;
  readonly settingsField: string;
}

export interface ServiceConfig {
  readonly host: string;
  readonly port: number;
  readonly publicPathPrefix: string;
  readonly service: ServiceMetadata;
  readonly youtubeApiKey: YouTubeApiKeyConfig;
}

export interface ConfigProvider {
  getServiceConfig(): ServiceConfig;
}

export const SERVICE_METADATA: ServiceMetadata = {
  title: "YouTube Transcript API",
  description: "API to fetch YouTube video transcripts with Azure Key Vault integration",
  version: "1.0.0",
};

const DEFAULT_PORT = 8000;
const DEFAULT_HOST = "0.0.0.0";
const DEFAULT_PUBLIC_PATH_PREFIX = "/yt";
const DEFAULT_KEY_VAULT_TIMEOUT_MS = 10_000;
// setTimeout fires after 1ms for any delay above this.
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

const KEY_VAULT_SECRET_NAME = "YouTubeApiKey";
const API_KEY_ENV_VAR = "YOUTUBE_API_KEY";
const DEFAULT_SETTINGS_FILE = "settings.json";
const SETTINGS_FIELD = "youtube_api_key";

function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function parseTimeout(value: string | undefined, fallback: number): number {
  const parsed = parseNumber(value, fallback);
  return parsed <= MAX_TIMER_DELAY_MS ? parsed : fallback;
}

function parsePort(value: string | undefined, fallback: number): number {
  const parsed = parseNumber(value, fallback);
  return Number.isInteger(parsed) && parsed <= 65_535 ? parsed : fallback;
}

function readString(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

// "/yt/" -> "/yt", "yt" -> "/yt", "/" or "" -> ""
function normalizePathPrefix(value: string | undefined, fallback: string): string {
  if (value === undefined) {
    return fallback;
  }
  const segments = value.split("/").filter(Boolean);
  return segments.length > 0 ? `/${segments.join("/")}` : "";
}

export class ConfigManager implements ConfigProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  getServiceConfig(): ServiceConfig {
    return {
      host: readString(this.env.HOST) ?? DEFAULT_HOST,
      port: parsePort(this.env.PORT, DEFAULT_PORT),
      publicPathPrefix: normalizePathPrefix(this.env.PUBLIC_PATH_PREFIX, DEFAULT_PUBLIC_PATH_PREFIX),
      service: SERVICE_METADATA,
      youtubeApiKey: {
        keyVault: {
          url: readString(this.env.AZURE_KEY_VAULT_URL),
          secretName: KEY_VAULT_SECRET_NAME,
          timeoutMs: parseTimeout(this.env.AZURE_KEY_VAULT_TIMEOUT_MS, DEFAULT_KEY_VAULT_TIMEOUT_MS),
        },
        envVar: API_KEY_ENV_VAR,
        settingsFile: readString(this.env.SETTINGS_FILE) ?? DEFAULT_SETTINGS_FILE,
        settingsField: SETTINGS_FIELD,
      },
    };
  }
}
