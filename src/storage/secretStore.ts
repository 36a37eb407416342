import fs from "node:fs/promises";
import path from "node:path";

import { DefaultAzureCredential } from "@azure/identity";
import { SecretClient } from "@azure/keyvault-secrets";

import { MAX_TIMER_DELAY_MS } from "../config/configManager.js";
import { describeError } from "../telemetry/logger.js";

export type SecretSourceKind = "key-vault" | "environment" | "local-file";

export type SecretProbeResult =
  | { readonly status: "found"; readonly value: string }
  | { readonly status: "absent"; readonly reason: string }
  | { readonly status: "failed"; readonly reason: string };

export interface SecretSource {
  readonly kind: SecretSourceKind;
  readonly label: string;
  probe(): Promise<SecretProbeResult>;
}

const found = (value: string): SecretProbeResult => ({ status: "found", value });
const absent = (reason: string): SecretProbeResult => ({ status: "absent", reason });
const failed = (reason: string): SecretProbeResult => ({ status: "failed", reason });

function fromValue(value: unknown, missingReason: string): SecretProbeResult {
  return typeof value === "string" && value.length > 0 ? found(value) : absent(missingReason);
}

export interface KeyVaultReader {
  getSecret(name: string, options: { abortSignal: AbortSignal }): Promise<{ value?: string }>;
}

export type KeyVaultReaderFactory = (vaultUrl: string) => KeyVaultReader;

export const createAzureKeyVaultReader: KeyVaultReaderFactory = (vaultUrl) =>
  new SecretClient(vaultUrl, new DefaultAzureCredential());

export interface KeyVaultSecretSourceOptions {
  readonly vaultUrl?: string;
  readonly secretName: string;
  readonly timeoutMs: number;
  readonly createReader?: KeyVaultReaderFactory;
}

export class KeyVaultSecretSource implements SecretSource {
  readonly kind = "key-vault";
  readonly label = "Azure Key Vault";
  private readonly createReader: KeyVaultReaderFactory;

  constructor(private readonly options: KeyVaultSecretSourceOptions) {
    this.createReader = options.createReader ?? createAzureKeyVaultReader;
  }

  async probe(): Promise<SecretProbeResult> {
    const { vaultUrl, secretName, timeoutMs } = this.options;
    if (!vaultUrl) {
      return absent("key vault URL not configured");
    }

    const controller = new AbortController();
    let timeout: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_resolve, reject) => {
      timeout = setTimeout(() => {
        controller.abort();
        reject(new Error(`Key vault request timed out after ${timeoutMs}ms`));
      }, Math.min(timeoutMs, MAX_TIMER_DELAY_MS));
    });

    try {
      const reader = this.createReader(vaultUrl);
      const secret = await Promise.race([
        reader.getSecret(secretName, { abortSignal: controller.signal }),
        deadline,
      ]);
      return fromValue(secret.value, `secret ${secretName} has no value`);
    } catch (error) {
      return failed(describeError(error));
    } finally {
      clearTimeout(timeout);
    }
  }
}

export class EnvSecretSource implements SecretSource {
  readonly kind = "environment";
  readonly label = "environment variable";

  constructor(
    private readonly key: string,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  async probe(): Promise<SecretProbeResult> {
    return fromValue(this.env[this.key], `${this.key} is not set`);
  }
}

export interface SettingsFileSecretSourceOptions {
  readonly filePath: string;
  readonly field: string;
  readonly cwd?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class SettingsFileSecretSource implements SecretSource {
  readonly kind = "local-file";
  readonly label = "local settings file";

  constructor(private readonly options: SettingsFileSecretSourceOptions) {}

  get resolvedPath(): string {
    return path.resolve(this.options.cwd ?? process.cwd(), this.options.filePath);
  }

  async probe(): Promise<SecretProbeResult> {
    const filePath = this.resolvedPath;
    const { field } = this.options;

    let content: string;
    try {
      content = await fs.readFile(filePath, { encoding: "utf8" });
    } catch (error) {
      if (isMissingFile(error)) {
        return absent(`${filePath} does not exist`);
      }
      return failed(describeError(error));
    }

    let settings: unknown;
    try {
      settings = JSON.parse(content);
    } catch (error) {
      return failed(describeError(error));
    }

    if (!isRecord(settings)) {
      return failed(`${filePath} does not contain a JSON object`);
    }
    const value = settings[field];
    if (value !== undefined && value !== null && typeof value !== "string") {
      return failed(`field ${field} must be a string`);
    }
    return fromValue(value, `field ${field} is missing`);
  }
}
