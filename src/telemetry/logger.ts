export interface Logger {
  info(message: string, metadata?: Record<string, unknown>): void;
  warn(message: string, metadata?: Record<string, unknown>): void;
  error(message: string, metadata?: Record<string, unknown>): void;
}

export class ConsoleLogger implements Logger {
  constructor(private readonly scope?: string) {}

  info(message: string, metadata?: Record<string, unknown>): void {
    this.write(console.info, message, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.write(console.warn, message, metadata);
  }

  error(message: string, metadata?: Record<string, unknown>): void {
    this.write(console.error, message, metadata);
  }

  private write(
    sink: (...args: unknown[]) => void,
    message: string,
    metadata?: Record<string, unknown>,
  ): void {
    const line = this.scope ? `[${this.scope}] ${message}` : message;
    if (metadata && Object.keys(metadata).length > 0) {
      sink(line, metadata);
      return;
    }
    sink(line);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
