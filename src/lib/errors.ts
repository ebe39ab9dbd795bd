// src/lib/errors.ts
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class TransportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TransportError";
  }
}

export class HttpStatusError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, bodyExcerpt: string) {
    super(`HTTP ${statusCode}: ${bodyExcerpt}`);
    this.name = "HttpStatusError";
    this.statusCode = statusCode;
  }
}

export class PayloadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PayloadError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
