import type { HttpMethod } from "@/lib/types";

export type SyncErrorCode =
  | "NOT_FOUND"
  | "TRANSPORT"
  | "UNKNOWN_API"
  | "UNSUPPORTED_FAMILY"
  | "EXTENSION_VERSION"
  | "INVALID_PAYLOAD"
  | "CONFIG";

export class SyncError extends Error {
  readonly code: SyncErrorCode;

  constructor(code: SyncErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class NotFoundError extends SyncError {
  readonly apiId: string;
  readonly configName: string;

  constructor(apiId: string, configName: string) {
    super("NOT_FOUND", `404 - no ${apiId} config found with name "${configName}"`);
    this.apiId = apiId;
    this.configName = configName;
  }
}

export interface TransportErrorDetails {
  method?: HttpMethod;
  url?: string;
  status?: number;
  body?: string;
  cause?: unknown;
}

export class TransportError extends SyncError {
  readonly method?: HttpMethod;
  readonly url?: string;
  /** Undefined when no response was received */
  readonly status?: number;
  readonly body?: string;

  constructor(message: string, details: TransportErrorDetails = {}) {
    super("TRANSPORT", message, { cause: details.cause });
    this.method = details.method;
    this.url = details.url;
    this.status = details.status;
    this.body = details.body;
  }
}

export class UnknownApiError extends SyncError {
  constructor(apiId: string, known: string[]) {
    super("UNKNOWN_API", `Unknown API "${apiId}". Available: ${known.join(", ")}`);
  }
}

export class UnsupportedFamilyError extends SyncError {
  constructor(apiId: string, family: string) {
    super("UNSUPPORTED_FAMILY", `API "${apiId}" declares unsupported family "${family}"`);
  }
}

export class ExtensionVersionError extends SyncError {
  readonly deployedVersion: string;
  readonly localVersion: string;

  constructor(name: string, deployedVersion: string, localVersion: string) {
    super(
      "EXTENSION_VERSION",
      `Extension "${name}" is deployed with newer version ${deployedVersion} than ${localVersion}`,
    );
    this.deployedVersion = deployedVersion;
    this.localVersion = localVersion;
  }
}

export class InvalidPayloadError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INVALID_PAYLOAD", message, options);
  }
}

export class ConfigError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG", message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
