export const FormatErrorCode = {
  EMPTY_FILE: "EMPTY_FILE",
  TRUNCATED_HEADER: "TRUNCATED_HEADER",
  NO_DATA: "NO_DATA",
  TRUNCATED_PAYLOAD: "TRUNCATED_PAYLOAD",
  BYTE_COUNT_MISMATCH: "BYTE_COUNT_MISMATCH",
  UNREADABLE: "UNREADABLE"
} as const;

export type FormatErrorCode = (typeof FormatErrorCode)[keyof typeof FormatErrorCode];

export const NamingErrorCode = {
  UNRECOGNIZED_FILENAME: "UNRECOGNIZED_FILENAME",
  INVALID_TIMESTAMP: "INVALID_TIMESTAMP",
  UNSUPPORTED_KIND: "UNSUPPORTED_KIND"
} as const;

export type NamingErrorCode = (typeof NamingErrorCode)[keyof typeof NamingErrorCode];

export const ConfigErrorCode = {
  READ_FAILED: "READ_FAILED",
  INVALID_CONFIG: "INVALID_CONFIG"
} as const;

export type ConfigErrorCode = (typeof ConfigErrorCode)[keyof typeof ConfigErrorCode];

export class CytoEvtError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = "CytoEvtError";
  }
}

/** Corrupt or truncated event file bytes. Never retried. */
export class FormatError extends CytoEvtError {
  declare readonly code: FormatErrorCode;

  constructor(code: FormatErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(code, message, details);
    this.name = "FormatError";
  }
}

/** A path whose leaf name is not an instrument file name. */
export class NamingError extends CytoEvtError {
  declare readonly code: NamingErrorCode;

  constructor(code: NamingErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(code, message, details);
    this.name = "NamingError";
  }
}

export class ConfigError extends CytoEvtError {
  declare readonly code: ConfigErrorCode;

  constructor(code: ConfigErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(code, message, details);
    this.name = "ConfigError";
  }
}

export function isNamingError(e: unknown): e is NamingError {
  return e instanceof NamingError;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
