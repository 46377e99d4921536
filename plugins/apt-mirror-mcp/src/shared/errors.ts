export enum MirrorErrorCode {
  CONFIGURATION_ERROR = "CONFIGURATION_ERROR",
  DISCOVERY_FAILED = "DISCOVERY_FAILED",
  UNKNOWN_DISTRIBUTOR = "UNKNOWN_DISTRIBUTOR",
  NO_MIRRORS = "NO_MIRRORS",
  SOURCES_LIST_ERROR = "SOURCES_LIST_ERROR",
}

export class MirrorError extends Error {
  readonly code: MirrorErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: MirrorErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "MirrorError";
    this.code = code;
    this.context = context;
  }
}

/** Malformed exclusion pattern, invalid URL, or an invalid config file. */
export class ConfigurationError extends MirrorError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(MirrorErrorCode.CONFIGURATION_ERROR, message, context);
    this.name = "ConfigurationError";
  }
}
