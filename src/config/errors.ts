/**
 * Configuration Errors
 */

export enum ConfigErrorCode {
  /** File exists but is not valid YAML */
  CONFIG_PARSE_FAILED = 'CONFIG_PARSE_FAILED',
  /** Parsed, but a value is missing or out of range */
  CONFIG_INVALID = 'CONFIG_INVALID',
}

export class ConfigError extends Error {
  override readonly name = 'ConfigError';

  constructor(
    public readonly code: ConfigErrorCode,
    message: string,
    /** Config file the error came from */
    public readonly path: string | null = null,
    public override readonly cause?: Error
  ) {
    super(message);
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  static parseFailed(path: string, cause?: Error): ConfigError {
    const detail = cause ? `: ${cause.message}` : '';
    return new ConfigError(
      ConfigErrorCode.CONFIG_PARSE_FAILED,
      `Cannot parse config ${path}${detail}`,
      path,
      cause
    );
  }

  static invalid(path: string | null, reason: string): ConfigError {
    return new ConfigError(
      ConfigErrorCode.CONFIG_INVALID,
      `Invalid config${path ? ` ${path}` : ''}: ${reason}`,
      path
    );
  }
}
