/**
 * Error definitions for bearconf
 * Provides structured error hierarchy for settings resolution and bear discovery
 */

/** Base error class for all bearconf errors */
export class BearconfError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'BearconfError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, BearconfError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Error thrown when configuration is used in a way it cannot support */
export class ConfigError extends BearconfError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** Error thrown when a coafile contains malformed syntax */
export class ConfigParseError extends BearconfError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly line: number
  ) {
    super(`${filePath}:${String(line)}: ${message}`, 'CONFIG_PARSE_ERROR', {
      filePath,
      line,
    })
    this.name = 'ConfigParseError'
  }
}

/** Error thrown when a requested coafile does not exist */
export class CoafileNotFoundError extends BearconfError {
  constructor(public readonly filePath: string) {
    super(`Coafile not found: ${filePath}`, 'COAFILE_NOT_FOUND', { filePath })
    this.name = 'CoafileNotFoundError'
  }
}

/** Error thrown when a setting value cannot be read as the requested type */
export class SettingConversionError extends BearconfError {
  constructor(key: string, value: string, target: string) {
    super(
      `Setting "${key}" with value "${value}" cannot be read as ${target}`,
      'SETTING_CONVERSION_ERROR',
      { key, value, target }
    )
    this.name = 'SettingConversionError'
  }
}

/** Error thrown when a bear manifest exists but cannot be loaded */
export class BearManifestError extends BearconfError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'BEAR_MANIFEST_ERROR', context)
    this.name = 'BearManifestError'
  }
}

/** Error thrown when command-line arguments are malformed */
export class CliUsageError extends BearconfError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CLI_USAGE_ERROR', context)
    this.name = 'CliUsageError'
  }
}
