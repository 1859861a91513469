/** Base class for every failure the tool reports to the operator. */
export class UnitwrightError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'UnitwrightError';
  }
}

/** Bad flag combination, unknown flag, or an invalid service name. */
export class ArgumentError extends UnitwrightError {
  constructor(message: string) {
    super(message);
    this.name = 'ArgumentError';
  }
}

/** An unprivileged process asked for a mode that needs root. */
export class PermissionError extends UnitwrightError {
  constructor(message: string) {
    super(message);
    this.name = 'PermissionError';
  }
}

/** Template missing, malformed, or the default template already exists. */
export class SchemaError extends UnitwrightError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SchemaError';
  }
}

/** A unit file could not be written, removed, or found after writing. */
export class WriteError extends UnitwrightError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'WriteError';
  }
}

/** The service manager does not know the requested unit. */
export class LookupError extends UnitwrightError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'LookupError';
  }
}

/** The service manager itself is missing or unusable. */
export class ServiceManagerError extends UnitwrightError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ServiceManagerError';
  }
}

/** The configuration file could not be read or failed validation. */
export class ConfigError extends UnitwrightError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/** End of input or an interrupt at an interactive prompt. */
export class UserAbortError extends UnitwrightError {
  constructor(message = 'Aborted by user.') {
    super(message);
    this.name = 'UserAbortError';
  }
}
