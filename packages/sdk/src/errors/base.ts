/**
 * Error hierarchy for command resolution, binding and registration.
 */

import { ErrorCode, type ErrorCodeValue } from "./codes.js";

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCodeValue,
    options?: { cause?: Error },
  ) {
    super(message, options);
    this.name = "CliError";
  }
}

export class UnsupportedTypeError extends CliError {
  constructor(public readonly kind: string) {
    super(`unsupported parameter type: ${kind}`, ErrorCode.UNSUPPORTED_TYPE);
    this.name = "UnsupportedTypeError";
  }
}

export class MalformedValueError extends CliError {
  constructor(
    public readonly token: string,
    public readonly kind: string,
  ) {
    super(`invalid ${kind} value: "${token}"`, ErrorCode.MALFORMED_VALUE);
    this.name = "MalformedValueError";
  }
}

export class UnknownCommandError extends CliError {
  constructor(public readonly command: string) {
    super(`unknown command: ${command}`, ErrorCode.UNKNOWN_COMMAND);
    this.name = "UnknownCommandError";
  }
}

export class InsufficientArgsError extends CliError {
  constructor(message: string) {
    super(message, ErrorCode.INSUFFICIENT_ARGS);
    this.name = "InsufficientArgsError";
  }
}

export class ArgCountMismatchError extends CliError {
  constructor(
    public readonly command: string,
    public readonly expected: number,
    public readonly received: number,
  ) {
    super(
      `wrong number of arguments for ${command}: want ${expected}, got ${received}`,
      ErrorCode.ARG_COUNT_MISMATCH,
    );
    this.name = "ArgCountMismatchError";
  }
}

export class MissingOptionValueError extends CliError {
  constructor(public readonly option: string) {
    super(`missing value for ${option}`, ErrorCode.MISSING_OPTION_VALUE);
    this.name = "MissingOptionValueError";
  }
}

export class UnknownOptionError extends CliError {
  constructor(public readonly option: string) {
    super(`unknown option: ${option}`, ErrorCode.UNKNOWN_OPTION);
    this.name = "UnknownOptionError";
  }
}

export class InvalidRegistrationError extends CliError {
  constructor(message: string, options?: { cause?: Error }) {
    super(message, ErrorCode.INVALID_REGISTRATION, options);
    this.name = "InvalidRegistrationError";
  }
}

export class ConfigError extends CliError {
  constructor(message: string, options?: { cause?: Error }) {
    super(message, ErrorCode.CONFIG_ERROR, options);
    this.name = "ConfigError";
  }
}

/**
 * Failure while binding one parameter, field or option value. Keeps the
 * code of the underlying error so callers can branch on it.
 */
export class ArgumentBindingError extends CliError {
  constructor(
    public readonly target: string,
    cause: CliError,
    public readonly command?: string,
  ) {
    const where = command === undefined ? target : `${target} for ${command}`;
    super(`failed to parse ${where}: ${cause.message}`, cause.code, { cause });
    this.name = "ArgumentBindingError";
  }
}
