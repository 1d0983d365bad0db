// Types
export { KINDS, isKind } from "./types/kind.js";
export type { Kind, KindValue, KindValueMap, Primitive } from "./types/kind.js";
export type { OutputSink, HandlerResult } from "./types/output.js";

// Errors
export {
  CliError,
  UnsupportedTypeError,
  MalformedValueError,
  UnknownCommandError,
  InsufficientArgsError,
  ArgCountMismatchError,
  MissingOptionValueError,
  UnknownOptionError,
  InvalidRegistrationError,
  ConfigError,
  ArgumentBindingError,
} from "./errors/base.js";
export { ErrorCode } from "./errors/codes.js";
export type { ErrorCodeValue } from "./errors/codes.js";
