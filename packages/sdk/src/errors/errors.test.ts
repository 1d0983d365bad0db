import { describe, it, expect } from "vitest";
import {
  CliError,
  UnsupportedTypeError,
  MalformedValueError,
  UnknownCommandError,
  ArgCountMismatchError,
  MissingOptionValueError,
  UnknownOptionError,
  InvalidRegistrationError,
  ArgumentBindingError,
  ConfigError,
} from "./base.js";
import { ErrorCode } from "./codes.js";

describe("Error System", () => {
  describe("CliError", () => {
    it("should preserve cause when provided", () => {
      const rootCause = new Error("root cause");
      const err = new CliError("test error", ErrorCode.CONFIG_ERROR, { cause: rootCause });
      expect(err.cause).toBe(rootCause);
      expect(err.code).toBe("CONFIG_ERROR");
      expect(err.message).toBe("test error");
    });

    it("should work without cause", () => {
      const err = new CliError("test error", ErrorCode.UNKNOWN_OPTION);
      expect(err.cause).toBeUndefined();
      expect(err.code).toBe("UNKNOWN_OPTION");
    });
  });

  describe("UnsupportedTypeError", () => {
    it("should name the kind", () => {
      const err = new UnsupportedTypeError("uint8");
      expect(err.name).toBe("UnsupportedTypeError");
      expect(err.code).toBe("UNSUPPORTED_TYPE");
      expect(err.kind).toBe("uint8");
      expect(err.message).toBe("unsupported parameter type: uint8");
    });
  });

  describe("MalformedValueError", () => {
    it("should carry token and kind", () => {
      const err = new MalformedValueError("abc", "int");
      expect(err.token).toBe("abc");
      expect(err.kind).toBe("int");
      expect(err.message).toBe('invalid int value: "abc"');
      expect(err).toBeInstanceOf(CliError);
    });
  });

  describe("UnknownCommandError", () => {
    it("should name the command", () => {
      const err = new UnknownCommandError("deploy");
      expect(err.code).toBe("UNKNOWN_COMMAND");
      expect(err.message).toBe("unknown command: deploy");
    });
  });

  describe("ArgCountMismatchError", () => {
    it("should report expected and received counts", () => {
      const err = new ArgCountMismatchError("echo", 1, 0);
      expect(err.expected).toBe(1);
      expect(err.received).toBe(0);
      expect(err.message).toBe("wrong number of arguments for echo: want 1, got 0");
    });
  });

  describe("option errors", () => {
    it("MissingOptionValueError names the option", () => {
      const err = new MissingOptionValueError("--out");
      expect(err.code).toBe("MISSING_OPTION_VALUE");
      expect(err.message).toBe("missing value for --out");
    });

    it("UnknownOptionError names the option", () => {
      const err = new UnknownOptionError("--bogus");
      expect(err.code).toBe("UNKNOWN_OPTION");
      expect(err.option).toBe("--bogus");
      expect(err.message).toBe("unknown option: --bogus");
    });
  });

  describe("ArgumentBindingError", () => {
    it("should inherit the cause's code and keep the cause", () => {
      const cause = new MalformedValueError("x", "int");
      const err = new ArgumentBindingError("arg 2", cause, "add");
      expect(err.code).toBe("MALFORMED_VALUE");
      expect(err.cause).toBe(cause);
      expect(err.command).toBe("add");
      expect(err.message).toBe('failed to parse arg 2 for add: invalid int value: "x"');
    });

    it("should omit the command when none is given", () => {
      const err = new ArgumentBindingError("value for option --count", new MalformedValueError("x", "int"));
      expect(err.command).toBeUndefined();
      expect(err.message).toBe('failed to parse value for option --count: invalid int value: "x"');
    });
  });

  describe("registration and config errors", () => {
    it("InvalidRegistrationError has its code", () => {
      const err = new InvalidRegistrationError("handler must be a function");
      expect(err.code).toBe("INVALID_REGISTRATION");
      expect(err).toBeInstanceOf(CliError);
    });

    it("ConfigError preserves cause", () => {
      const rootCause = new Error("bad sink");
      const err = new ConfigError("invalid options", { cause: rootCause });
      expect(err.code).toBe("CONFIG_ERROR");
      expect(err.cause).toBe(rootCause);
    });
  });

  describe("ErrorCode constants", () => {
    it("should have correct string values", () => {
      expect(ErrorCode.UNSUPPORTED_TYPE).toBe("UNSUPPORTED_TYPE");
      expect(ErrorCode.MALFORMED_VALUE).toBe("MALFORMED_VALUE");
      expect(ErrorCode.UNKNOWN_COMMAND).toBe("UNKNOWN_COMMAND");
      expect(ErrorCode.INSUFFICIENT_ARGS).toBe("INSUFFICIENT_ARGS");
      expect(ErrorCode.ARG_COUNT_MISMATCH).toBe("ARG_COUNT_MISMATCH");
      expect(ErrorCode.MISSING_OPTION_VALUE).toBe("MISSING_OPTION_VALUE");
      expect(ErrorCode.UNKNOWN_OPTION).toBe("UNKNOWN_OPTION");
      expect(ErrorCode.INVALID_REGISTRATION).toBe("INVALID_REGISTRATION");
      expect(ErrorCode.CONFIG_ERROR).toBe("CONFIG_ERROR");
    });
  });
});
