import { describe, it, expect } from "vitest";
import {
  ArgumentBindingError,
  InsufficientArgsError,
  MissingOptionValueError,
  UnknownOptionError,
} from "@cmdbind/sdk";
import { field } from "../schema/field.js";
import { record } from "../schema/record.js";
import { bindRecord } from "./record-binder.js";

const CreateArgs = record({
  input: field.string().arg(0),
  output: field.string().long("--out").short("-o"),
  useMarkdown: field.bool().long("--usemarkdown"),
});

describe("bindRecord", () => {
  it("binds positional, long=value and flag tokens", () => {
    const result = bindRecord(["hello.txt", "--out=out.txt", "--usemarkdown"], CreateArgs);
    expect(result.value).toEqual({ input: "hello.txt", output: "out.txt", useMarkdown: true });
    expect(result.consumed).toBe(3);
  });

  it("takes the next token as the value of a long option", () => {
    const result = bindRecord(["a.txt", "--out", "b.txt"], CreateArgs);
    expect(result.value.output).toBe("b.txt");
    expect(result.consumed).toBe(3);
  });

  it("matches short options exactly", () => {
    const result = bindRecord(["a.txt", "-o", "b.txt"], CreateArgs);
    expect(result.value.output).toBe("b.txt");
  });

  it("accepts a value token that starts with a dash", () => {
    const schema = record({ offset: field.int().short("-n") });
    expect(bindRecord(["-n", "-5"], schema).value.offset).toBe(-5);
  });

  it("fills zero values for unset required fields", () => {
    const schema = record({
      name: field.string(),
      count: field.int(),
      size: field.int64(),
      ratio: field.float64(),
      verbose: field.bool(),
    });
    expect(bindRecord([], schema)).toEqual({
      value: { name: "", count: 0, size: 0n, ratio: 0, verbose: false },
      consumed: 0,
    });
  });

  it("leaves unset optional fields undefined and sets supplied ones", () => {
    const schema = record({
      limit: field.int().optional(),
      label: field.string().optional(),
      force: field.bool().optional(),
    });
    const result = bindRecord(["--limit", "0", "--force"], schema);
    expect(result.value).toEqual({ limit: 0, label: undefined, force: true });
    expect("label" in result.value).toBe(true);
  });

  it("stops at the first plain token and reports consumed tokens", () => {
    const result = bindRecord(["in.txt", "--usemarkdown", "trailing", "--out", "x"], CreateArgs);
    expect(result.consumed).toBe(2);
    expect(result.value.output).toBe("");
  });

  it("treats a lone dash as a plain token", () => {
    const result = bindRecord(["in.txt", "-"], CreateArgs);
    expect(result.consumed).toBe(1);
  });

  it("skips positional gaps without consuming tokens", () => {
    const schema = record({ first: field.string().arg(0), third: field.string().arg(2) });
    const result = bindRecord(["a", "b", "c"], schema);
    expect(result.value).toEqual({ first: "a", third: "b" });
    expect(result.consumed).toBe(2);
  });

  it("fails when a positional token is missing", () => {
    expect(() => bindRecord([], CreateArgs)).toThrow(InsufficientArgsError);
    expect(() => bindRecord([], CreateArgs)).toThrow("not enough positional args for record: need position 0");
  });

  it("fails on an unknown long option", () => {
    expect(() => bindRecord(["a", "--bogus"], CreateArgs)).toThrow(UnknownOptionError);
    expect(() => bindRecord(["a", "--bogus"], CreateArgs)).toThrow("unknown option: --bogus");
  });

  it("fails on an unknown long option given with =", () => {
    expect(() => bindRecord(["a", "--bogus=1"], CreateArgs)).toThrow("unknown option: --bogus");
  });

  it("fails on an unknown short option", () => {
    expect(() => bindRecord(["a", "-x"], CreateArgs)).toThrow("unknown option: -x");
  });

  it("fails when an option has no value", () => {
    expect(() => bindRecord(["a", "--out"], CreateArgs)).toThrow(MissingOptionValueError);
    expect(() => bindRecord(["a", "-o"], CreateArgs)).toThrow("missing value for -o");
  });

  it("coerces --flag=value as a bool", () => {
    expect(bindRecord(["a", "--usemarkdown=false"], CreateArgs).value.useMarkdown).toBe(false);
  });

  it("reports malformed values with the option name", () => {
    const schema = record({ count: field.int() });
    try {
      bindRecord(["--count", "many"], schema);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ArgumentBindingError);
      if (err instanceof ArgumentBindingError) {
        expect(err.code).toBe("MALFORMED_VALUE");
        expect(err.message).toBe('failed to parse value for option --count: invalid int value: "many"');
      }
    }
  });

  it("reports malformed positional values with their index", () => {
    const schema = record({ count: field.int().arg(0) });
    expect(() => bindRecord(["x"], schema)).toThrow(
      'failed to parse positional arg at position 0: invalid int value: "x"',
    );
  });

  it("binds a positional field by its explicit long name as well", () => {
    const schema = record({ input: field.string().arg(0).long("--input") });
    const result = bindRecord(["a", "--input", "b"], schema);
    expect(result.value.input).toBe("b");
    expect(result.consumed).toBe(3);
  });

  it("binds int64 and float64 options", () => {
    const schema = record({ size: field.int64(), ratio: field.float64().short("-r") });
    const result = bindRecord(["--size=9007199254740993", "-r", "2.5"], schema);
    expect(result.value).toEqual({ size: 9007199254740993n, ratio: 2.5 });
  });
});
