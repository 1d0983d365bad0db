/**
 * Output and handler result types shared by the engine and its hosts.
 */

/**
 * Destination for generated text. `process.stdout` and `process.stderr`
 * satisfy it, as do the in-memory sinks in `@cmdbind/sdk/testing`.
 */
export interface OutputSink {
  write(text: string): unknown;
}

/**
 * What a handler may return. A returned Error is reported as the failure of
 * the run; anything else counts as success.
 */
export type HandlerResult = void | Error | null | undefined;
