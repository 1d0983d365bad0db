/**
 * App: registers command handlers and runs token sequences against them.
 *
 *   const app = createApp({ exitOnFailure: true });
 *   app.add("add", "Add two numbers", ["int", "int"], (a, b) => {
 *     console.log(a + b);
 *   });
 *   app.run(process.argv.slice(2));
 *
 * `run` never throws for bad input: binding, resolution and handler
 * failures come back as the returned Error.
 */

import { ConfigError, type OutputSink } from "@cmdbind/sdk";
import { createLogger, validateInput, type Logger } from "@cmdbind/shared";
import { bindArguments } from "../binding/invocation.js";
import { renderCommandHelp, renderGlobalHelp } from "../help/help-renderer.js";
import { createCommandRegistry, type CommandRegistry } from "../registry/command-registry.js";
import { defineCommand, type CommandEntry } from "../registry/command.js";
import type { Handler, ParamSpec } from "../schema/params.js";
import { AppOptionsSchema, type AppOptions } from "./options.js";

const HELP_TRIGGERS = new Set(["-h", "--help", "help"]);
const COMMAND_HELP_TRIGGERS = new Set(["-h", "--help"]);

export class App {
  private readonly registry: CommandRegistry = createCommandRegistry();
  private readonly exitOnFailure: boolean;
  private readonly programName: string;
  private readonly out: OutputSink;
  private readonly err: OutputSink;
  private readonly exit: (code: number) => void;
  private readonly argv: () => readonly string[];
  private readonly logger: Logger;

  constructor(options: AppOptions = {}) {
    const result = validateInput(AppOptionsSchema, options);
    if (!result.success || result.data === undefined) {
      throw new ConfigError(`invalid app options: ${result.error ?? "unknown error"}`);
    }
    const config = result.data;
    this.exitOnFailure = config.exitOnFailure;
    this.programName = config.programName;
    this.out = config.out ?? process.stdout;
    this.err = config.err ?? process.stderr;
    this.exit = config.exit ?? ((code) => process.exit(code));
    this.argv = config.argv ?? (() => []);
    this.logger = config.logger ?? createLogger("cmdbind");
    this.logger.setContext({ program: this.programName });
  }

  /**
   * Register a handler under `path`; an empty path registers the root
   * command. Registering the same path again replaces the handler.
   * Throws InvalidRegistrationError for malformed registrations.
   */
  add<const P extends readonly ParamSpec[]>(path: string, params: P, handler: Handler<P>): this;
  add<const P extends readonly ParamSpec[]>(path: string, help: string, params: P, handler: Handler<P>): this;
  add<const P extends readonly ParamSpec[]>(
    path: string,
    ...rest: [P, Handler<P>] | [string, P, Handler<P>]
  ): this {
    const [help, params, handler]: [string | undefined, P, Handler<P>] =
      rest.length === 3 ? rest : [undefined, rest[0], rest[1]];
    this.registry.register(defineCommand(path, params, handler, help));
    return this;
  }

  /** Registered commands other than the root, in registration order. */
  commands(): CommandEntry[] {
    return this.registry.list();
  }

  /**
   * Resolve and run a command. Returns the failure, or undefined when the
   * handler succeeded or help was printed.
   */
  run(tokens: readonly string[] = this.argv()): Error | undefined {
    let failure: Error | undefined;
    try {
      failure = this.dispatch(tokens);
    } catch (err) {
      if (err instanceof Error) {
        failure = err;
      } else {
        this.logger.error("Handler threw a value that is not an Error", { value: String(err) });
        failure = new Error(String(err));
      }
    }
    if (failure) this.fail(failure);
    return failure;
  }

  private dispatch(tokens: readonly string[]): Error | undefined {
    if (tokens.length === 0 || HELP_TRIGGERS.has(tokens[0])) {
      this.printRootHelp();
      return undefined;
    }

    const { entry, consumed } = this.registry.resolve(tokens);
    const name = this.displayName(entry);
    const rest = tokens.slice(consumed);
    const log = this.logger.child(name);
    log.setContext({ command: name });

    if (rest.length > 0 && COMMAND_HELP_TRIGGERS.has(rest[0])) {
      this.out.write(renderCommandHelp(name, entry, entry.path === "" ? this.registry.list() : undefined));
      return undefined;
    }

    const values = bindArguments(name, entry.params, rest);
    log.debug(`Invoking ${name} with ${values.length} argument(s)`);
    const stop = log.time(name);
    try {
      const result: unknown = entry.invoke(values);
      return result instanceof Error ? result : undefined;
    } finally {
      stop();
    }
  }

  private printRootHelp(): void {
    const root = this.registry.root();
    if (root) {
      this.out.write(renderCommandHelp(this.programName, root, this.registry.list()));
    } else {
      this.out.write(renderGlobalHelp(this.registry.list()));
    }
  }

  private displayName(entry: CommandEntry): string {
    return entry.path === "" ? this.programName : entry.path;
  }

  private fail(error: Error): void {
    this.logger.debug(`Run failed: ${error.message}`);
    if (!this.exitOnFailure) return;
    this.err.write(`${error.message}\n`);
    this.exit(1);
  }
}

/** Create an app. Throws ConfigError for invalid options. */
export function createApp(options: AppOptions = {}): App {
  return new App(options);
}
