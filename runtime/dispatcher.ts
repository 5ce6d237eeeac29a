import { EMPTY } from "../dsl/values.ts";
import type { CallElement, Value } from "../dsl/types.ts";
import { ResolutionError } from "./errors.ts";
import { EngineLogger } from "./logger.ts";
import type { SessionState } from "./session.ts";

/** What a host function sees of the running session. */
export interface FunctionContext {
  readonly currentFile: string;
  readonly currentNode: string;
  /** The submitted line that led to this render, if any. */
  readonly input: string | undefined;
  get(name: string): Value;
  setLocal(name: string, value: Value): void;
  /** Dropped with a warning unless the entry file is current. */
  setGlobal(name: string, value: Value): boolean;
}

export type CallResult =
  | { ok: true; values: Value[] }
  | { ok: false; reason?: string };

export type HostFunction = (
  context: FunctionContext,
  call: CallElement,
) => Value[] | CallResult;

export function succeed(...values: Value[]): CallResult {
  return { ok: true, values };
}

export function fail(reason?: string): CallResult {
  return reason === undefined ? { ok: false } : { ok: false, reason };
}

export interface FallbackPolicy {
  message: string;
  /** Node reference bound on failure, e.g. `main.bdl:start`. */
  destination: string;
}

export type DispatchOutcome =
  | { status: "ok"; values: Value[] }
  | { status: "failed"; reason: string };

export class FunctionDispatcher {
  private functions = new Map<string, HostFunction>();
  private logger: EngineLogger;

  constructor(
    functions: Record<string, HostFunction> = {},
    logger: EngineLogger = new EngineLogger("dispatcher"),
  ) {
    this.logger = logger;
    for (const [name, fn] of Object.entries(functions)) {
      this.register(name, fn);
    }
  }

  register(name: string, fn: HostFunction): this {
    this.functions.set(name, fn);
    return this;
  }

  unregister(name: string): boolean {
    return this.functions.delete(name);
  }

  has(name: string): boolean {
    return this.functions.has(name);
  }

  names(): string[] {
    return Array.from(this.functions.keys());
  }

  /**
   * Runs the call and binds its results as locals. Results are bound in
   * order; missing ones become Empty and extra ones are dropped. A failed
   * call binds the fallback message and destination instead.
   */
  dispatch(
    call: CallElement,
    session: SessionState,
    input: string | undefined,
    fallback: FallbackPolicy,
  ): DispatchOutcome {
    const fn = this.functions.get(call.name);
    if (!fn) {
      throw new ResolutionError(
        "UnknownFunction",
        `Function '${call.name}' is not registered`,
        session.currentFile,
        session.currentNode,
      );
    }

    const outcome = this.invoke(fn, call, session, input);

    if (outcome.status === "failed") {
      this.logger.warn(`'${call.name}' failed: ${outcome.reason}`);
      const [messageBinding, destinationBinding] = call.bindings;
      if (messageBinding) session.setLocal(messageBinding, fallback.message);
      if (destinationBinding) {
        session.setLocal(destinationBinding, fallback.destination);
      }
      return outcome;
    }

    call.bindings.forEach((binding, index) => {
      session.setLocal(binding, outcome.values[index] ?? EMPTY);
    });
    this.logger.log(`'${call.name}' returned ${outcome.values.length} value(s)`);
    return outcome;
  }

  private invoke(
    fn: HostFunction,
    call: CallElement,
    session: SessionState,
    input: string | undefined,
  ): DispatchOutcome {
    const context: FunctionContext = {
      currentFile: session.currentFile,
      currentNode: session.currentNode,
      input,
      get: (name) => session.get(name),
      setLocal: (name, value) => session.setLocal(name, value),
      setGlobal: (name, value) => session.setGlobal(name, value),
    };

    let result: Value[] | CallResult;
    try {
      result = fn(context, call);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return { status: "failed", reason };
    }

    if (Array.isArray(result)) {
      return { status: "ok", values: result };
    }
    if (result.ok) {
      return { status: "ok", values: result.values };
    }
    return { status: "failed", reason: result.reason ?? "no reason given" };
  }
}
