export type ResolutionErrorKind =
  | "UnknownNode"
  | "UnknownFile"
  | "MissingDependency"
  | "UnknownFunction";

/**
 * A name that could not be resolved: a node, a script file, a required
 * dependency or a host function. The navigator recovers from these through
 * its fallback policy.
 */
export class ResolutionError extends Error {
  constructor(
    public kind: ResolutionErrorKind,
    message: string,
    public file?: string,
    public nodeId?: string,
    options?: { cause?: unknown },
  ) {
    const node = nodeId ? ` in node '${nodeId}'` : "";
    super(`${message}${node}`, options);
    this.name = "ResolutionError";
  }
}

/** A write to a global variable from outside the entry file. Never fatal. */
export class ScopeError extends Error {
  constructor(
    public variable: string,
    public file: string,
    public entryFile: string,
  ) {
    super(
      `Cannot set global variable '${variable}' from '${file}'; globals may only be written while '${entryFile}' is the current file`,
    );
    this.name = "ScopeError";
  }
}

export type RuntimeErrorKind =
  | "NotStarted"
  | "InvalidEntry"
  | "FallbackFailed"
  | "TransitionLimit";

export class RuntimeError extends Error {
  constructor(
    public kind: RuntimeErrorKind,
    message: string,
    public nodeId?: string,
    options?: { cause?: unknown },
  ) {
    const node = nodeId ? ` in node '${nodeId}'` : "";
    super(`${message}${node}`, options);
    this.name = "RuntimeError";
  }
}
