import { DEFAULT_START_NODE } from "../dsl/constants.ts";
import { describeDestination, parseReference } from "../dsl/destination.ts";
import { ParserError } from "../dsl/errors.ts";
import type {
  DestinationExpression,
  Destination,
  DialogueNode,
  OptionBranch,
  Value,
  ValueMap,
} from "../dsl/types.ts";
import { isTruthy, toDisplayString } from "../dsl/values.ts";
import type { FallbackPolicy, FunctionDispatcher } from "./dispatcher.ts";
import { ResolutionError, RuntimeError, type ScopeError } from "./errors.ts";
import { EngineLogger } from "./logger.ts";
import type { DocumentRegistry } from "./registry.ts";
import { SessionState, type Position, type SessionHooks } from "./session.ts";

export type NavigatorState =
  | "Rendering"
  | "AwaitingInput"
  | "Transferring"
  | "Exited";

/** Everything emitted since the previous call to start() or submitInput(). */
export interface Output {
  segments: string[];
  warnings: string[];
  exited: boolean;
  state: NavigatorState;
  position: Position;
}

export interface NavigatorSnapshot {
  position: Position;
  state: NavigatorState;
  globals: ValueMap;
  locals: ValueMap;
  visitedNodes: string[];
  renderCount: number;
}

export interface NavigatorCallbacks {
  onNodeEnter?: (position: Position) => void;
  onTransition?: (from: Position, to: Position) => void;
  onVariableChange?: SessionHooks["onVariableChange"];
  onWarning?: (message: string, error?: Error) => void;
  onError?: (error: Error) => void;
}

export interface NavigatorOptions {
  startNode?: string; // Default: "start"
  fallback?: {
    /** `file:node` reference. Default: `<entry file>:<start node>` */
    node?: string;
    message?: string;
  };
  repromptMessage?: string;
  maxTransitions?: number; // Default: 100
  callbacks?: NavigatorCallbacks;
  logger?: EngineLogger;
}

export const DEFAULT_FALLBACK_MESSAGE =
  "Something went wrong. Let's go back to the beginning.";
export const DEFAULT_REPROMPT_MESSAGE =
  "Sorry, I didn't understand that. Please try again.";

/**
 * Drives one dialogue session over the documents of a registry. Rendering a
 * node emits its text, runs its calls and then either follows the first
 * firing condition or goto, or waits for input that matches one of its
 * options. Nodes without options treat any submitted line as their input and
 * render again.
 */
export class Navigator {
  private registry: DocumentRegistry;
  private dispatcher: FunctionDispatcher;
  private callbacks?: NavigatorCallbacks;
  private logger: EngineLogger;
  private startNode: string;
  private fallback: FallbackPolicy;
  private repromptMessage: string;
  private maxTransitions: number;

  private session: SessionState | null = null;
  private state: NavigatorState = "Rendering";
  private pendingInput: string | undefined;
  private segments: string[] = [];
  private warnings: string[] = [];
  private visitedNodes: string[] = [];
  private renderCount = 0;

  constructor(
    registry: DocumentRegistry,
    dispatcher: FunctionDispatcher,
    options?: NavigatorOptions,
  ) {
    this.registry = registry;
    this.dispatcher = dispatcher;
    if (options?.callbacks) {
      this.callbacks = options.callbacks;
    }
    this.logger = options?.logger ?? new EngineLogger("navigator");
    this.startNode = options?.startNode ?? DEFAULT_START_NODE;
    this.repromptMessage = options?.repromptMessage ?? DEFAULT_REPROMPT_MESSAGE;
    this.maxTransitions = options?.maxTransitions ?? 100;
    this.fallback = {
      message: options?.fallback?.message ?? DEFAULT_FALLBACK_MESSAGE,
      destination:
        options?.fallback?.node ??
        `${registry.entryFile}:${this.startNode}`,
    };
  }

  get currentState(): NavigatorState {
    return this.state;
  }

  /** Loads the entry file and renders its start node. */
  start(entryFile: string = this.registry.entryFile): Output {
    return this.guard(() => {
      if (entryFile !== this.registry.entryFile) {
        throw new RuntimeError(
          "InvalidEntry",
          `'${entryFile}' is not the entry file of this registry ('${this.registry.entryFile}')`,
        );
      }

      this.session = this.createSession();
      this.visitedNodes = [];
      this.renderCount = 0;
      this.pendingInput = undefined;
      this.logger.log(`Session started in '${entryFile}'`);
      this.proceed({ type: "Node", node: this.startNode });
    });
  }

  /** Matches `line` against the options of the current node. */
  submitInput(line: string): Output {
    return this.guard(() => {
      const session = this.requireSession();
      if (this.state === "Exited") {
        this.logger.warn("Input received after the session exited");
        return;
      }

      const node = this.registry.resolve(
        session.currentFile,
        session.currentNode,
      );
      const options = node.branches.filter(
        (branch): branch is OptionBranch => branch.type === "Option",
      );
      this.pendingInput = line;

      if (options.length === 0) {
        this.proceed({ type: "Node", node: node.name });
        return;
      }

      const normalized = line.trim().toLowerCase();
      const match = options.find((option) =>
        option.keywords.includes(normalized),
      );
      if (!match) {
        this.logger.log(`No option of '${node.name}' matches '${normalized}'`);
        this.segments.push(this.repromptMessage);
        return;
      }

      this.proceed(match.destination);
    });
  }

  getState(): NavigatorSnapshot {
    const session = this.requireSession();
    return {
      position: session.position,
      state: this.state,
      globals: session.global.getAll(),
      locals: session.local.getAll(),
      visitedNodes: [...this.visitedNodes],
      renderCount: this.renderCount,
    };
  }

  setState(snapshot: NavigatorSnapshot): void {
    const session = this.session ?? this.createSession();
    this.registry.resolve(snapshot.position.file, snapshot.position.node);
    session.restore(snapshot.position, snapshot.globals, snapshot.locals);
    this.session = session;
    this.state = snapshot.state;
    this.visitedNodes = [...snapshot.visitedNodes];
    this.renderCount = snapshot.renderCount;
  }

  getVariable(name: string): Value {
    return this.requireSession().get(name);
  }

  getVariables(): { global: ValueMap; local: ValueMap } {
    const session = this.requireSession();
    return { global: session.global.getAll(), local: session.local.getAll() };
  }

  getVisitedNodes(): string[] {
    return [...this.visitedNodes];
  }

  private createSession(): SessionState {
    const entry = this.registry.load(this.registry.entryFile);
    if (!entry.nodes.has(this.startNode)) {
      throw new RuntimeError(
        "InvalidEntry",
        `Start node '${this.startNode}' not found in '${entry.name}'`,
      );
    }
    return new SessionState(
      entry,
      {
        onScopeError: (error) => this.onScopeError(error),
        ...(this.callbacks?.onVariableChange && {
          onVariableChange: this.callbacks.onVariableChange,
        }),
      },
      this.startNode,
    );
  }

  private requireSession(): SessionState {
    if (!this.session) {
      throw new RuntimeError("NotStarted", "The session has not been started");
    }
    return this.session;
  }

  /** Runs one step and collects what it emitted; fatal errors are reported, then rethrown. */
  private guard(step: () => void): Output {
    try {
      step();
    } catch (error) {
      this.segments = [];
      this.warnings = [];
      if (error instanceof Error) {
        this.logger.error(error.message);
        this.callbacks?.onError?.(error);
      }
      throw error;
    }
    return this.flush();
  }

  private flush(): Output {
    const output: Output = {
      segments: this.segments,
      warnings: this.warnings,
      exited: this.state === "Exited",
      state: this.state,
      position: this.session?.position ?? {
        file: this.registry.entryFile,
        node: this.startNode,
      },
    };
    this.segments = [];
    this.warnings = [];
    return output;
  }

  /**
   * Follows `initial` and keeps going while rendered nodes route onwards.
   * Stops when a node waits for input or the session exits.
   */
  private proceed(initial: Destination): void {
    let destination: Destination | null = initial;
    let fallingBack = false;
    let transitions = 0;

    while (destination) {
      transitions++;
      if (transitions > this.maxTransitions) {
        throw new RuntimeError(
          "TransitionLimit",
          `More than ${this.maxTransitions} transitions without waiting for input`,
          this.session?.currentNode,
        );
      }

      let node: DialogueNode | null;
      try {
        node = this.follow(destination);
      } catch (error) {
        if (fallingBack) {
          throw new RuntimeError(
            "FallbackFailed",
            `Fallback destination '${this.fallback.destination}' could not be reached`,
            this.session?.currentNode,
            { cause: error },
          );
        }
        destination = this.recover(error);
        fallingBack = true;
        continue;
      }
      fallingBack = false;

      if (!node) {
        this.state = "Exited";
        this.logger.log("Session exited");
        return;
      }

      try {
        destination = this.render(node);
      } catch (error) {
        destination = this.recover(error);
        fallingBack = true;
      }
    }

    this.state = "AwaitingInput";
  }

  /** Resolves a destination and makes it current. Null means exit. */
  private follow(destination: Destination): DialogueNode | null {
    const session = this.requireSession();

    switch (destination.type) {
      case "Exit":
        return null;
      case "Node":
        return this.enter(session.currentFile, destination.node);
      case "FileTransfer": {
        const file = this.evaluate(destination.file);
        const node = this.evaluate(destination.node);
        this.state = "Transferring";
        return this.enter(file, node);
      }
      case "Dynamic": {
        const reference = toDisplayString(session.get(destination.variable));
        const parsed = parseReference(reference);
        if (!parsed) {
          throw new ResolutionError(
            "UnknownNode",
            `Variable '${destination.variable}' holds '${reference}', which is not a node reference`,
            session.currentFile,
            session.currentNode,
          );
        }
        return this.follow(parsed);
      }
    }
  }

  private evaluate(expression: DestinationExpression): string {
    if (expression.type === "Literal") return expression.value;
    return this.requireSession().interpolate(expression.template).trim();
  }

  private enter(file: string, nodeName: string): DialogueNode {
    const session = this.requireSession();
    const node = this.registry.resolve(file, nodeName);
    const document = this.registry.load(file);
    const from = session.position;

    session.enter(document, node.name);
    this.logger.log(`${from.file}:${from.node} -> ${file}:${node.name}`);
    this.callbacks?.onTransition?.(from, session.position);
    return node;
  }

  /** Emits a node's content and picks the branch that fires without input. */
  private render(node: DialogueNode): Destination | null {
    const session = this.requireSession();
    this.state = "Rendering";
    this.renderCount++;
    this.visitedNodes.push(`${session.currentFile}:${node.name}`);
    this.callbacks?.onNodeEnter?.(session.position);

    // Only the first node rendered after a submitted line sees that line
    const input = this.pendingInput;
    this.pendingInput = undefined;

    for (const element of node.content) {
      if (element.type === "Text") {
        this.segments.push(session.interpolate(element.text));
        continue;
      }

      const outcome = this.dispatcher.dispatch(
        element,
        session,
        input,
        this.fallback,
      );
      if (outcome.status === "failed") {
        this.warn(`Function '${element.name}' failed: ${outcome.reason}`);
      }
    }

    for (const branch of node.branches) {
      if (branch.type === "Goto") {
        return branch.destination;
      }
      if (branch.type === "Condition" && isTruthy(session.get(branch.variable))) {
        this.logger.log(
          `Condition '${branch.variable}' fired: -> ${describeDestination(branch.destination)}`,
        );
        return branch.destination;
      }
    }
    return null;
  }

  /** Applies the fallback policy to a recoverable error. */
  private recover(error: unknown): Destination {
    if (!(error instanceof ResolutionError || error instanceof ParserError)) {
      throw error;
    }

    const destination = parseReference(this.fallback.destination);
    if (!destination) {
      throw new RuntimeError(
        "FallbackFailed",
        `Fallback destination '${this.fallback.destination}' is not a node reference`,
        this.session?.currentNode,
        { cause: error },
      );
    }

    this.warn(error.message, error);
    this.segments.push(this.fallback.message);
    return destination;
  }

  private onScopeError(error: ScopeError): void {
    this.warn(error.message, error);
  }

  private warn(message: string, error?: Error): void {
    this.logger.warn(message);
    this.warnings.push(message);
    this.callbacks?.onWarning?.(message, error);
  }
}
