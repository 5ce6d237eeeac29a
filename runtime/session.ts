import {
  DEFAULT_START_NODE,
  INTERPOLATION_PATTERN,
} from "../dsl/constants.ts";
import { EMPTY, lookupPath, toDisplayString } from "../dsl/values.ts";
import type { DialogueDocument, Value, ValueMap } from "../dsl/types.ts";
import { ScopeError } from "./errors.ts";
import { VariableStore } from "./variableStore.ts";

export type Scope = "global" | "local";

export interface SessionHooks {
  onVariableChange?: (
    scope: Scope,
    name: string,
    oldValue: Value | undefined,
    newValue: Value,
  ) => void;
  onScopeError?: (error: ScopeError) => void;
}

export interface Position {
  file: string;
  node: string;
}

/**
 * Variable scopes and position of one running session. The global store is
 * created once from the entry document; the local store belongs to whichever
 * file is current and is rebuilt from that file's defaults on every switch.
 */
export class SessionState {
  readonly global: VariableStore;
  readonly local: VariableStore;
  readonly entryFile: string;
  currentFile: string;
  currentNode: string;

  constructor(
    entry: DialogueDocument,
    private hooks: SessionHooks = {},
    startNode: string = DEFAULT_START_NODE,
  ) {
    this.entryFile = entry.name;
    this.currentFile = entry.name;
    this.currentNode = startNode;
    this.global = new VariableStore(entry.globalDefaults, (name, old, value) =>
      this.hooks.onVariableChange?.("global", name, old, value),
    );
    this.local = new VariableStore(entry.localDefaults, (name, old, value) =>
      this.hooks.onVariableChange?.("local", name, old, value),
    );
  }

  get position(): Position {
    return { file: this.currentFile, node: this.currentNode };
  }

  /**
   * Local scope first, then global. `a.b` reads key `b` of mapping `a`.
   * Unknown names read as Empty.
   */
  get(name: string): Value {
    const [root = "", ...path] = name.trim().split(".");
    const value = this.local.has(root)
      ? this.local.get(root)
      : this.global.has(root)
        ? this.global.get(root)
        : EMPTY;
    return lookupPath(value, path);
  }

  setLocal(name: string, value: Value): void {
    this.local.set(name, value);
  }

  /** Returns false when the write was dropped because of scope rules. */
  setGlobal(name: string, value: Value): boolean {
    if (this.currentFile !== this.entryFile) {
      this.hooks.onScopeError?.(
        new ScopeError(name, this.currentFile, this.entryFile),
      );
      return false;
    }
    this.global.set(name, value);
    return true;
  }

  interpolate(text: string): string {
    return text.replace(INTERPOLATION_PATTERN, (_match, name: string) =>
      toDisplayString(this.get(name)),
    );
  }

  /** Makes `document` current; locals reset only when the file changes. */
  enter(document: DialogueDocument, node: string): void {
    if (document.name !== this.currentFile) {
      this.currentFile = document.name;
      this.local.reset(document.localDefaults);
    }
    this.currentNode = node;
  }

  restore(position: Position, globals: ValueMap, locals: ValueMap): void {
    this.currentFile = position.file;
    this.currentNode = position.node;
    this.global.reset(globals);
    this.local.reset(locals);
  }
}
