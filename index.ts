export { Lexer } from "./dsl/lexer.ts";
export { Parser, parse, parseScript } from "./dsl/parser.ts";
export { Analyzer } from "./dsl/analyzer.ts";
export { compileDocument, compileToJson } from "./dsl/compile.ts";
export { ParserError } from "./dsl/errors.ts";
export { parseDestination, parseReference } from "./dsl/destination.ts";
export { EMPTY, isTruthy, toDisplayString, toPlain } from "./dsl/values.ts";
export type * from "./dsl/types.ts";

export { DocumentRegistry, type RegistryOptions } from "./runtime/registry.ts";
export {
  FileSystemSource,
  MemorySource,
  type ScriptSource,
} from "./runtime/sources.ts";
export {
  FunctionDispatcher,
  succeed,
  fail,
  type CallResult,
  type FallbackPolicy,
  type FunctionContext,
  type HostFunction,
} from "./runtime/dispatcher.ts";
export {
  Navigator,
  type NavigatorCallbacks,
  type NavigatorOptions,
  type NavigatorSnapshot,
  type NavigatorState,
  type Output,
} from "./runtime/navigator.ts";
export { SessionState, type Position, type Scope } from "./runtime/session.ts";
export { VariableStore } from "./runtime/variableStore.ts";
export { EngineLogger } from "./runtime/logger.ts";
export { ResolutionError, RuntimeError, ScopeError } from "./runtime/errors.ts";
