import type { ParserError } from "./errors.ts";

export type LineTokenType =
  | "BLANK"
  | "COMMENT" // # comment, or a # Key: value header line
  | "VAR_BLOCK" // $global_vars: { / $local_vars: {
  | "NODE_HEADER" // @name
  | "CALL" // !{fn} : ~{a} ~{b}
  | "BRANCH" // {kw} -> dest, ?{var} -> dest, -> dest
  | "TEXT";

export interface LineToken {
  type: LineTokenType;
  /** The line with surrounding whitespace removed. */
  text: string;
  line: number;
  column: number;
}

export type Value = string | number | boolean | null | Map<string, Value>;
export type ValueMap = Map<string, Value>;

export interface Metadata {
  topic: string;
  description: string;
  author: string;
  version: string;
  required?: string[];
}

export interface DialogueDocument {
  type: "Document";
  name: string;
  metadata: Metadata;
  declaresGlobal: boolean;
  localDefaults: ValueMap;
  globalDefaults: ValueMap;
  nodes: Map<string, DialogueNode>;
}

export interface DialogueNode {
  type: "Node";
  name: string;
  content: ContentElement[];
  branches: Branch[];
  line: number;
  column: number;
}

export type ContentElement = TextElement | CallElement;

export interface TextElement {
  type: "Text";
  text: string;
  line: number;
  column: number;
}

export interface CallElement {
  type: "Call";
  name: string;
  bindings: string[];
  line: number;
  column: number;
}

export type Branch = OptionBranch | ConditionBranch | GotoBranch;

export interface OptionBranch {
  type: "Option";
  keywords: string[];
  destination: Destination;
  line: number;
  column: number;
}

export interface ConditionBranch {
  type: "Condition";
  variable: string;
  destination: Destination;
  line: number;
  column: number;
}

export interface GotoBranch {
  type: "Goto";
  destination: Destination;
  line: number;
  column: number;
}

export type Destination =
  | NodeDestination
  | FileTransferDestination
  | ExitDestination
  | DynamicDestination;

export interface NodeDestination {
  type: "Node";
  node: string;
}

export interface FileTransferDestination {
  type: "FileTransfer";
  file: DestinationExpression;
  node: DestinationExpression;
}

export interface ExitDestination {
  type: "Exit";
}

export interface DynamicDestination {
  type: "Dynamic";
  variable: string;
}

export type DestinationExpression = LiteralExpression | TemplateExpression;

export interface LiteralExpression {
  type: "Literal";
  value: string;
}

export interface TemplateExpression {
  type: "Template";
  template: string;
  variables: string[];
}

export type AnalysisErrorType =
  | "missing_node"
  | "missing_entry_point"
  | "missing_file"
  | "unknown_function";

export type AnalysisWarningType =
  | "unreachable_node"
  | "dead_end"
  | "empty_node"
  | "undefined_variable"
  | "undeclared_dependency"
  | "shadowed_branch"
  | "identical_keyword"
  | "circular_reference";

export interface AnalysisError {
  type: AnalysisErrorType;
  message: string;
  file: string;
  line: number;
  column: number;
  node?: string; // Which node the error is in
  severity: "error";
}

export interface AnalysisWarning {
  type: AnalysisWarningType;
  message: string;
  file: string;
  line: number;
  column: number;
  node?: string; // Which node the warning is in
  severity: "warning";
}

export interface AnalysisSuggestion {
  type: string;
  message: string;
  file: string;
  line: number;
  column: number;
  node?: string;
  severity: "info";
}

export interface AnalysisResult {
  valid: boolean; // true if no errors (warnings are OK)
  errors: AnalysisError[];
  warnings: AnalysisWarning[];
  suggestions: AnalysisSuggestion[];
}

export type Diagnostic = AnalysisError | AnalysisWarning | AnalysisSuggestion;

export const SeverityLevels = ["error", "warning", "info"] as const;
export type SeverityLevel = (typeof SeverityLevels)[number];

export type NodeNetwork = {
  nodes: Set<string>;
  links: { source: string; target: string }[];
};

export interface ParseResult {
  value: DialogueDocument | null;
  errors: ParserError[];
  valid: boolean;
}
