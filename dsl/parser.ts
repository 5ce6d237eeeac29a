import {
  ARROW,
  NAME_PATTERN,
  SCRIPT_EXTENSION,
  isMetadataKey,
  type MetadataKey,
  requiredMetadataKeys,
  varBlockScopes,
} from "./constants.ts";
import { DeclarationReader } from "./declarations.ts";
import { describeDestination, parseDestination } from "./destination.ts";
import { ParserError, type ParseErrorKind } from "./errors.ts";
import { Lexer } from "./lexer.ts";
import type {
  Branch,
  CallElement,
  ContentElement,
  Destination,
  DialogueDocument,
  DialogueNode,
  LineToken,
  Metadata,
  NodeNetwork,
  ParseResult,
  ValueMap,
} from "./types.ts";

const CALL_PATTERN = /^!\{\s*([^}]*?)\s*\}\s*(.*)$/;
const BINDING_PATTERN = /~\{\s*([A-Za-z0-9_]+)\s*\}/g;
const CONDITION_PATTERN = /^\?\{\s*([A-Za-z0-9_.]+)\s*\}\s*->(.*)$/;

export interface ParserOptions {
  file: string;
  isEntry: boolean;
}

export class Parser {
  private tokens: LineToken[];
  private position = 0;
  private sourceLines: string[];
  private errors: ParserError[] = [];

  private headerOpen = true;
  private metadata: Partial<Record<MetadataKey, string>> = {};
  private required: string[] | undefined;
  private localDefaults: ValueMap = new Map();
  private globalDefaults: ValueMap = new Map();
  private nodes = new Map<string, DialogueNode>();

  constructor(
    tokens: Iterable<LineToken>,
    source: string,
    private options: ParserOptions,
  ) {
    this.tokens = Array.from(tokens);
    this.sourceLines = source.split(/\r?\n|\r/);
  }

  public parse(): ParseResult {
    while (!this.isAtEnd()) {
      try {
        this.parseTopLevel();
      } catch (e) {
        if (e instanceof ParserError) {
          this.errors.push(e);
          this.synchronize();
        } else {
          throw e;
        }
      }
    }

    const metadata = this.finishMetadata();
    const errors = [...this.errors].sort((a, b) => a.line - b.line);
    const valid = errors.length === 0 && metadata !== null;

    return {
      value:
        valid && metadata
          ? {
              type: "Document",
              name: this.options.file,
              metadata,
              declaresGlobal: this.options.isEntry,
              localDefaults: this.localDefaults,
              globalDefaults: this.globalDefaults,
              nodes: this.nodes,
            }
          : null,
      errors,
      valid,
    };
  }

  static getNodeNetwork(document: DialogueDocument): NodeNetwork {
    const nodes = new Set<string>();
    const links: { source: string; target: string }[] = [];

    for (const node of document.nodes.values()) {
      nodes.add(node.name);
      for (const branch of node.branches) {
        const target = Parser.staticTarget(branch.destination);
        if (target) {
          links.push({ source: node.name, target });
        }
      }
    }

    return { nodes, links };
  }

  /** Target known without running the script, or null for computed ones. */
  static staticTarget(destination: Destination): string | null {
    switch (destination.type) {
      case "Node":
        return destination.node;
      case "FileTransfer":
        return destination.file.type === "Literal" &&
          destination.node.type === "Literal"
          ? describeDestination(destination)
          : null;
      default:
        return null;
    }
  }

  private parseTopLevel(): void {
    const token = this.peek();
    switch (token.type) {
      case "BLANK":
        this.advance();
        break;
      case "COMMENT":
        if (this.headerOpen) {
          this.parseMetadataLine(token);
        }
        this.advance();
        break;
      case "VAR_BLOCK":
        this.headerOpen = false;
        this.parseVarBlock();
        break;
      case "NODE_HEADER":
        this.headerOpen = false;
        this.parseNode();
        break;
      default:
        // Stray lines outside any node carry no meaning.
        this.headerOpen = false;
        this.advance();
    }
  }

  private parseMetadataLine(token: LineToken): void {
    const body = token.text.replace(/^#+/, "").trim();
    const colon = body.indexOf(":");
    if (colon === -1) return;

    const key = body.slice(0, colon).trim().toLowerCase();
    const value = body.slice(colon + 1).trim();
    if (!isMetadataKey(key)) return;

    if (key === "required") {
      this.required = this.parseRequired(value, token);
      return;
    }
    this.metadata[key] = value;
  }

  private parseRequired(value: string, token: LineToken): string[] {
    const files = value
      .split(",")
      .map((file) => file.trim())
      .filter((file) => file.length > 0);

    const seen = new Set<string>();
    for (const file of files) {
      if (!file.endsWith(SCRIPT_EXTENSION)) {
        this.error(
          "InvalidDependency",
          `Required file '${file}' must have the ${SCRIPT_EXTENSION} extension`,
          token,
        );
      }
      if (seen.has(file)) {
        this.error(
          "InvalidDependency",
          `Required file '${file}' is listed more than once`,
          token,
        );
      }
      seen.add(file);
    }
    return files;
  }

  private finishMetadata(): Metadata | null {
    const missing = requiredMetadataKeys.filter(
      (key) => this.metadata[key] === undefined,
    );
    const { topic, description, author, version } = this.metadata;

    if (
      missing.length > 0 ||
      topic === undefined ||
      description === undefined ||
      author === undefined ||
      version === undefined
    ) {
      const names = missing.map(
        (key) => key.charAt(0).toUpperCase() + key.slice(1),
      );
      this.errors.push(
        new ParserError(
          "MissingMetadata",
          `Missing required metadata: ${names.join(", ")}`,
          this.options.file,
          1,
          1,
        ),
      );
      return null;
    }

    const metadata: Metadata = { topic, description, author, version };
    if (this.required) {
      metadata.required = this.required;
    }
    return metadata;
  }

  private parseVarBlock(): void {
    const token = this.peek();
    const colon = token.text.indexOf(":");
    const scope = varBlockScopes.get(token.text.slice(0, colon).trim());

    if (scope === "global" && !this.options.isEntry) {
      this.error(
        "GlobalOutsideEntry",
        `$global_vars may only be declared in the entry file, not in '${this.options.file}'`,
        token,
      );
    }

    const opening: LineToken = {
      ...token,
      text: token.text.slice(colon + 1),
      column: token.column + colon + 1,
    };
    const reader = new DeclarationReader(
      [opening, ...this.tokens.slice(this.position + 1)],
      (kind, message, line, column) => this.fail(kind, message, line, column),
    );
    const { values, consumed } = reader.read();

    const target = scope === "global" ? this.globalDefaults : this.localDefaults;
    for (const [name, value] of values) {
      if (target.has(name)) {
        this.error(
          "DuplicateVariable",
          `Variable '${name}' is already declared in ${scope} scope`,
          token,
        );
      }
      target.set(name, value);
    }

    this.position += consumed;
  }

  private parseNode(): void {
    const header = this.advance();
    const name = header.text.slice(1).trim();

    if (!NAME_PATTERN.test(name)) {
      this.error(
        "InvalidNodeName",
        `Invalid node name '${name}'. Node names may only contain letters, digits and '_'`,
        header,
      );
    }
    if (this.nodes.has(name)) {
      const original = this.nodes.get(name);
      this.error(
        "DuplicateNode",
        `Duplicate node definition for '${name}'. It was first defined on line ${original?.line}.`,
        header,
      );
    }

    const content: ContentElement[] = [];
    const branches: Branch[] = [];
    let textLines: LineToken[] = [];

    const flushText = () => {
      const first = textLines[0];
      if (first) {
        content.push({
          type: "Text",
          text: textLines.map((line) => line.text).join("\n"),
          line: first.line,
          column: first.column,
        });
      }
      textLines = [];
    };

    while (!this.isAtEnd() && !this.expect("NODE_HEADER")) {
      const token = this.peek();

      switch (token.type) {
        case "BLANK":
        case "COMMENT":
          this.advance();
          break;
        case "VAR_BLOCK":
          this.parseVarBlock();
          break;
        case "TEXT":
          textLines.push(this.advance());
          break;
        case "CALL":
        case "BRANCH":
          flushText();
          this.advance();
          try {
            if (token.type === "CALL") {
              content.push(this.parseCall(token));
            } else {
              branches.push(this.parseBranch(token));
            }
          } catch (e) {
            if (e instanceof ParserError) {
              // Keep going so one pass reports every bad line in the node.
              this.errors.push(e);
            } else {
              throw e;
            }
          }
          break;
      }
    }
    flushText();

    this.nodes.set(name, {
      type: "Node",
      name,
      content,
      branches,
      line: header.line,
      column: header.column,
    });
  }

  private parseCall(token: LineToken): CallElement {
    const match = CALL_PATTERN.exec(token.text);
    const name = match?.[1] ?? "";
    const rest = match?.[2] ?? "";

    if (!NAME_PATTERN.test(name)) {
      this.error(
        "MalformedCall",
        `Invalid function name '${name}' in call`,
        token,
      );
    }
    if (!rest.startsWith(":")) {
      this.error(
        "MalformedCall",
        `Expected ':' followed by at least one ~{binding} after !{${name}}`,
        token,
      );
    }

    const bindingText = rest.slice(1);
    const bindings = Array.from(
      bindingText.matchAll(BINDING_PATTERN),
      (m) => m[1] ?? "",
    );
    const leftover = bindingText.replace(BINDING_PATTERN, "").trim();

    if (bindings.length === 0) {
      this.error(
        "MalformedCall",
        `Call to '${name}' must bind at least one result with ~{name}`,
        token,
      );
    }
    if (leftover) {
      this.error(
        "MalformedCall",
        `Unexpected '${leftover}' in bindings of '${name}'. Bindings are written as ~{name}`,
        token,
      );
    }

    return {
      type: "Call",
      name,
      bindings,
      line: token.line,
      column: token.column,
    };
  }

  private parseBranch(token: LineToken): Branch {
    const text = token.text;
    const position = { line: token.line, column: token.column };

    if (text.startsWith("?{")) {
      const match = CONDITION_PATTERN.exec(text);
      const variable = match?.[1];
      if (!variable) {
        this.error(
          "MalformedBranch",
          "Conditions are written as ?{variable} -> destination",
          token,
        );
      }
      return {
        type: "Condition",
        variable,
        destination: this.parseBranchDestination(match?.[2] ?? "", token),
        ...position,
      };
    }

    if (text.startsWith(ARROW)) {
      return {
        type: "Goto",
        destination: this.parseBranchDestination(text.slice(ARROW.length), token),
        ...position,
      };
    }

    const close = text.indexOf("}");
    if (close === -1) {
      this.error("MalformedBranch", "Expected '}' to close the keyword list", token);
    }
    const rest = text.slice(close + 1).trim();
    if (!rest.startsWith(ARROW)) {
      this.error(
        "MalformedBranch",
        "Expected '->' followed by a destination after the keyword list",
        token,
      );
    }

    const keywords = Array.from(
      new Set(
        text
          .slice(1, close)
          .split(",")
          .map((keyword) => keyword.trim().toLowerCase())
          .filter((keyword) => keyword.length > 0),
      ),
    );
    if (keywords.length === 0) {
      this.error("MalformedBranch", "An option needs at least one keyword", token);
    }

    return {
      type: "Option",
      keywords,
      destination: this.parseBranchDestination(rest.slice(ARROW.length), token),
      ...position,
    };
  }

  private parseBranchDestination(text: string, token: LineToken): Destination {
    const destination = parseDestination(text);
    if (!destination) {
      this.error(
        "MalformedBranch",
        `Invalid destination '${text.trim()}'. Expected a node name, [file:node], {exit} or \${variable}`,
        token,
      );
    }
    return destination;
  }

  private synchronize(): void {
    // Skip lines until we find a safe point to resume (next node or EOF)
    while (!this.isAtEnd()) {
      if (this.peek().type === "NODE_HEADER") {
        return;
      }
      this.advance();
    }
  }

  private expect(expectedType: LineToken["type"]): boolean {
    if (this.isAtEnd()) return false;
    return this.peek().type === expectedType;
  }

  private advance(): LineToken {
    const token = this.peek();
    this.position++;
    return token;
  }

  private isAtEnd(): boolean {
    return this.position >= this.tokens.length;
  }

  private peek(): LineToken {
    const token = this.tokens[this.position];
    if (!token) {
      throw new Error("Unexpected end of input");
    }
    return token;
  }

  private error(kind: ParseErrorKind, message: string, token: LineToken): never {
    this.fail(kind, message, token.line, token.column);
  }

  private fail(
    kind: ParseErrorKind,
    message: string,
    line: number,
    column: number,
  ): never {
    const sourceLine = this.sourceLines[line - 1];
    throw new ParserError(
      kind,
      message,
      this.options.file,
      line,
      column,
      sourceLine,
    );
  }
}

/** Parses one script, throwing the first error found. */
export function parse(
  source: string,
  file: string,
  isEntryFile: boolean,
): DialogueDocument {
  const result = parseScript(source, file, isEntryFile);
  const [firstError] = result.errors;
  if (firstError) {
    throw firstError;
  }
  if (!result.value) {
    throw new Error(`Parsing '${file}' produced no document`);
  }
  return result.value;
}

export function parseScript(
  source: string,
  file: string,
  isEntryFile: boolean,
): ParseResult {
  const lexer = new Lexer(source);
  const parser = new Parser(lexer.tokenize(), source, {
    file,
    isEntry: isEntryFile,
  });
  return parser.parse();
}
