import { DEFAULT_START_NODE } from "./constants.ts";
import { interpolatedNames } from "./destination.ts";
import type {
  AnalysisError,
  AnalysisResult,
  AnalysisSuggestion,
  AnalysisWarning,
  Destination,
  DialogueDocument,
  DialogueNode,
} from "./types.ts";

export interface AnalyzerOptions {
  /** Names of host functions the scripts may call. Unchecked when omitted. */
  functions?: Iterable<string>;
  startNode?: string;
}

interface VariableUse {
  name: string;
  file: string;
  node: string;
  line: number;
  column: number;
}

const key = (file: string, node: string) => `${file}:${node}`;

export class Analyzer {
  private documents = new Map<string, DialogueDocument>();
  private functions: Set<string> | null;
  private startNode: string;

  private errors: AnalysisError[] = [];
  private warnings: AnalysisWarning[] = [];
  private suggestions: AnalysisSuggestion[] = [];

  private variableUses: VariableUse[] = [];
  private boundVariables = new Map<string, Set<string>>();

  constructor(options: AnalyzerOptions = {}) {
    this.functions = options.functions ? new Set(options.functions) : null;
    this.startNode = options.startNode ?? DEFAULT_START_NODE;
  }

  public analyzeDocument(document: DialogueDocument): void {
    if (this.documents.has(document.name)) return;
    this.documents.set(document.name, document);

    const bound = new Set(document.localDefaults.keys());
    this.boundVariables.set(document.name, bound);

    for (const node of document.nodes.values()) {
      this.checkEmptyNode(document, node);
      this.checkDeadEndNode(document, node);
      this.checkShadowedBranches(document, node);
      this.checkIdenticalKeywords(document, node);
      this.checkNodeReferences(document, node);
      this.checkFunctionCalls(document, node);
      this.checkDependencies(document, node);
      this.collectVariables(document, node, bound);
    }
  }

  public finalizeAnalysis(): AnalysisResult {
    this.checkEntryPoint();
    this.checkTransfers();
    this.checkReachability();
    this.checkCircularReferences();
    this.checkUndefinedVariables();

    return this.getResult();
  }

  private checkEmptyNode(document: DialogueDocument, node: DialogueNode): void {
    if (node.content.length === 0 && node.branches.length === 0) {
      this.warnings.push({
        type: "empty_node",
        message: `Node '${node.name}' is empty and has no content or branches`,
        file: document.name,
        line: node.line,
        column: node.column,
        node: node.name,
        severity: "warning",
      });
    }
  }

  private checkDeadEndNode(
    document: DialogueDocument,
    node: DialogueNode,
  ): void {
    // An empty node is a different warning, so we'll skip this check for them.
    if (node.content.length === 0 && node.branches.length === 0) {
      return;
    }

    if (node.branches.length === 0) {
      this.warnings.push({
        type: "dead_end",
        message: `Node '${node.name}' is a dead end; it has no option, condition or '->' line to leave through.`,
        file: document.name,
        line: node.line,
        column: node.column,
        node: node.name,
        severity: "warning",
      });
    }
  }

  private checkShadowedBranches(
    document: DialogueDocument,
    node: DialogueNode,
  ): void {
    const gotoIndex = node.branches.findIndex((b) => b.type === "Goto");
    if (gotoIndex === -1) return;

    for (const branch of node.branches.slice(gotoIndex + 1)) {
      this.warnings.push({
        type: "shadowed_branch",
        message: `This branch is never considered because an unconditional '->' comes before it in node '${node.name}'.`,
        file: document.name,
        line: branch.line,
        column: branch.column,
        node: node.name,
        severity: "warning",
      });
    }
  }

  private checkIdenticalKeywords(
    document: DialogueDocument,
    node: DialogueNode,
  ): void {
    const seen = new Map<string, number>();

    for (const branch of node.branches) {
      if (branch.type !== "Option") continue;
      for (const keyword of branch.keywords) {
        const firstLine = seen.get(keyword);
        if (firstLine !== undefined) {
          this.warnings.push({
            type: "identical_keyword",
            message: `Keyword '${keyword}' is already handled by the option on line ${firstLine}; this one never matches it.`,
            file: document.name,
            line: branch.line,
            column: branch.column,
            node: node.name,
            severity: "warning",
          });
        } else {
          seen.set(keyword, branch.line);
        }
      }
    }
  }

  private checkNodeReferences(
    document: DialogueDocument,
    node: DialogueNode,
  ): void {
    for (const branch of node.branches) {
      const destination = branch.destination;
      if (destination.type !== "Node") continue;
      if (!document.nodes.has(destination.node)) {
        this.errors.push({
          type: "missing_node",
          message: `Reference to non-existent node: '${destination.node}'`,
          file: document.name,
          line: branch.line,
          column: branch.column,
          node: node.name,
          severity: "error",
        });
      }
    }
  }

  private checkFunctionCalls(
    document: DialogueDocument,
    node: DialogueNode,
  ): void {
    if (!this.functions) return;

    for (const element of node.content) {
      if (element.type === "Call" && !this.functions.has(element.name)) {
        this.errors.push({
          type: "unknown_function",
          message: `Unknown function called: '${element.name}'.`,
          file: document.name,
          line: element.line,
          column: element.column,
          node: node.name,
          severity: "error",
        });
      }
    }
  }

  private checkDependencies(
    document: DialogueDocument,
    node: DialogueNode,
  ): void {
    const required = document.metadata.required ?? [];

    for (const branch of node.branches) {
      const destination = branch.destination;
      if (
        destination.type !== "FileTransfer" ||
        destination.file.type !== "Literal"
      ) {
        continue;
      }
      const file = destination.file.value;
      if (file !== document.name && !required.includes(file)) {
        this.warnings.push({
          type: "undeclared_dependency",
          message: `'${file}' is not listed in the Required header of '${document.name}'.`,
          file: document.name,
          line: branch.line,
          column: branch.column,
          node: node.name,
          severity: "warning",
        });
      }
    }
  }

  private collectVariables(
    document: DialogueDocument,
    node: DialogueNode,
    bound: Set<string>,
  ): void {
    const use = (name: string, line: number, column: number) => {
      this.variableUses.push({
        name,
        file: document.name,
        node: node.name,
        line,
        column,
      });
    };

    for (const element of node.content) {
      if (element.type === "Call") {
        element.bindings.forEach((binding) => bound.add(binding));
      } else {
        for (const name of interpolatedNames(element.text)) {
          use(name, element.line, element.column);
        }
      }
    }

    for (const branch of node.branches) {
      if (branch.type === "Condition") {
        use(branch.variable, branch.line, branch.column);
      }
      for (const name of this.destinationVariables(branch.destination)) {
        use(name, branch.line, branch.column);
      }
    }
  }

  private destinationVariables(destination: Destination): string[] {
    switch (destination.type) {
      case "Dynamic":
        return [destination.variable];
      case "FileTransfer":
        return [destination.file, destination.node].flatMap((expression) =>
          expression.type === "Template" ? expression.variables : [],
        );
      default:
        return [];
    }
  }

  private checkEntryPoint(): void {
    for (const document of this.documents.values()) {
      if (!document.declaresGlobal) continue;
      if (!document.nodes.has(this.startNode)) {
        this.errors.push({
          type: "missing_entry_point",
          message: `The entry script is missing a '${this.startNode}' node, which is required as the entry point.`,
          file: document.name,
          // This is a file-level error, so we'll point to the beginning of the file.
          line: 1,
          column: 1,
          severity: "error",
        });
      }
    }
  }

  private checkTransfers(): void {
    for (const document of this.documents.values()) {
      for (const node of document.nodes.values()) {
        for (const branch of node.branches) {
          const destination = branch.destination;
          if (
            destination.type !== "FileTransfer" ||
            destination.file.type !== "Literal"
          ) {
            continue;
          }

          const file = destination.file.value;
          const target = this.documents.get(file);
          const location = {
            file: document.name,
            line: branch.line,
            column: branch.column,
            node: node.name,
            severity: "error" as const,
          };

          if (!target) {
            this.errors.push({
              type: "missing_file",
              message: `Transfer to '${file}', which could not be loaded.`,
              ...location,
            });
          } else if (
            destination.node.type === "Literal" &&
            !target.nodes.has(destination.node.value)
          ) {
            this.errors.push({
              type: "missing_node",
              message: `Reference to non-existent node: '${destination.node.value}' in '${file}'`,
              ...location,
            });
          }
        }
      }
    }
  }

  private checkReachability(): void {
    const reachable = new Set<string>();
    const queue: [DialogueDocument, string][] = [];
    let hasComputedEdges = false;

    const visit = (document: DialogueDocument | undefined, node: string) => {
      if (!document || !document.nodes.has(node)) return;
      const id = key(document.name, node);
      if (reachable.has(id)) return;
      reachable.add(id);
      queue.push([document, node]);
    };

    for (const document of this.documents.values()) {
      visit(document, this.startNode);
    }

    for (let entry = queue.shift(); entry; entry = queue.shift()) {
      const [document, name] = entry;
      const node = document.nodes.get(name);
      if (!node) continue;

      for (const branch of node.branches) {
        const destination = branch.destination;
        switch (destination.type) {
          case "Node":
            visit(document, destination.node);
            break;
          case "FileTransfer":
            if (
              destination.file.type === "Literal" &&
              destination.node.type === "Literal"
            ) {
              visit(
                this.documents.get(destination.file.value),
                destination.node.value,
              );
            } else {
              hasComputedEdges = true;
            }
            break;
          case "Dynamic":
            hasComputedEdges = true;
            break;
          case "Exit":
            break;
        }
      }
    }

    for (const document of this.documents.values()) {
      for (const node of document.nodes.values()) {
        if (reachable.has(key(document.name, node.name))) continue;

        const location = {
          file: document.name,
          line: node.line,
          column: node.column,
          node: node.name,
        };
        if (hasComputedEdges) {
          // Destinations built from variables cannot be followed statically.
          this.suggestions.push({
            type: "possibly_unreachable_node",
            message: `Node '${node.name}' is not reached by any literal destination; it may only be reached through a computed one.`,
            ...location,
            severity: "info",
          });
        } else {
          this.warnings.push({
            type: "unreachable_node",
            message: `Node '${node.name}' is unreachable from the '${this.startNode}' node.`,
            ...location,
            severity: "warning",
          });
        }
      }
    }
  }

  private checkCircularReferences(): void {
    for (const document of this.documents.values()) {
      const adj = new Map<string, string>();

      // Only unconditional '->' edges can trap a session in a loop.
      for (const node of document.nodes.values()) {
        const jump = node.branches.find((b) => b.type === "Goto");
        if (jump && jump.destination.type === "Node") {
          adj.set(node.name, jump.destination.node);
        }
      }

      const reported = new Set<string>();
      for (const start of adj.keys()) {
        const path: string[] = [];
        let current: string | undefined = start;

        while (current !== undefined && !path.includes(current)) {
          path.push(current);
          current = adj.get(current);
        }
        if (current === undefined || reported.has(current)) continue;

        const cycle = path.slice(path.indexOf(current));
        for (const name of cycle) {
          reported.add(name);
          const node = document.nodes.get(name);
          if (!node) continue;
          this.warnings.push({
            type: "circular_reference",
            message: `Node '${name}' is part of an inescapable '->' loop: ${cycle.join(" -> ")} -> ${current}`,
            file: document.name,
            line: node.line,
            column: node.column,
            node: name,
            severity: "warning",
          });
        }
      }
    }
  }

  private checkUndefinedVariables(): void {
    const globals = new Set<string>();
    for (const document of this.documents.values()) {
      for (const name of document.globalDefaults.keys()) {
        globals.add(name);
      }
    }

    for (const use of this.variableUses) {
      const root = use.name.split(".")[0] ?? use.name;
      const local = this.boundVariables.get(use.file);
      if (globals.has(root) || local?.has(root)) continue;

      this.warnings.push({
        type: "undefined_variable",
        message: `Variable '${use.name}' is never declared or bound; it will read as empty.`,
        file: use.file,
        line: use.line,
        column: use.column,
        node: use.node,
        severity: "warning",
      });
    }
  }

  private getResult(): AnalysisResult {
    return {
      valid: this.errors.length === 0,
      errors: [...this.errors],
      warnings: [...this.warnings],
      suggestions: [...this.suggestions],
    };
  }
}
