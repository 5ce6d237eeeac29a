import { toPlain, type PlainValue } from "./values.ts";
import type {
  Branch,
  ContentElement,
  DialogueDocument,
  Metadata,
  ValueMap,
} from "./types.ts";

export interface CompiledNode {
  name: string;
  content: ContentElement[];
  branches: Branch[];
  line: number;
}

export interface CompiledDocument {
  name: string;
  metadata: Metadata;
  declaresGlobal: boolean;
  localDefaults: { [name: string]: PlainValue };
  globalDefaults: { [name: string]: PlainValue };
  nodes: CompiledNode[];
}

function compileDefaults(values: ValueMap): { [name: string]: PlainValue } {
  return Object.fromEntries(
    Array.from(values, ([name, value]) => [name, toPlain(value)] as const),
  );
}

/** Turns a parsed document into a JSON-serialisable object. */
export function compileDocument(document: DialogueDocument): CompiledDocument {
  return {
    name: document.name,
    metadata: document.metadata,
    declaresGlobal: document.declaresGlobal,
    localDefaults: compileDefaults(document.localDefaults),
    globalDefaults: compileDefaults(document.globalDefaults),
    nodes: Array.from(document.nodes.values(), (node) => ({
      name: node.name,
      content: node.content,
      branches: node.branches,
      line: node.line,
    })),
  };
}

export function compileToJson(
  document: DialogueDocument,
  pretty = false,
): string {
  return JSON.stringify(compileDocument(document), null, pretty ? 2 : undefined);
}
