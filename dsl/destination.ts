import { EXIT_TOKEN, INTERPOLATION_PATTERN, NAME_PATTERN } from "./constants.ts";
import type { Destination, DestinationExpression } from "./types.ts";

const DYNAMIC_PATTERN = /^\$\{\s*([A-Za-z0-9_.]+)\s*\}$/;

/** Names referenced by `${name}` tokens, in order of appearance. */
export function interpolatedNames(text: string): string[] {
  return Array.from(text.matchAll(INTERPOLATION_PATTERN), (match) =>
    (match[1] ?? "").trim(),
  );
}

export function toExpression(text: string): DestinationExpression {
  const variables = interpolatedNames(text);
  if (variables.length === 0) {
    return { type: "Literal", value: text };
  }
  return { type: "Template", template: text, variables };
}

/** Index of the first ':' that is not inside a `${...}` token. */
function findSeparator(text: string): number {
  let depth = 0;
  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    if (char === "$" && text[i + 1] === "{") {
      depth++;
      i++;
    } else if (char === "}" && depth > 0) {
      depth--;
    } else if (char === ":" && depth === 0) {
      return i;
    }
  }
  return -1;
}

function parseTransfer(inner: string): Destination | null {
  const separator = findSeparator(inner);
  if (separator === -1) return null;

  const file = inner.slice(0, separator).trim();
  const node = inner.slice(separator + 1).trim();
  if (!file || !node) return null;

  return {
    type: "FileTransfer",
    file: toExpression(file),
    node: toExpression(node),
  };
}

/**
 * Parses the text to the right of `->`. Returns null when the text is not a
 * destination at all.
 */
export function parseDestination(text: string): Destination | null {
  const trimmed = text.trim();
  if (!trimmed) return null;

  if (trimmed === EXIT_TOKEN) {
    return { type: "Exit" };
  }

  if (trimmed.startsWith("[")) {
    if (!trimmed.endsWith("]")) return null;
    return parseTransfer(trimmed.slice(1, -1));
  }

  const dynamic = DYNAMIC_PATTERN.exec(trimmed);
  if (dynamic?.[1]) {
    return { type: "Dynamic", variable: dynamic[1] };
  }

  const node = trimmed.startsWith("@") ? trimmed.slice(1).trim() : trimmed;
  if (!NAME_PATTERN.test(node)) return null;
  return { type: "Node", node };
}

/**
 * Parses a destination that was produced at run time, usually a host
 * function result such as `passwords.bdl:start` or `intro`. Interpolation
 * is not applied again: the value is taken verbatim.
 */
export function parseReference(reference: string): Destination | null {
  const trimmed = reference.trim();
  if (!trimmed) return null;

  if (trimmed === EXIT_TOKEN) {
    return { type: "Exit" };
  }

  const inner =
    trimmed.startsWith("[") && trimmed.endsWith("]")
      ? trimmed.slice(1, -1)
      : trimmed;

  const separator = inner.indexOf(":");
  if (separator !== -1) {
    const file = inner.slice(0, separator).trim();
    const node = inner.slice(separator + 1).trim();
    if (!file || !NAME_PATTERN.test(node)) return null;
    return {
      type: "FileTransfer",
      file: { type: "Literal", value: file },
      node: { type: "Literal", value: node },
    };
  }

  const node = inner.startsWith("@") ? inner.slice(1).trim() : inner;
  if (!NAME_PATTERN.test(node)) return null;
  return { type: "Node", node };
}

export function describeDestination(destination: Destination): string {
  switch (destination.type) {
    case "Node":
      return destination.node;
    case "Exit":
      return EXIT_TOKEN;
    case "Dynamic":
      return `\${${destination.variable}}`;
    case "FileTransfer":
      return `[${describeExpression(destination.file)}:${describeExpression(destination.node)}]`;
  }
}

function describeExpression(expression: DestinationExpression): string {
  return expression.type === "Literal"
    ? expression.value
    : expression.template;
}
