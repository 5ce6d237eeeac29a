export type ParseErrorKind =
  | "MissingMetadata"
  | "GlobalOutsideEntry"
  | "DuplicateVariable"
  | "InvalidNodeName"
  | "DuplicateNode"
  | "MalformedBranch"
  | "MalformedCall"
  | "MalformedDeclaration"
  | "InvalidDependency";

export class ParserError extends Error {
  constructor(
    public kind: ParseErrorKind,
    public reason: string,
    public file: string,
    public line: number,
    public column: number,
    public sourceLine?: string,
  ) {
    const location = `${file}, line ${line}, column ${column}`;
    let fullMessage = `Parse Error (${kind}) at ${location}: ${reason}`;

    if (sourceLine) {
      const trimmedLine = sourceLine.trimStart();
      const indentLength = sourceLine.length - trimmedLine.length;
      const adjustedColumn = Math.max(1, column - indentLength);
      fullMessage += `\n\n  ${trimmedLine}\n  ${" ".repeat(adjustedColumn - 1)}^\n`;
    }

    super(fullMessage);
    this.name = "ParserError";
  }
}
