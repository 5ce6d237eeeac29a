import { readFileSync } from "node:fs";
import path from "node:path";

/** Where the registry gets script text from. Throws when a name is unknown. */
export interface ScriptSource {
  read(name: string): string;
}

export class MemorySource implements ScriptSource {
  private files: Map<string, string>;

  constructor(files: Record<string, string> = {}) {
    this.files = new Map(Object.entries(files));
  }

  set(name: string, text: string): this {
    this.files.set(name, text);
    return this;
  }

  read(name: string): string {
    const text = this.files.get(name);
    if (text === undefined) {
      throw new Error(`No script named '${name}'`);
    }
    return text;
  }
}

/** Reads scripts relative to a root directory. */
export class FileSystemSource implements ScriptSource {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  read(name: string): string {
    const filePath = path.resolve(this.root, name);
    const relative = path.relative(this.root, filePath);
    if (
      relative === ".." ||
      relative.startsWith(`..${path.sep}`) ||
      path.isAbsolute(relative)
    ) {
      throw new Error(`Script '${name}' is outside of ${this.root}`);
    }
    return readFileSync(filePath, { encoding: "utf-8" });
  }
}
