import { DEFAULT_ENTRY_FILE } from "../dsl/constants.ts";
import { parse } from "../dsl/parser.ts";
import type { DialogueDocument, DialogueNode } from "../dsl/types.ts";
import { ResolutionError } from "./errors.ts";
import { EngineLogger } from "./logger.ts";
import type { ScriptSource } from "./sources.ts";

export interface RegistryOptions {
  source: ScriptSource;
  /** The only file allowed to declare globals. Default: main.bdl */
  entryFile?: string;
  logger?: EngineLogger;
}

/**
 * Parses each script once and hands out the cached document afterwards.
 * Documents refer to each other by name only, so files that require each
 * other load fine: a name requested again while its own dependencies are
 * still loading gets the entry that is already registered.
 */
export class DocumentRegistry {
  readonly entryFile: string;
  private source: ScriptSource;
  private logger: EngineLogger;
  private cache = new Map<string, DialogueDocument>();
  private loading = new Set<string>();
  /** Every document parsed since the outermost `load` call began. */
  private parsedInLoad = new Set<string>();

  constructor(options: RegistryOptions) {
    this.source = options.source;
    this.entryFile = options.entryFile ?? DEFAULT_ENTRY_FILE;
    this.logger = options.logger ?? new EngineLogger("registry");
  }

  /**
   * Loads `name` and, recursively, everything it requires. Parse errors
   * propagate as they are; unreadable files raise UnknownFile and failing
   * requirements raise MissingDependency. A failure evicts every document
   * parsed during the same outermost call, so none stays cached with a
   * requirement that could not be loaded.
   */
  load(name: string): DialogueDocument {
    const cached = this.cache.get(name);
    if (cached) {
      if (this.loading.has(name)) {
        this.logger.log(`'${name}' is still loading; reusing its entry`);
      }
      return cached;
    }

    if (this.loading.size === 0) {
      this.parsedInLoad.clear();
    }

    let text: string;
    try {
      text = this.source.read(name);
    } catch (error) {
      throw new ResolutionError(
        "UnknownFile",
        `Cannot read script '${name}'`,
        name,
        undefined,
        { cause: error },
      );
    }

    const document = parse(text, name, name === this.entryFile);
    this.cache.set(name, document);
    this.parsedInLoad.add(name);
    this.loading.add(name);
    this.logger.log(`Parsed '${name}' (${document.nodes.size} nodes)`);

    try {
      for (const dependency of document.metadata.required ?? []) {
        this.loadDependency(name, dependency);
      }
    } catch (error) {
      for (const parsed of this.parsedInLoad) {
        this.cache.delete(parsed);
      }
      this.logger.log(
        `Evicted ${Array.from(this.parsedInLoad).join(", ")} after '${name}' failed`,
      );
      throw error;
    } finally {
      this.loading.delete(name);
    }

    return document;
  }

  resolve(file: string, node: string): DialogueNode {
    let document: DialogueDocument;
    try {
      document = this.load(file);
    } catch (error) {
      if (error instanceof ResolutionError && error.kind === "UnknownFile") {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new ResolutionError(
        "UnknownFile",
        `Cannot load script '${file}': ${reason}`,
        file,
        undefined,
        { cause: error },
      );
    }

    const found = document.nodes.get(node);
    if (!found) {
      throw new ResolutionError(
        "UnknownNode",
        `Node '${node}' does not exist in '${file}'`,
        file,
      );
    }
    return found;
  }

  has(name: string): boolean {
    return this.cache.has(name);
  }

  documents(): DialogueDocument[] {
    return Array.from(this.cache.values());
  }

  private loadDependency(owner: string, dependency: string): void {
    try {
      this.load(dependency);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ResolutionError(
        "MissingDependency",
        `'${owner}' requires '${dependency}', which failed to load: ${reason}`,
        owner,
        undefined,
        { cause: error },
      );
    }
  }
}
