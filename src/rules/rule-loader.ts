import fs from "node:fs/promises";
import { RuleIoError, RuleParseError } from "./errors.js";
import { RuleCollection, type ReadonlyRuleCollection } from "./rule-collection.js";
import { discoverRuleFiles } from "./rule-discovery.js";
import { asRuleRecord, parseRulesDocument } from "./rule-document.js";
import { classifySource } from "./source-resolver.js";
import type {
  LoadEvent,
  LoadObserver,
  RuleRecord,
  RuleRecordDecoder,
  RuleSourceContents,
} from "./types.js";

export interface RuleLoaderOptions<T> {
  readonly decode: RuleRecordDecoder<T>;
  readonly observer?: LoadObserver;
}

export interface LoadRulesOptions {
  readonly observer?: LoadObserver;
}

/**
 * Loads rules documents from files, directories and in-memory buffers into a
 * single ordered collection. Every batch operation is fail-fast: the first
 * error is thrown and the records gathered so far are discarded.
 */
export class RuleLoader<T> {
  private readonly decode: RuleRecordDecoder<T>;
  private readonly observer?: LoadObserver;

  constructor(options: RuleLoaderOptions<T>) {
    this.decode = options.decode;
    this.observer = options.observer;
  }

  /**
   * Load from paths that may each be a rules file or a directory of them.
   */
  async loadPaths(paths: Iterable<string>): Promise<ReadonlyRuleCollection<T>> {
    const rules = new RuleCollection<T>();
    let numPaths = 0;
    for (const input of paths) {
      numPaths += 1;
      const kind = await classifySource(input);
      this.emit({ type: "source-resolved", path: input, kind });
      if (kind === "file") {
        rules.merge(await this.loadFile(input));
      } else {
        rules.merge(await this.loadDirectory(input));
      }
    }
    this.emit({
      type: "batch-loaded",
      sources: numPaths,
      rules: rules.size,
      unit: "paths",
    });
    return rules;
  }

  async loadFile(filePath: string): Promise<ReadonlyRuleCollection<T>> {
    let contents: Buffer;
    try {
      contents = await fs.readFile(filePath);
    } catch (error) {
      throw new RuleIoError("read rules file", filePath, error);
    }
    const rules = this.parse(filePath, contents);
    this.emit({ type: "file-parsed", path: filePath, rules: rules.size });
    return rules;
  }

  async loadFiles(
    filePaths: Iterable<string>,
  ): Promise<ReadonlyRuleCollection<T>> {
    const rules = new RuleCollection<T>();
    let numFiles = 0;
    for (const filePath of filePaths) {
      numFiles += 1;
      rules.merge(await this.loadFile(filePath));
    }
    this.emit({
      type: "batch-loaded",
      sources: numFiles,
      rules: rules.size,
      unit: "files",
    });
    return rules;
  }

  /**
   * Load every YAML file found recursively under `dirPath`, in sorted path
   * order.
   */
  async loadDirectory(dirPath: string): Promise<ReadonlyRuleCollection<T>> {
    const files = await discoverRuleFiles(dirPath);
    this.emit({ type: "directory-scanned", path: dirPath, files: files.length });
    return this.loadFiles(files);
  }

  /**
   * Parse sources that are already in memory. No filesystem access.
   */
  loadContents(
    sources: Iterable<RuleSourceContents>,
  ): ReadonlyRuleCollection<T> {
    const rules = new RuleCollection<T>();
    let numSources = 0;
    for (const source of sources) {
      numSources += 1;
      const parsed = this.parse(source.path, source.contents);
      this.emit({ type: "file-parsed", path: source.path, rules: parsed.size });
      rules.merge(parsed);
    }
    this.emit({
      type: "batch-loaded",
      sources: numSources,
      rules: rules.size,
      unit: "contents",
    });
    return rules;
  }

  private parse(
    sourcePath: string,
    contents: string | Uint8Array,
  ): RuleCollection<T> {
    try {
      return new RuleCollection(parseRulesDocument(contents, this.decode));
    } catch (error) {
      throw new RuleParseError(sourcePath, error);
    }
  }

  private emit(event: LoadEvent): void {
    this.observer?.(event);
  }
}

export function createRuleLoader(
  options: LoadRulesOptions = {},
): RuleLoader<RuleRecord> {
  return new RuleLoader({ decode: asRuleRecord, observer: options.observer });
}

export async function loadRulesFromPaths(
  paths: Iterable<string>,
  options: LoadRulesOptions = {},
): Promise<ReadonlyRuleCollection> {
  return createRuleLoader(options).loadPaths(paths);
}

export async function loadRuleFile(
  filePath: string,
  options: LoadRulesOptions = {},
): Promise<ReadonlyRuleCollection> {
  return createRuleLoader(options).loadFile(filePath);
}

export async function loadRuleFiles(
  filePaths: Iterable<string>,
  options: LoadRulesOptions = {},
): Promise<ReadonlyRuleCollection> {
  return createRuleLoader(options).loadFiles(filePaths);
}

export async function loadRulesFromDirectory(
  dirPath: string,
  options: LoadRulesOptions = {},
): Promise<ReadonlyRuleCollection> {
  return createRuleLoader(options).loadDirectory(dirPath);
}

export function loadRulesFromContents(
  sources: Iterable<RuleSourceContents>,
  options: LoadRulesOptions = {},
): ReadonlyRuleCollection {
  return createRuleLoader(options).loadContents(sources);
}
