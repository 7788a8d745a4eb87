export {
  createRuleLoader,
  loadRuleFile,
  loadRuleFiles,
  loadRulesFromContents,
  loadRulesFromDirectory,
  loadRulesFromPaths,
  RuleLoader,
} from "./rule-loader.js";
export { RuleCollection } from "./rule-collection.js";
export {
  asRuleRecord,
  parseRulesDocument,
  serializeRules,
} from "./rule-document.js";
export {
  comparePaths,
  discoverRuleFiles,
  isRuleDefinitionFile,
} from "./rule-discovery.js";
export { classifySource } from "./source-resolver.js";
export { createLoggingObserver, describeLoadEvent } from "./logging-observer.js";
export {
  InvalidRuleSourceError,
  isRuleLoadError,
  RuleIoError,
  RuleLoadError,
  RuleParseError,
} from "./errors.js";
export type { RuleLoadErrorKind } from "./errors.js";
export type { ReadonlyRuleCollection } from "./rule-collection.js";
export type { LoadRulesOptions, RuleLoaderOptions } from "./rule-loader.js";
export type {
  LoadEvent,
  LoadObserver,
  LoadUnit,
  RuleRecord,
  RuleRecordContext,
  RuleRecordDecoder,
  RulesDocument,
  RuleSourceContents,
  SourceKind,
} from "./types.js";
