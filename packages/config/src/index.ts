export { FileSourceLoader, type FileSourceLoaderOptions } from "./adapters/file/file-source-loader"
export {
  type FetchFn,
  HttpSourceLoader,
  type HttpSourceLoaderDeps,
} from "./adapters/http/http-source-loader"
export { ManualReloadTrigger } from "./adapters/memory/manual-reload-trigger"
export { type FlagHandle, MemoryFlagRegistry } from "./adapters/memory/memory-flag-registry"
export { MemorySourceLoader } from "./adapters/memory/memory-source-loader"
export {
  RoutingSourceLoader,
  type RoutingSourceLoaderDeps,
} from "./adapters/routing/routing-source-loader"
export { SignalReloadTrigger } from "./adapters/signal/signal-reload-trigger"
export { dumpFlags, escapeUsage, quoteValue } from "./core/dump/dump"
export {
  ArgumentError,
  CyclicImportError,
  DuplicateParseError,
  EncodingError,
  FetchError,
  type FlagFileErrorCode,
  IniSyntaxError,
  RegistrationError,
  SetValueError,
  type SourcePosition,
  UnknownFlagError,
} from "./core/errors"
export { isRemote, resolveImportPath } from "./core/ini/import-path"
export { type IniParseOptions, IniParser, type IniParserDeps } from "./core/ini/ini-parser"
export { type IniToken, tokenizeIni } from "./core/ini/ini-tokenizer"
export { decodeLines, type SourceLine } from "./core/ini/line-decoder"
export { type ParsedValue, parseValue } from "./core/ini/quoting"
export { readIniFile } from "./core/ini/read-ini-file"
export {
  MergeEngine,
  type MergeEngineDeps,
  type MergePlan,
  type PlanOptions,
  type StagedValue,
} from "./core/merge/merge-engine"
export { ChangeBus, type FlagChange, type FlagChangeCallback } from "./core/notify/change-bus"
export { ReloadQueue } from "./core/reload/reload-queue"
export {
  ReloadScheduler,
  type ReloadSchedulerState,
} from "./core/reload/reload-scheduler"
export { type ControlFlagNames, defaultControlFlagNames } from "./core/session/control-flags"
export {
  FlagFileSession,
  type FlagFileSessionDeps,
  type FlagFileSessionOptions,
} from "./core/session/flag-file-session"
export { type ShorthandEntry, ShorthandRegistry } from "./core/shorthands/shorthand-registry"
export type { ChangeSet, Directive, ReloadOutcome } from "./ports/directive"
export type {
  FlagDefinition,
  FlagKind,
  FlagRegistry,
  FlagView,
  SetResult,
} from "./ports/flag-registry"
export type { ReloadTrigger } from "./ports/reload-trigger"
export type { LoadOptions, SourceLoader } from "./ports/source-loader"
