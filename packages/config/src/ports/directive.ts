/**
 * One `key = value` assignment read from a config source.
 *
 * Directives are frozen once emitted. In a list, a later directive for the
 * same key overrides an earlier one.
 */
export type Directive = Readonly<{
  key: string
  value: string

  /** The identifier the directive was read from: a path or URL. */
  sourcePath: string
  lineNumber: number

  /** Preceding comment line, or the value's trailing comment. */
  comment: string
}>

/** Flag name mapped to its value before the pass that changed it. */
export type ChangeSet = ReadonlyMap<string, string>

export type ReloadOutcome =
  | { kind: "changed"; changeSet: ChangeSet; generation: number }
  | { kind: "unchanged" }
  | { kind: "failed"; error: Error }
