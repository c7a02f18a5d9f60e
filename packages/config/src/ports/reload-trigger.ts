/**
 * An external event source that asks for a config reload.
 */
export interface ReloadTrigger {
  readonly name: string

  /** @returns a function that stops delivery to `listener` */
  subscribe(listener: () => void): () => void
}
