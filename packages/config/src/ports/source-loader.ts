export type LoadOptions = {
  /** Permit plain `http://` sources. */
  allowUnsecure: boolean
}

/**
 * Fetches the raw bytes behind a config identifier (a path or URL).
 *
 * Loaders do no decoding. A source that cannot be produced rejects with a
 * `FetchError`.
 */
export interface SourceLoader {
  load(id: string, options: LoadOptions): Promise<Uint8Array>
}
