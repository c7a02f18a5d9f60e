import path from "node:path"

const REMOTE_PREFIX = /^https?:\/\//i

export function isRemote(id: string): boolean {
  return REMOTE_PREFIX.test(id)
}

export function isSecure(id: string): boolean {
  return /^https:\/\//i.test(id)
}

/**
 * Resolves an `#import` argument against the source that contains it.
 *
 * Inside a remote source, `relative` is a URL reference. Inside a local one,
 * it is joined to the directory of `base` unless it is empty, absolute or
 * itself remote.
 */
export function resolveImportPath(base: string, relative: string): string {
  if (isRemote(base)) return new URL(relative, base).toString()

  if (relative === "" || relative.startsWith("/") || isRemote(relative)) return relative

  return path.join(path.dirname(base), relative)
}
