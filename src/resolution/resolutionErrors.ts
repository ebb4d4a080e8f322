export type ResolutionErrorKind = 'unregisteredKind' | 'styleCycle' | 'invalidNode'

// Aborts the subtree at `path`; the rest of the tree still resolves.
export class ResolutionError extends Error {
  readonly kind: ResolutionErrorKind
  readonly path: string

  constructor(kind: ResolutionErrorKind, path: string, message: string) {
    super(`${path}: ${message}`)
    this.name = 'ResolutionError'
    this.kind = kind
    this.path = path
  }
}
