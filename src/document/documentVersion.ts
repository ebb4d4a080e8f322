export type DocumentVersion = {
  major: number
  minor: number
  patch: number
}

export const CURRENT_DOCUMENT_VERSION: DocumentVersion = { major: 0, minor: 1, patch: 0 }
export const CURRENT_IR_VERSION: DocumentVersion = { major: 0, minor: 1, patch: 0 }

export function parseVersion(raw: string): DocumentVersion | null {
  const m = String(raw ?? '').trim().match(/^(\d+)\.(\d+)(?:\.(\d+))?$/)
  if (!m) return null
  return { major: Number(m[1]), minor: Number(m[2]), patch: m[3] === undefined ? 0 : Number(m[3]) }
}

export function formatVersion(v: DocumentVersion): string {
  return `${v.major}.${v.minor}.${v.patch}`
}

export function compareVersions(a: DocumentVersion, b: DocumentVersion): number {
  if (a.major !== b.major) return a.major - b.major
  if (a.minor !== b.minor) return a.minor - b.minor
  return a.patch - b.patch
}

export type VersionCompatibility = 'compatible' | 'newerMinor' | 'incompatibleMajor'

// Minor and patch releases only add optional fields, so a newer minor still loads.
export function checkCompatibility(version: DocumentVersion, supported: DocumentVersion = CURRENT_DOCUMENT_VERSION): VersionCompatibility {
  if (version.major !== supported.major) return 'incompatibleMajor'
  if (compareVersions(version, supported) > 0 && version.minor > supported.minor) return 'newerMinor'
  return 'compatible'
}
