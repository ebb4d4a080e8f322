export type Log = (msg: string) => void

export const defaultLog: Log = (msg) => {
  console.warn(msg)
}

export function scopedLog(log: Log, scope: string): Log {
  return (msg) => log(`[${scope}] ${msg}`)
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message
  return String(e)
}
