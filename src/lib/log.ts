// One JSON object per line; never pass resume text, keys or raw model output here.
export type LogFields = Record<string, string | number | boolean | null | undefined>

export function logEvent(msg: string, fields: LogFields = {}): void {
  console.log(JSON.stringify({ msg, ...fields, ts: new Date().toISOString() }))
}

export function logError(msg: string, fields: LogFields = {}): void {
  console.error(JSON.stringify({ msg, ...fields, ts: new Date().toISOString() }))
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}
