export const asRecord = (value: unknown) =>
  value && typeof value === 'object' && !Array.isArray(value) ? (value as Record<string, unknown>) : null

export const asString = (value: unknown) => (typeof value === 'string' && value.trim().length > 0 ? value.trim() : null)

export const asStringMap = (value: unknown): Record<string, string> => {
  const record = asRecord(value)
  if (!record) return {}
  const output: Record<string, string> = {}
  for (const [key, entry] of Object.entries(record)) {
    if (typeof entry === 'string') output[key] = entry
  }
  return output
}

export const readNested = (value: unknown, path: string[]) => {
  let cursor: unknown = value
  for (const key of path) {
    if (!cursor || typeof cursor !== 'object' || Array.isArray(cursor)) return null
    cursor = (cursor as Record<string, unknown>)[key]
  }
  return cursor ?? null
}

export const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error))
