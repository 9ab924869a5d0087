import { createHash } from 'node:crypto'

import { asRecord } from '~/shared/records'

export const canonicalizeForHash = (value: unknown): unknown => {
  if (value == null) return null
  if (Array.isArray(value)) return value.map((entry) => canonicalizeForHash(entry))
  if (typeof value !== 'object') return value

  const record = asRecord(value)
  if (!record) return value

  const output: Record<string, unknown> = {}
  for (const key of Object.keys(record).sort()) {
    const entry = record[key]
    if (entry === undefined) continue
    output[key] = canonicalizeForHash(entry)
  }
  return output
}

export const stableStringify = (value: unknown) => JSON.stringify(canonicalizeForHash(value))

const HASH_HEX_LENGTH = 16

const digest = (text: string) => createHash('sha256').update(text).digest('hex').slice(0, HASH_HEX_LENGTH)

/** 64-bit structural hash, as 16 hex chars. Key order never affects the result. */
export const structuralHash = (value: unknown) => digest(stableStringify(value))

export const parseJsonObject = (raw: string): Record<string, unknown> | null => {
  try {
    return asRecord(JSON.parse(raw))
  } catch {
    return null
  }
}

const hasUnsafeInteger = (value: unknown): boolean => {
  if (typeof value === 'number') return Number.isInteger(value) && !Number.isSafeInteger(value)
  if (Array.isArray(value)) return value.some(hasUnsafeInteger)
  const record = asRecord(value)
  return record ? Object.values(record).some(hasUnsafeInteger) : false
}

/**
 * Hashes serialized JSON by structure, so two serializations of the same object agree.
 * Text that is not JSON, or that holds integers past 2^53 which parsing would round, is hashed as-is.
 */
export const hashSerialized = (raw: string) => {
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    return digest(`raw:${raw}`)
  }
  if (hasUnsafeInteger(parsed)) return digest(`raw:${raw}`)
  return structuralHash(parsed)
}
