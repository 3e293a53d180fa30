import crypto from 'hypercore-crypto'
import b4a from 'b4a'

export function generateId(): string {
  return b4a.toString(crypto.randomBytes(16), 'hex')
}

export function shortId(id: string): string {
  return id.slice(0, 8)
}

export function isValidPort(port: number, allowEphemeral = false): boolean {
  if (!Number.isInteger(port)) return false
  if (allowEphemeral && port === 0) return true
  return port >= 1 && port <= 65535
}

export function parsePort(value: string | undefined, allowEphemeral = false): number | null {
  if (value === undefined || !/^\d+$/.test(value)) return null
  const port = parseInt(value, 10)
  return isValidPort(port, allowEphemeral) ? port : null
}

// Decimal digits only: rejects signs, exponents, whitespace and fractions
export function parseNonNegativeInt(value: string): number | null {
  if (!/^\d+$/.test(value)) return null
  const n = parseInt(value, 10)
  return Number.isSafeInteger(n) ? n : null
}
