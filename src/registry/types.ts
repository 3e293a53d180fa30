export interface ChecksumRecord {
  fileID: string
  checksum: string    // 32 lowercase hex chars (MD5)
  length: number      // declared byte length of the source file
  expiresAt: number   // timestamp ms
}

export interface ChecksumEntry {
  length: number
  checksum: string
}

export interface RegisterRequest {
  command: 'BE'
  fileID: string
  ttlSeconds: number
  length: number
  checksum: string
}

export interface QueryRequest {
  command: 'KI'
  fileID: string
}

export type RegistryRequest = RegisterRequest | QueryRequest

export type QueryReply =
  | { found: true; length: number; checksum: string }
  | { found: false }

export type QueryOutcome =
  | { status: 'found'; length: number; checksum: string }
  | { status: 'not-found' }
  | { status: 'unreachable'; reason: string }

export type RegisterResult =
  | { ok: true }
  | { ok: false; reason: string }

export const OK_RESPONSE = 'OK'
export const ERR_RESPONSE = 'ERR'
export const NOT_FOUND_RESPONSE = '0|'

export const DEFAULT_TTL_SECONDS = 60
export const MAX_REQUEST_BYTES = 1024
