import type { QueryOutcome } from '../registry/types.js'

export type VerdictOutcome = 'ok' | 'corrupted' | 'unverifiable' | 'registry-unreachable'

export type SessionState =
  | 'awaiting-file-id'
  | 'receiving'
  | 'verifying'
  | VerdictOutcome
  | 'abandoned'

export interface Verdict {
  sessionId: string
  fileID: string
  outcome: VerdictOutcome
  bytesReceived: number
  localChecksum: string
  expectedChecksum: string | null
  expectedLength: number | null
  reason: string | null     // set for registry-unreachable
  outputPath: string
}

export interface Abandonment {
  sessionId: string
  fileID: string | null
  bytesReceived: number
  reason: string
}

export interface ChecksumLookup {
  query(fileID: string): Promise<QueryOutcome>
}

export interface ReceiverEvents {
  'verdict': (verdict: Verdict) => void
  'abandoned': (info: Abandonment) => void
}

export const VERDICT_LABELS: Record<VerdictOutcome, string> = {
  'ok': 'CSUM OK',
  'corrupted': 'CSUM CORRUPTED',
  'unverifiable': 'CSUM UNVERIFIABLE',
  'registry-unreachable': 'CSUM REGISTRY UNREACHABLE'
}

export const MAX_FILE_ID_BYTES = 1024
export const DEFAULT_RECEIVE_TIMEOUT_MS = 30000
