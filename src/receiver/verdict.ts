import { checksumsMatch } from '../checksum.js'
import type { QueryOutcome } from '../registry/types.js'
import type { VerdictOutcome } from './types.js'

export interface Classification {
  outcome: VerdictOutcome
  expectedChecksum: string | null
  expectedLength: number | null
  reason: string | null
}

/**
 * Map a registry answer onto a verdict. A missing or expired record is
 * unverifiable, not corrupted, and a registry fault is reported as such.
 */
export function classifyVerdict(localChecksum: string, outcome: QueryOutcome): Classification {
  switch (outcome.status) {
    case 'found':
      return {
        outcome: checksumsMatch(localChecksum, outcome.checksum) ? 'ok' : 'corrupted',
        expectedChecksum: outcome.checksum,
        expectedLength: outcome.length,
        reason: null
      }
    case 'not-found':
      return { outcome: 'unverifiable', expectedChecksum: null, expectedLength: null, reason: null }
    case 'unreachable':
      return { outcome: 'registry-unreachable', expectedChecksum: null, expectedLength: null, reason: outcome.reason }
  }
}

// Output file name for a fileID: anything outside [A-Za-z0-9._-] becomes "_"
export function safeFileName(fileID: string): string {
  const name = fileID.replace(/[^A-Za-z0-9._-]/g, '_')
  if (name === '.' || name === '..') return '_'
  return name
}
