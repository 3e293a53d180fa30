import { isChecksum, normalizeChecksum } from '../checksum.js'
import { parseNonNegativeInt } from '../utils.js'
import type { ChecksumEntry, QueryReply, RegistryRequest } from './types.js'
import { NOT_FOUND_RESPONSE } from './types.js'

const FIELD_SEPARATOR = '|'

export function validateFileId(fileID: string): string | null {
  if (!fileID) return 'File ID is required'
  if (fileID.includes(FIELD_SEPARATOR)) return 'File ID cannot contain "|"'
  if (/[\r\n]/.test(fileID)) return 'File ID cannot contain line breaks'
  if (fileID.trim() !== fileID) return 'File ID cannot start or end with whitespace'
  return null
}

export function parseRequest(line: string): RegistryRequest | null {
  const trimmed = line.trim()
  if (!trimmed) return null

  const parts = trimmed.split(FIELD_SEPARATOR)
  const [command, fileID = '', ...rest] = parts
  if (validateFileId(fileID)) return null

  if (command === 'BE' && rest.length === 3) {
    const [ttlField = '', lengthField = '', checksum = ''] = rest
    const ttlSeconds = parseNonNegativeInt(ttlField)
    const length = parseNonNegativeInt(lengthField)
    if (ttlSeconds === null || length === null) return null
    if (!isChecksum(checksum)) return null
    return { command: 'BE', fileID, ttlSeconds, length, checksum: normalizeChecksum(checksum) }
  }

  if (command === 'KI' && rest.length === 0) {
    return { command: 'KI', fileID }
  }

  return null
}

export function formatRegister(fileID: string, ttlSeconds: number, length: number, checksum: string): string {
  return `BE|${fileID}|${ttlSeconds}|${length}|${checksum}\n`
}

export function formatQuery(fileID: string): string {
  return `KI|${fileID}\n`
}

export function formatQueryResponse(entry: ChecksumEntry | null): string {
  if (!entry) return NOT_FOUND_RESPONSE
  return `${entry.length}|${entry.checksum}`
}

/**
 * Parse the reply to a KI request. An empty checksum field means the record
 * is missing or expired; `0|<checksum>` is a registered empty file.
 * Returns null for anything else, including `ERR`.
 */
export function parseQueryResponse(text: string): QueryReply | null {
  const trimmed = text.trim()
  const sep = trimmed.indexOf(FIELD_SEPARATOR)
  if (sep === -1) return null

  const length = parseNonNegativeInt(trimmed.slice(0, sep))
  if (length === null) return null

  const checksum = trimmed.slice(sep + 1)
  if (checksum === '') return { found: false }
  if (!isChecksum(checksum)) return null

  return { found: true, length, checksum: normalizeChecksum(checksum) }
}
