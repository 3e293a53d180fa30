import { createHash, type Hash } from 'node:crypto'
import fs from 'node:fs'
import b4a from 'b4a'

// Transfer block size for file reads, socket re-blocking and sink writes
export const BLOCK_SIZE = 4096

const CHECKSUM_PATTERN = /^[a-f0-9]{32}$/i

export interface FileDigest {
  checksum: string
  length: number
}

export function isChecksum(value: string): boolean {
  return CHECKSUM_PATTERN.test(value)
}

export function normalizeChecksum(value: string): string {
  return value.toLowerCase()
}

export function checksumsMatch(a: string, b: string): boolean {
  return normalizeChecksum(a) === normalizeChecksum(b)
}

export function md5(data: string | Uint8Array): string {
  const bytes = typeof data === 'string' ? b4a.from(data, 'utf8') : data
  return createHash('md5').update(bytes).digest('hex')
}

/**
 * Running MD5 over a byte stream. `digest()` finalizes the hash; later calls
 * return the same value and further updates are rejected.
 */
export class ChecksumAccumulator {
  private hash: Hash = createHash('md5')
  private length = 0
  private result: string | null = null

  update(block: Uint8Array): void {
    if (this.result !== null) {
      throw new Error('Checksum already finalized')
    }
    this.hash.update(block)
    this.length += block.byteLength
  }

  get bytes(): number {
    return this.length
  }

  digest(): string {
    if (this.result === null) {
      this.result = this.hash.digest('hex')
    }
    return this.result
  }
}

export async function digestFile(filePath: string): Promise<FileDigest> {
  const acc = new ChecksumAccumulator()
  const stream = fs.createReadStream(filePath, { highWaterMark: BLOCK_SIZE })
  for await (const chunk of stream) {
    acc.update(typeof chunk === 'string' ? b4a.from(chunk, 'utf8') : chunk)
  }
  return { checksum: acc.digest(), length: acc.bytes }
}
