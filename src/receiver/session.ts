import b4a from 'b4a'
import { BLOCK_SIZE, ChecksumAccumulator } from '../checksum.js'
import { validateFileId } from '../registry/parser.js'
import type { QueryOutcome } from '../registry/types.js'
import { generateId } from '../utils.js'
import type { Abandonment, SessionState, Verdict } from './types.js'
import { MAX_FILE_ID_BYTES } from './types.js'
import { classifyVerdict } from './verdict.js'

export type FeedResult =
  | { ok: true; fileID: string | null; blocks: Buffer[] }
  | { ok: false; reason: string }

const TERMINAL_STATES: ReadonlySet<SessionState> = new Set<SessionState>([
  'ok', 'corrupted', 'unverifiable', 'registry-unreachable', 'abandoned'
])

/**
 * Protocol state for one inbound transfer, without any I/O.
 *
 * The connection owner feeds raw socket chunks in and gets back the fileID
 * (once) and payload re-cut into BLOCK_SIZE blocks. Each block must be handed
 * back through `commit()` after it has been written to the output, which is
 * what feeds the checksum and byte counter.
 *
 *   awaiting-file-id -> receiving -> verifying -> ok | corrupted | unverifiable | registry-unreachable
 *   awaiting-file-id | receiving -> abandoned
 */
export class TransferSession {
  readonly id: string
  private state: SessionState = 'awaiting-file-id'
  private fileID: string | null = null
  private header: Buffer = b4a.alloc(0)
  private pending: Buffer = b4a.alloc(0)
  private accumulator = new ChecksumAccumulator()

  constructor(id: string = generateId()) {
    this.id = id
  }

  getState(): SessionState {
    return this.state
  }

  getFileId(): string | null {
    return this.fileID
  }

  get bytesReceived(): number {
    return this.accumulator.bytes
  }

  isTerminal(): boolean {
    return TERMINAL_STATES.has(this.state)
  }

  feed(chunk: Buffer): FeedResult {
    switch (this.state) {
      case 'awaiting-file-id':
        return this.feedHeader(chunk)
      case 'receiving':
        return { ok: true, fileID: null, blocks: this.cutBlocks(chunk, false) }
      default:
        return { ok: false, reason: `session is ${this.state}` }
    }
  }

  commit(block: Buffer): void {
    if (this.state !== 'receiving') {
      throw new Error(`Cannot accept data while ${this.state}`)
    }
    this.accumulator.update(block)
  }

  // Peer half-closed. Returns the final short block, if any.
  finish(): FeedResult {
    if (this.state === 'awaiting-file-id') {
      return {
        ok: false,
        reason: this.header.length > 0 ? 'connection ended before the file id line' : 'connection closed before any data'
      }
    }
    if (this.state !== 'receiving') {
      return { ok: false, reason: `session is ${this.state}` }
    }
    return { ok: true, fileID: null, blocks: this.cutBlocks(b4a.alloc(0), true) }
  }

  beginVerifying(): string {
    if (this.state !== 'receiving') {
      throw new Error(`Cannot verify while ${this.state}`)
    }
    this.state = 'verifying'
    return this.accumulator.digest()
  }

  settle(lookup: QueryOutcome, outputPath: string): Verdict {
    if (this.state !== 'verifying' || this.fileID === null) {
      throw new Error(`Cannot settle while ${this.state}`)
    }

    const localChecksum = this.accumulator.digest()
    const classification = classifyVerdict(localChecksum, lookup)
    this.state = classification.outcome

    return {
      sessionId: this.id,
      fileID: this.fileID,
      outcome: classification.outcome,
      bytesReceived: this.accumulator.bytes,
      localChecksum,
      expectedChecksum: classification.expectedChecksum,
      expectedLength: classification.expectedLength,
      reason: classification.reason,
      outputPath
    }
  }

  // Only sessions still reading from the peer can be abandoned
  abandon(reason: string): Abandonment | null {
    if (this.state !== 'awaiting-file-id' && this.state !== 'receiving') {
      return null
    }
    this.state = 'abandoned'
    this.header = b4a.alloc(0)
    this.pending = b4a.alloc(0)
    return {
      sessionId: this.id,
      fileID: this.fileID,
      bytesReceived: this.accumulator.bytes,
      reason
    }
  }

  private feedHeader(chunk: Buffer): FeedResult {
    this.header = b4a.concat([this.header, chunk])

    const lineEnd = this.header.indexOf(0x0a)
    if (lineEnd === -1) {
      if (this.header.length > MAX_FILE_ID_BYTES) {
        return { ok: false, reason: `file id line exceeds ${MAX_FILE_ID_BYTES} bytes` }
      }
      return { ok: true, fileID: null, blocks: [] }
    }
    if (lineEnd > MAX_FILE_ID_BYTES) {
      return { ok: false, reason: `file id line exceeds ${MAX_FILE_ID_BYTES} bytes` }
    }

    const fileID = b4a.toString(this.header, 'utf8', 0, lineEnd).replace(/\r$/, '')
    if (!fileID) {
      return { ok: false, reason: 'empty file id' }
    }
    // The registry would answer ERR to a query for this id
    const invalid = validateFileId(fileID)
    if (invalid) {
      return { ok: false, reason: invalid }
    }

    const rest = this.header.subarray(lineEnd + 1)
    this.header = b4a.alloc(0)
    this.fileID = fileID
    this.state = 'receiving'

    return { ok: true, fileID, blocks: this.cutBlocks(rest, false) }
  }

  private cutBlocks(data: Buffer, flush: boolean): Buffer[] {
    this.pending = this.pending.length > 0 ? b4a.concat([this.pending, data]) : data

    const blocks: Buffer[] = []
    while (this.pending.length >= BLOCK_SIZE) {
      blocks.push(this.pending.subarray(0, BLOCK_SIZE))
      this.pending = this.pending.subarray(BLOCK_SIZE)
    }
    if (flush && this.pending.length > 0) {
      blocks.push(this.pending)
      this.pending = b4a.alloc(0)
    }
    return blocks
  }
}
