import net from 'node:net'
import b4a from 'b4a'
import { formatQuery, formatRegister, parseQueryResponse } from './parser.js'
import type { QueryOutcome, RegisterResult } from './types.js'
import { OK_RESPONSE } from './types.js'

export interface RegistryClientConfig {
  host: string
  port: number
  timeoutMs?: number
}

type Exchange =
  | { ok: true; reply: string }
  | { ok: false; reason: string }

const DEFAULT_TIMEOUT_MS = 5000

/**
 * Talks to the checksum registry, one connection per request. Never throws:
 * connect errors, resets and timeouts come back as failed results.
 */
export class RegistryClient {
  private config: RegistryClientConfig

  constructor(config: RegistryClientConfig) {
    this.config = config
  }

  async register(fileID: string, ttlSeconds: number, length: number, checksum: string): Promise<RegisterResult> {
    const result = await this.exchange(formatRegister(fileID, ttlSeconds, length, checksum))
    if (!result.ok) return result

    const reply = result.reply.trim()
    if (reply !== OK_RESPONSE) {
      return { ok: false, reason: `unexpected registry reply: ${JSON.stringify(reply)}` }
    }
    return { ok: true }
  }

  async query(fileID: string): Promise<QueryOutcome> {
    const result = await this.exchange(formatQuery(fileID))
    if (!result.ok) {
      return { status: 'unreachable', reason: result.reason }
    }

    const reply = parseQueryResponse(result.reply)
    if (!reply) {
      return { status: 'unreachable', reason: `invalid registry reply: ${JSON.stringify(result.reply.trim())}` }
    }
    if (!reply.found) {
      return { status: 'not-found' }
    }
    return { status: 'found', length: reply.length, checksum: reply.checksum }
  }

  // Send one request, half-close, and read the reply until the registry closes
  private exchange(request: string): Promise<Exchange> {
    const { host, port } = this.config
    const timeoutMs = this.config.timeoutMs ?? DEFAULT_TIMEOUT_MS

    return new Promise((resolve) => {
      const chunks: Buffer[] = []
      let settled = false

      const socket = net.createConnection({ host, port })

      const finish = (result: Exchange): void => {
        if (settled) return
        settled = true
        clearTimeout(timer)
        socket.destroy()
        resolve(result)
      }

      const timer = setTimeout(() => {
        finish({ ok: false, reason: `registry ${host}:${port} timed out after ${timeoutMs}ms` })
      }, timeoutMs)

      socket.on('connect', () => {
        socket.end(request)
      })

      socket.on('data', (chunk: Buffer) => {
        chunks.push(chunk)
      })

      socket.on('end', () => {
        finish({ ok: true, reply: b4a.toString(b4a.concat(chunks), 'utf8') })
      })

      socket.on('error', (err: Error) => {
        finish({ ok: false, reason: `registry ${host}:${port}: ${err.message}` })
      })
    })
  }
}
