import { shortId } from '../utils.js'
import type { ChecksumStore } from './store.js'
import { parseRequest, formatQueryResponse } from './parser.js'
import { ERR_RESPONSE, OK_RESPONSE } from './types.js'

export interface RegistrySessionConfig {
  store: ChecksumStore
  sessionId: string
}

export class RegistrySession {
  private config: RegistrySessionConfig
  private answered = false

  constructor(config: RegistrySessionConfig) {
    this.config = config
  }

  isAnswered(): boolean {
    return this.answered
  }

  reject(reason: string): string | null {
    if (this.answered) return null
    this.answered = true
    console.error(`Registry [${shortId(this.config.sessionId)}]: ${reason}`)
    return ERR_RESPONSE
  }

  // One request per connection: later lines get no reply
  processLine(line: string): string | null {
    if (this.answered) return null
    this.answered = true

    const tag = shortId(this.config.sessionId)
    const request = parseRequest(line)
    if (!request) {
      console.error(`Registry [${tag}]: malformed request: ${JSON.stringify(line.slice(0, 80))}`)
      return ERR_RESPONSE
    }

    switch (request.command) {
      case 'BE': {
        this.config.store.register(request.fileID, request.ttlSeconds, request.length, request.checksum)
        console.log(`Registry [${tag}]: stored checksum for ${request.fileID} (ttl ${request.ttlSeconds}s)`)
        return OK_RESPONSE
      }
      case 'KI': {
        const entry = this.config.store.query(request.fileID)
        if (!entry) {
          console.log(`Registry [${tag}]: no checksum for ${request.fileID}`)
        }
        return formatQueryResponse(entry)
      }
    }
  }
}
