import net from 'node:net'
import b4a from 'b4a'
import { generateId, shortId } from '../utils.js'
import { RegistrySession } from './session.js'
import type { ChecksumStore } from './store.js'
import { MAX_REQUEST_BYTES } from './types.js'

export interface RegistryServerConfig {
  port: number
  host?: string
  store: ChecksumStore
  requestTimeoutMs?: number
}

const DEFAULT_REQUEST_TIMEOUT_MS = 30000

export class ChecksumRegistryServer {
  private server: net.Server | null = null
  private sockets: Set<net.Socket> = new Set()
  private config: RegistryServerConfig

  constructor(config: RegistryServerConfig) {
    this.config = config
  }

  start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = net.createServer({ allowHalfOpen: true })
      this.server = server

      server.on('connection', (socket: net.Socket) => {
        this.handleConnection(socket)
      })

      server.on('error', (err: Error) => {
        reject(err)
      })

      server.listen(this.config.port, this.config.host ?? '127.0.0.1', () => {
        const addr = server.address()
        const port = (addr && typeof addr === 'object') ? addr.port : this.config.port
        console.log(`Checksum registry listening on ${this.config.host ?? '127.0.0.1'}:${port}`)
        resolve(port)
      })
    })
  }

  stop(): Promise<void> {
    return new Promise((resolve) => {
      const server = this.server
      if (!server) {
        resolve()
        return
      }
      for (const socket of this.sockets) {
        socket.destroy()
      }
      server.close(() => {
        this.server = null
        resolve()
      })
    })
  }

  private handleConnection(socket: net.Socket): void {
    const remoteAddr = socket.remoteAddress ?? 'unknown'
    const sessionId = generateId()
    const session = new RegistrySession({ store: this.config.store, sessionId })
    this.sockets.add(socket)

    let buffer = b4a.alloc(0)

    const reply = (line: string): void => {
      const response = session.processLine(line)
      if (response !== null) {
        socket.end(response)
      }
    }

    socket.setTimeout(this.config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS)

    socket.on('data', (chunk: Buffer) => {
      if (session.isAnswered()) return
      buffer = b4a.concat([buffer, chunk])

      const lineEnd = buffer.indexOf(0x0a)
      if (lineEnd !== -1) {
        reply(b4a.toString(buffer, 'utf8', 0, lineEnd).replace(/\r$/, ''))
        return
      }

      if (buffer.length > MAX_REQUEST_BYTES) {
        const response = session.reject(`request exceeds ${MAX_REQUEST_BYTES} bytes`)
        if (response !== null) {
          socket.end(response)
        }
      }
    })

    // Peer half-closed without a newline: the buffered bytes are the request
    socket.on('end', () => {
      if (session.isAnswered()) return
      if (buffer.length > 0) {
        reply(b4a.toString(buffer, 'utf8'))
        return
      }
      const response = session.reject('empty request')
      if (response !== null) {
        socket.end(response)
      }
    })

    socket.on('timeout', () => {
      if (!session.isAnswered()) {
        console.error(`Registry [${shortId(sessionId)}]: request timed out from ${remoteAddr}`)
      }
      socket.destroy()
    })

    socket.on('error', (err: Error) => {
      console.error(`Registry [${shortId(sessionId)}]: socket error: ${err.message}`)
    })

    socket.on('close', () => {
      this.sockets.delete(socket)
    })
  }
}
