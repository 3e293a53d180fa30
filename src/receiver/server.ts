import { EventEmitter } from 'node:events'
import fs from 'node:fs'
import net from 'node:net'
import path from 'node:path'
import { finished } from 'node:stream/promises'
import { shortId } from '../utils.js'
import { TransferSession } from './session.js'
import type { ChecksumLookup } from './types.js'
import { DEFAULT_RECEIVE_TIMEOUT_MS, VERDICT_LABELS } from './types.js'
import { safeFileName } from './verdict.js'

export interface TransferReceiverConfig {
  port: number
  host?: string
  outputDir: string
  registry: ChecksumLookup
  receiveTimeoutMs?: number
}

// Each session writes its own part file, renamed onto `path` once complete
interface Sink {
  path: string
  partPath: string
  stream: fs.WriteStream
}

function discardPart(sink: Sink): void {
  const remove = (): void => {
    fs.promises.rm(sink.partPath, { force: true }).catch((err: Error) => {
      console.error(`Receiver: cannot remove ${sink.partPath}: ${err.message}`)
    })
  }
  if (sink.stream.closed) {
    remove()
  } else {
    sink.stream.once('close', remove)
  }
}

/**
 * Accepts transfer connections, one session each. Emits 'verdict' once a
 * session has been checked against the registry and 'abandoned' when the
 * peer goes away, stalls, or the output cannot be written.
 */
export class TransferReceiver extends EventEmitter {
  private server: net.Server | null = null
  private sockets: Set<net.Socket> = new Set()
  private config: TransferReceiverConfig

  constructor(config: TransferReceiverConfig) {
    super()
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
        console.log(`Transfer receiver listening on ${this.config.host ?? '127.0.0.1'}:${port}`)
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
    const session = new TransferSession()
    const tag = shortId(session.id)
    let sink: Sink | null = null
    let ended = false
    this.sockets.add(socket)

    const abandon = (reason: string): void => {
      const info = session.abandon(reason)
      if (!info) return
      console.error(`Receiver [${tag}]: session abandoned: ${reason}`)
      socket.destroy()
      if (sink) {
        sink.stream.destroy()
        discardPart(sink)
      }
      this.emit('abandoned', info)
    }

    // Blocks are queued on the output in order before they reach the checksum
    const persist = (blocks: Buffer[]): void => {
      if (!sink) return
      for (const block of blocks) {
        sink.stream.write(block)
        session.commit(block)
      }
      if (sink.stream.writableNeedDrain && !socket.isPaused()) {
        socket.pause()
        sink.stream.once('drain', () => socket.resume())
      }
    }

    const openSink = (fileID: string): Sink => {
      const outputPath = path.join(this.config.outputDir, safeFileName(fileID))
      const partPath = `${outputPath}.${session.id}.part`
      const stream = fs.createWriteStream(partPath)
      stream.on('error', (err: Error) => {
        abandon(`cannot write ${partPath}: ${err.message}`)
      })
      return { path: outputPath, partPath, stream }
    }

    const complete = async (): Promise<void> => {
      const result = session.finish()
      if (!result.ok) {
        abandon(result.reason)
        return
      }
      persist(result.blocks)

      const fileID = session.getFileId()
      if (!sink || fileID === null) {
        abandon('no output for session')
        return
      }

      sink.stream.end()
      try {
        await finished(sink.stream)
      } catch (err) {
        abandon(`cannot write ${sink.partPath}: ${err instanceof Error ? err.message : String(err)}`)
        return
      }
      if (session.isTerminal()) return

      // Sessions for the same fileID finish in turn: the last rename wins
      try {
        await fs.promises.rename(sink.partPath, sink.path)
      } catch (err) {
        abandon(`cannot write ${sink.path}: ${err instanceof Error ? err.message : String(err)}`)
        return
      }
      if (session.isTerminal()) return

      const localChecksum = session.beginVerifying()
      console.log(`Receiver [${tag}]: received ${session.bytesReceived} bytes for ${fileID} (md5 ${localChecksum})`)

      const lookup = await this.config.registry.query(fileID)
      const verdict = session.settle(lookup, sink.path)

      console.log(`${VERDICT_LABELS[verdict.outcome]} ${fileID}`)
      if (verdict.outcome === 'corrupted') {
        console.error(`Receiver [${tag}]: expected ${verdict.expectedChecksum}, got ${localChecksum}`)
      } else if (verdict.outcome === 'unverifiable') {
        console.error(`Receiver [${tag}]: no checksum registered for ${fileID} (missing or expired)`)
      } else if (verdict.outcome === 'registry-unreachable') {
        console.error(`Receiver [${tag}]: ${verdict.reason}`)
      }

      socket.end()
      this.emit('verdict', verdict)
    }

    socket.setTimeout(this.config.receiveTimeoutMs ?? DEFAULT_RECEIVE_TIMEOUT_MS)

    socket.on('data', (chunk: Buffer) => {
      const result = session.feed(chunk)
      if (!result.ok) {
        abandon(result.reason)
        return
      }
      if (result.fileID !== null) {
        console.log(`Receiver [${tag}]: receiving ${result.fileID} from ${remoteAddr}`)
        sink = openSink(result.fileID)
      }
      persist(result.blocks)
    })

    socket.on('end', () => {
      ended = true
      complete().catch((err) => {
        console.error(`Receiver [${tag}]: verification failed:`, err)
        socket.destroy()
      })
    })

    socket.on('timeout', () => {
      if (!ended) {
        abandon(`no data for ${this.config.receiveTimeoutMs ?? DEFAULT_RECEIVE_TIMEOUT_MS}ms`)
      }
    })

    socket.on('error', (err: Error) => {
      abandon(`connection error: ${err.message}`)
    })

    socket.on('close', () => {
      this.sockets.delete(socket)
      if (!ended) {
        abandon('connection closed before end of stream')
      }
    })
  }
}
