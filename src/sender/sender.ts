import fs from 'node:fs'
import net from 'node:net'
import { once } from 'node:events'
import { pipeline } from 'node:stream/promises'
import { BLOCK_SIZE, digestFile, type FileDigest } from '../checksum.js'
import { RegistryClient } from '../registry/client.js'
import { validateFileId } from '../registry/parser.js'
import { DEFAULT_TTL_SECONDS } from '../registry/types.js'

export interface Endpoint {
  host: string
  port: number
}

export interface SendOptions {
  receiver: Endpoint
  registry: Endpoint
  fileID: string
  filePath: string
  ttlSeconds?: number
  registryTimeoutMs?: number
}

export type SendResult =
  | { ok: true; checksum: string; length: number }
  | { ok: false; stage: 'prepare' | 'register' | 'send'; reason: string }

/**
 * Register the file's checksum, then stream the file to the receiver.
 * Registration happens first so the receiver's lookup can see it; nothing is
 * sent if it fails.
 */
export async function sendFile(options: SendOptions): Promise<SendResult> {
  const { receiver, registry, fileID, filePath } = options
  const ttlSeconds = options.ttlSeconds ?? DEFAULT_TTL_SECONDS

  const idError = validateFileId(fileID)
  if (idError) {
    return { ok: false, stage: 'prepare', reason: idError }
  }
  if (!fs.existsSync(filePath)) {
    return { ok: false, stage: 'prepare', reason: `File not found: ${filePath}` }
  }

  let digest: FileDigest
  try {
    digest = await digestFile(filePath)
  } catch (err) {
    return { ok: false, stage: 'prepare', reason: `Cannot read ${filePath}: ${errorMessage(err)}` }
  }

  const client = new RegistryClient({ ...registry, timeoutMs: options.registryTimeoutMs })
  const registered = await client.register(fileID, ttlSeconds, digest.length, digest.checksum)
  if (!registered.ok) {
    return { ok: false, stage: 'register', reason: registered.reason }
  }
  console.log(`Sender: registered ${fileID} (${digest.length} bytes, md5 ${digest.checksum}, ttl ${ttlSeconds}s)`)

  try {
    await streamFile(receiver, fileID, filePath)
  } catch (err) {
    return { ok: false, stage: 'send', reason: errorMessage(err) }
  }
  console.log(`Sender: sent ${filePath} as ${fileID}`)

  return { ok: true, checksum: digest.checksum, length: digest.length }
}

// fileID line, then the raw bytes, then half-close to mark end of file
async function streamFile(receiver: Endpoint, fileID: string, filePath: string): Promise<void> {
  const socket = net.createConnection({ host: receiver.host, port: receiver.port })
  socket.on('error', (err: Error) => {
    console.error(`Sender: receiver connection error: ${err.message}`)
  })

  socket.write(`${fileID}\n`)
  await pipeline(fs.createReadStream(filePath, { highWaterMark: BLOCK_SIZE }), socket)

  // The receiver closes its side once it has read everything
  if (!socket.closed) {
    await once(socket, 'close')
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
