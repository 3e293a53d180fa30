import { EventEmitter } from 'node:events'
import fs from 'node:fs'
import net from 'node:net'
import os from 'node:os'
import path from 'node:path'

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `netcopy-${prefix}-`))
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true })
}

// Write a payload, optionally half-close, and collect everything the server sends back
export function rawExchange(port: number, payload: string | Buffer, halfClose = true): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = []
    const socket = net.createConnection({ host: '127.0.0.1', port }, () => {
      if (halfClose) {
        socket.end(payload)
      } else {
        socket.write(payload)
      }
    })
    socket.on('data', (chunk: Buffer) => chunks.push(chunk))
    socket.on('error', reject)
    socket.on('close', () => resolve(Buffer.concat(chunks).toString('utf8')))
  })
}

export function nextEvent<T>(emitter: EventEmitter, name: string): Promise<T> {
  return new Promise((resolve) => {
    emitter.once(name, (value: T) => resolve(value))
  })
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

// A port nothing listens on
export async function closedPort(): Promise<number> {
  const server = net.createServer()
  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', () => resolve()))
  const addr = server.address()
  const port = (addr && typeof addr === 'object') ? addr.port : 0
  await new Promise<void>(resolve => server.close(() => resolve()))
  return port
}
