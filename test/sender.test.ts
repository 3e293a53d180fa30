import { describe, test, before, after } from 'node:test'
import assert from 'node:assert/strict'
import fs from 'node:fs'
import net from 'node:net'
import path from 'node:path'
import { createHash } from 'node:crypto'
import { sendFile } from '../src/sender/sender.js'
import { ChecksumRegistryServer } from '../src/registry/server.js'
import { ChecksumStore } from '../src/registry/store.js'
import { closedPort, makeTempDir, removeDir } from './helpers.js'

// Collects each connection's bytes and closes once the sender half-closes
class CaptureServer {
  received: Buffer[] = []
  connections = 0
  private server = net.createServer({ allowHalfOpen: true }, (socket) => {
    this.connections++
    const chunks: Buffer[] = []
    socket.on('data', (chunk: Buffer) => chunks.push(chunk))
    socket.on('end', () => {
      this.received.push(Buffer.concat(chunks))
      socket.end()
    })
  })

  start(): Promise<number> {
    return new Promise((resolve) => {
      this.server.listen(0, '127.0.0.1', () => {
        const addr = this.server.address()
        resolve((addr && typeof addr === 'object') ? addr.port : 0)
      })
    })
  }

  stop(): Promise<void> {
    return new Promise(resolve => this.server.close(() => resolve()))
  }
}

describe('sendFile', () => {
  const dir = makeTempDir('sender')
  const store = new ChecksumStore()
  const registry = new ChecksumRegistryServer({ port: 0, store })
  const capture = new CaptureServer()
  let registryPort = 0
  let receiverPort = 0

  before(async () => {
    registryPort = await registry.start()
    receiverPort = await capture.start()
  })

  after(async () => {
    await registry.stop()
    await capture.stop()
    store.destroy()
    removeDir(dir)
  })

  test('registers the checksum, then streams the id line and the bytes', async () => {
    const data = Buffer.alloc(9000)
    for (let i = 0; i < data.length; i++) data[i] = i % 199
    const filePath = path.join(dir, 'payload.bin')
    fs.writeFileSync(filePath, data)
    const checksum = createHash('md5').update(data).digest('hex')

    const result = await sendFile({
      receiver: { host: '127.0.0.1', port: receiverPort },
      registry: { host: '127.0.0.1', port: registryPort },
      fileID: 'payload',
      filePath,
      ttlSeconds: 30
    })

    assert.deepEqual(result, { ok: true, checksum, length: 9000 })
    assert.deepEqual(store.query('payload'), { length: 9000, checksum })
    assert.deepEqual(capture.received.at(-1), Buffer.concat([Buffer.from('payload\n'), data]))
  })

  test('a missing file fails before any network activity', async () => {
    const seen = capture.connections
    const result = await sendFile({
      receiver: { host: '127.0.0.1', port: receiverPort },
      registry: { host: '127.0.0.1', port: registryPort },
      fileID: 'ghost',
      filePath: path.join(dir, 'ghost.bin')
    })

    assert.deepEqual(result, { ok: false, stage: 'prepare', reason: `File not found: ${path.join(dir, 'ghost.bin')}` })
    assert.equal(capture.connections, seen)
    assert.equal(store.query('ghost'), null)
  })

  test('an invalid file id fails before any network activity', async () => {
    const filePath = path.join(dir, 'ok.txt')
    fs.writeFileSync(filePath, 'ok')

    const result = await sendFile({
      receiver: { host: '127.0.0.1', port: receiverPort },
      registry: { host: '127.0.0.1', port: registryPort },
      fileID: 'bad|id',
      filePath
    })

    assert.deepEqual(result, { ok: false, stage: 'prepare', reason: 'File ID cannot contain "|"' })
  })

  test('nothing is sent when registration fails', async () => {
    const filePath = path.join(dir, 'unsent.txt')
    fs.writeFileSync(filePath, 'unsent')
    const seen = capture.connections

    const result = await sendFile({
      receiver: { host: '127.0.0.1', port: receiverPort },
      registry: { host: '127.0.0.1', port: await closedPort() },
      fileID: 'unsent',
      filePath
    })

    assert.equal(result.ok, false)
    assert.equal(!result.ok && result.stage, 'register')
    assert.equal(capture.connections, seen)
  })

  test('an unreachable receiver fails at the send stage', async () => {
    const filePath = path.join(dir, 'lost.txt')
    fs.writeFileSync(filePath, 'lost')

    const result = await sendFile({
      receiver: { host: '127.0.0.1', port: await closedPort() },
      registry: { host: '127.0.0.1', port: registryPort },
      fileID: 'lost',
      filePath
    })

    assert.equal(!result.ok && result.stage, 'send')
    assert.deepEqual(store.query('lost'), { length: 4, checksum: createHash('md5').update('lost').digest('hex') })
  })
})
