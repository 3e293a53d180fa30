import { describe, test, before, after } from 'node:test'
import assert from 'node:assert/strict'
import net from 'node:net'
import { ChecksumRegistryServer } from '../src/registry/server.js'
import { ChecksumStore } from '../src/registry/store.js'
import { RegistryClient } from '../src/registry/client.js'
import { closedPort, rawExchange } from './helpers.js'

const SUM = '5d41402abc4b2a76b9719d911017c592'
const OTHER_SUM = '7d793037a0760186574b0282f2f435e7'

describe('ChecksumRegistryServer', () => {
  const store = new ChecksumStore()
  const server = new ChecksumRegistryServer({ port: 0, store, requestTimeoutMs: 200 })
  let port = 0

  before(async () => {
    port = await server.start()
  })

  after(async () => {
    await server.stop()
    store.destroy()
  })

  test('register then query from separate connections', async () => {
    assert.equal(await rawExchange(port, `BE|report|60|11|${SUM}\n`), 'OK')
    assert.equal(await rawExchange(port, 'KI|report\n'), `11|${SUM}`)
    assert.equal(await rawExchange(port, 'KI|unknown\n'), '0|')
  })

  test('replies as soon as the newline arrives, before the client half-closes', async () => {
    assert.equal(await rawExchange(port, 'KI|never-registered\n', false), '0|')
  })

  test('a request without a newline is read at half-close', async () => {
    assert.equal(await rawExchange(port, `BE|no-newline|60|3|${SUM}`), 'OK')
    assert.deepEqual(store.query('no-newline'), { length: 3, checksum: SUM })
  })

  test('CRLF line endings are accepted', async () => {
    assert.equal(await rawExchange(port, 'KI|report\r\n'), `11|${SUM}`)
  })

  test('unknown commands answer ERR', async () => {
    assert.equal(await rawExchange(port, 'PING\n'), 'ERR')
  })

  test('malformed requests do not disturb existing records', async () => {
    await rawExchange(port, `BE|stable|60|4|${SUM}\n`)
    assert.equal(await rawExchange(port, 'BE|stable|60|4|nothex\n'), 'ERR')
    assert.equal(await rawExchange(port, 'KI|stable|x\n'), 'ERR')
    assert.equal(await rawExchange(port, 'KI|stable\n'), `4|${SUM}`)
  })

  test('only the first request on a connection is answered', async () => {
    const reply = await rawExchange(port, `BE|first|60|1|${SUM}\nBE|second|60|2|${SUM}\n`)
    assert.equal(reply, 'OK')
    assert.equal(store.query('second'), null)
  })

  test('an over-long request answers ERR', async () => {
    assert.equal(await rawExchange(port, 'K'.repeat(2000), false), 'ERR')
  })

  test('a silent connection is dropped without a reply', async () => {
    assert.equal(await rawExchange(port, '', false), '')
  })

  test('an empty request answers ERR', async () => {
    assert.equal(await rawExchange(port, ''), 'ERR')
  })

  test('concurrent registers for distinct ids are all stored', async () => {
    const count = 50
    const replies = await Promise.all(
      Array.from({ length: count }, (_, i) =>
        rawExchange(port, `BE|concurrent-${i}|60|${i}|${i % 2 === 0 ? SUM : OTHER_SUM}\n`)
      )
    )
    assert.deepEqual(replies, Array.from({ length: count }, () => 'OK'))

    const answers = await Promise.all(
      Array.from({ length: count }, (_, i) => rawExchange(port, `KI|concurrent-${i}\n`))
    )
    answers.forEach((answer, i) => {
      assert.equal(answer, `${i}|${i % 2 === 0 ? SUM : OTHER_SUM}`)
    })
  })

  test('the last of two registers wins', async () => {
    await rawExchange(port, `BE|twice|60|5|${SUM}\n`)
    await rawExchange(port, `BE|twice|60|6|${OTHER_SUM}\n`)
    assert.equal(await rawExchange(port, 'KI|twice\n'), `6|${OTHER_SUM}`)
  })
})

describe('RegistryClient', () => {
  const store = new ChecksumStore()
  const server = new ChecksumRegistryServer({ port: 0, store })
  let port = 0

  before(async () => {
    port = await server.start()
  })

  after(async () => {
    await server.stop()
    store.destroy()
  })

  test('register then query round-trips through the server', async () => {
    const client = new RegistryClient({ host: '127.0.0.1', port })
    assert.deepEqual(await client.register('report', 60, 11, SUM), { ok: true })
    assert.deepEqual(await client.query('report'), { status: 'found', length: 11, checksum: SUM })
  })

  test('query for an unknown id is not-found', async () => {
    const client = new RegistryClient({ host: '127.0.0.1', port })
    assert.deepEqual(await client.query('unknown'), { status: 'not-found' })
  })

  test('a rejected register reports the reply', async () => {
    const client = new RegistryClient({ host: '127.0.0.1', port })
    assert.deepEqual(await client.register('report', 60, 11, 'bad'), {
      ok: false,
      reason: 'unexpected registry reply: "ERR"'
    })
  })

  test('a query reply of ERR counts as unreachable', async () => {
    const client = new RegistryClient({ host: '127.0.0.1', port })
    assert.deepEqual(await client.query('a|b'), {
      status: 'unreachable',
      reason: 'invalid registry reply: "ERR"'
    })
  })

  test('a refused connection is unreachable', async () => {
    const client = new RegistryClient({ host: '127.0.0.1', port: await closedPort() })
    const outcome = await client.query('report')
    assert.equal(outcome.status, 'unreachable')

    const result = await client.register('report', 60, 11, SUM)
    assert.equal(result.ok, false)
  })

  test('a registry that never answers times out', async () => {
    const held: net.Socket[] = []
    const silent = net.createServer({ allowHalfOpen: true }, (socket) => {
      held.push(socket)
    })
    await new Promise<void>(resolve => silent.listen(0, '127.0.0.1', () => resolve()))
    const addr = silent.address()
    const silentPort = (addr && typeof addr === 'object') ? addr.port : 0

    try {
      const client = new RegistryClient({ host: '127.0.0.1', port: silentPort, timeoutMs: 100 })
      assert.deepEqual(await client.query('report'), {
        status: 'unreachable',
        reason: `registry 127.0.0.1:${silentPort} timed out after 100ms`
      })
    } finally {
      for (const socket of held) socket.destroy()
      await new Promise<void>(resolve => silent.close(() => resolve()))
    }
  })
})
