#!/usr/bin/env node
import fs from 'node:fs'
import { ChecksumStore, ChecksumRegistryServer, RegistryClient } from './registry/index.js'
import { TransferReceiver, type Verdict } from './receiver/index.js'
import { sendFile } from './sender/index.js'
import { loadConfig, getConfigPath, resolveSettings } from './config.js'
import { parsePort } from './utils.js'
import { BLOCK_SIZE } from './checksum.js'

const config = loadConfig()
const settings = resolveSettings(config)

function printUsage(): void {
  console.log(`
netcopy - File transfer with registry-backed checksum verification

Usage:
  netcopy <command> [options]

Commands:
  registry <ip> <port>
      Run the checksum registry
  receive <bind_ip> <bind_port> <chsum_ip> <chsum_port> <out_dir> [--once]
      Receive files into out_dir and verify them against the registry
  send <srv_ip> <srv_port> <chsum_ip> <chsum_port> <file_id> <file_path>
      Register a file's checksum and send it to a receiver
  config
      Show effective settings
  help
      Show this help message

Environment Variables:
  NETCOPY_HOME                 Config directory (default: ~/.netcopy)
  NETCOPY_TTL                  Checksum time-to-live in seconds (default: 60)
  NETCOPY_REGISTRY_TIMEOUT_MS  Registry connect/reply timeout (default: 5000)

Config: ${getConfigPath()}
`)
}

function fail(message: string, usage?: string): never {
  console.error(`Error: ${message}`)
  if (usage) {
    console.error(`Usage: ${usage}`)
  }
  process.exit(1)
}

function requirePort(value: string | undefined, name: string, usage: string, allowEphemeral = false): number {
  const port = parsePort(value, allowEphemeral)
  if (port === null) {
    fail(`${name} must be an integer between ${allowEphemeral ? 0 : 1} and 65535`, usage)
  }
  return port
}

function onShutdown(stop: () => Promise<void>): void {
  let isShuttingDown = false
  const shutdown = async (): Promise<void> => {
    if (isShuttingDown) return
    isShuttingDown = true
    console.log('')
    console.log('Shutting down...')
    try {
      await stop()
    } catch (err) {
      console.error('  Error during shutdown:', err)
    }
    console.log('Goodbye!')
    process.exit(0)
  }

  process.on('SIGINT', shutdown)
  process.on('SIGTERM', shutdown)
}

async function runRegistry(args: string[]): Promise<void> {
  const usage = 'netcopy registry <ip> <port>'
  if (args.length !== 2) fail('expected 2 arguments', usage)
  const [host] = args
  const port = requirePort(args[1], 'Port', usage, true)

  const store = new ChecksumStore()
  store.startSweeping(settings.sweepIntervalMs)

  const server = new ChecksumRegistryServer({
    host,
    port,
    store,
    requestTimeoutMs: settings.requestTimeoutMs
  })

  try {
    await server.start()
  } catch (err) {
    fail(`cannot start registry: ${err instanceof Error ? err.message : String(err)}`)
  }

  onShutdown(async () => {
    await server.stop()
    console.log(`  Registry stopped (${store.size()} checksum(s) dropped)`)
    store.destroy()
  })
}

async function runReceiver(args: string[]): Promise<void> {
  const usage = 'netcopy receive <bind_ip> <bind_port> <chsum_ip> <chsum_port> <out_dir> [--once]'
  const once = args.includes('--once')
  const positional = args.filter(arg => arg !== '--once')
  if (positional.length !== 5) fail('expected 5 arguments', usage)

  const [host, , registryHost = '', , outputDir = ''] = positional
  const port = requirePort(positional[1], 'Bind port', usage, true)
  const registryPort = requirePort(positional[3], 'Checksum port', usage)

  if (!fs.existsSync(outputDir) || !fs.statSync(outputDir).isDirectory()) {
    fail(`Output directory does not exist: ${outputDir}`)
  }

  const receiver = new TransferReceiver({
    host,
    port,
    outputDir,
    registry: new RegistryClient({
      host: registryHost,
      port: registryPort,
      timeoutMs: settings.registryTimeoutMs
    }),
    receiveTimeoutMs: settings.receiveTimeoutMs
  })

  try {
    await receiver.start()
  } catch (err) {
    fail(`cannot start receiver: ${err instanceof Error ? err.message : String(err)}`)
  }

  if (once) {
    // Serve a single session and exit 0 only for a matching checksum
    const exitAfter = (code: number): void => {
      receiver.stop().then(
        () => process.exit(code),
        (err) => {
          console.error('Error stopping receiver:', err)
          process.exit(1)
        }
      )
    }
    receiver.once('verdict', (verdict: Verdict) => exitAfter(verdict.outcome === 'ok' ? 0 : 1))
    receiver.once('abandoned', () => exitAfter(1))
  }

  onShutdown(() => receiver.stop())
}

async function runSender(args: string[]): Promise<void> {
  const usage = 'netcopy send <srv_ip> <srv_port> <chsum_ip> <chsum_port> <file_id> <file_path>'
  if (args.length !== 6) fail('expected 6 arguments', usage)

  const [host = '', , registryHost = '', , fileID = '', filePath = ''] = args
  const port = requirePort(args[1], 'Receiver port', usage)
  const registryPort = requirePort(args[3], 'Checksum port', usage)

  const result = await sendFile({
    receiver: { host, port },
    registry: { host: registryHost, port: registryPort },
    fileID,
    filePath,
    ttlSeconds: settings.checksumTtlSeconds,
    registryTimeoutMs: settings.registryTimeoutMs
  })

  if (!result.ok) {
    console.error(`Error (${result.stage}): ${result.reason}`)
    console.error('File transfer failed')
    process.exit(1)
  }

  console.log(`File ${filePath} transferred with ID ${fileID}`)
}

function showConfig(): void {
  console.log('Current configuration:')
  console.log(`  Config file: ${getConfigPath()}`)
  console.log(`  Checksum TTL: ${config.checksumTtlSeconds ?? '(not set)'}`)
  console.log(`  Registry timeout: ${config.registryTimeoutMs ?? '(not set)'}`)
  console.log(`  Receive timeout: ${config.receiveTimeoutMs ?? '(not set)'}`)
  console.log(`  Request timeout: ${config.requestTimeoutMs ?? '(not set)'}`)
  console.log(`  Sweep interval: ${config.sweepIntervalMs ?? '(not set)'}`)
  console.log('')
  console.log('Effective settings:')
  console.log(`  checksumTtlSeconds: ${settings.checksumTtlSeconds}`)
  console.log(`  registryTimeoutMs: ${settings.registryTimeoutMs}`)
  console.log(`  receiveTimeoutMs: ${settings.receiveTimeoutMs}`)
  console.log(`  requestTimeoutMs: ${settings.requestTimeoutMs}`)
  console.log(`  sweepIntervalMs: ${settings.sweepIntervalMs}${settings.sweepIntervalMs === 0 ? ' (disabled)' : ''}`)
  console.log(`  block size: ${BLOCK_SIZE}`)
}

async function main(): Promise<void> {
  const args = process.argv.slice(2)

  if (args.length === 0) {
    printUsage()
    process.exit(0)
  }

  const [command, ...rest] = args

  switch (command) {
    case 'registry':
      await runRegistry(rest)
      break

    case 'receive':
      await runReceiver(rest)
      break

    case 'send':
      await runSender(rest)
      break

    case 'config':
      showConfig()
      break

    case 'help':
    case '--help':
    case '-h':
      printUsage()
      break

    default:
      console.error(`Unknown command: ${command}`)
      console.error('Run "netcopy help" for usage.')
      process.exit(1)
  }
}

main().catch((err) => {
  console.error('Fatal error:', err)
  process.exit(1)
})
