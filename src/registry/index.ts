export { ChecksumStore, type ChecksumStoreOptions } from './store.js'
export { ChecksumRegistryServer, type RegistryServerConfig } from './server.js'
export { RegistryClient, type RegistryClientConfig } from './client.js'
export { RegistrySession } from './session.js'
export * from './parser.js'
export * from './types.js'
