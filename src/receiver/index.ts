export { TransferReceiver, type TransferReceiverConfig } from './server.js'
export { TransferSession, type FeedResult } from './session.js'
export { classifyVerdict, safeFileName, type Classification } from './verdict.js'
export * from './types.js'
