export { sendFile, type Endpoint, type SendOptions, type SendResult } from './sender.js'
