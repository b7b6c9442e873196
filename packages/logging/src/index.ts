export * from './types.js'
export { makeClientBuffer } from './buffer.js'
export { CHANNELS, channelPrefix } from './channels.js'
export { createLogger } from './pino.js'
