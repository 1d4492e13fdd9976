export * from './connection.js'
export * from './encoder.js'
export * from './errors.js'
export * from './http.js'
export * from './logger.js'
export * from './pcm.js'
export * from './personas.js'
export * from './protocol.js'
export * from './registry.js'
export * from './upstream.js'
export * from './websocket.js'
