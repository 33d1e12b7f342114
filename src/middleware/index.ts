// Middleware exports
export * from './cors.middleware'
export * from './error.middleware'
export * from './logger.middleware'
