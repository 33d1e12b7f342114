// Route exports
export { createHealthRoutes } from './health.routes'
export { createUserRoutes, parseUserId } from './users.routes'
