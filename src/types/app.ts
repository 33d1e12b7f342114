import type { RequestIdVariables } from 'hono/request-id'

// Hono environment shared by the application, its routes and middleware
export type AppEnv = {
  Variables: RequestIdVariables
}
