import { Hono } from 'hono'
import { validator } from 'hono/validator'
import { z } from 'zod'
import { ValidationError } from '../middleware/error.middleware'
import type { UserService } from '../services/user.service'
import type { AppEnv } from '../types/app'
import type { UserPage } from '../types/user'
import { ERROR_MESSAGES, MAX_USER_ID, MIN_USER_ID, PAGINATION, USER_LIMITS } from '../utils/constants'
import { characterLength, formatValidationIssues } from '../utils/validation'

const userBodySchema = z.object({
  name: z
    .string({ required_error: 'name is required', invalid_type_error: 'name must be a string' })
    .refine(name => characterLength(name) >= USER_LIMITS.NAME_MIN_LENGTH, {
      message: `name must be at least ${USER_LIMITS.NAME_MIN_LENGTH} characters`
    })
    .refine(name => characterLength(name) <= USER_LIMITS.NAME_MAX_LENGTH, {
      message: `name must be at most ${USER_LIMITS.NAME_MAX_LENGTH} characters`
    }),
  dob: z
    .string({ required_error: 'dob is required', invalid_type_error: 'dob must be a string' })
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'dob must be in YYYY-MM-DD format'),
})

// 0 or a missing value means "use the default"
const listQuerySchema = z.object({
  page: z
    .string()
    .regex(/^\d+$/, 'page must be a non-negative integer')
    .transform(Number)
    .refine(page => page <= PAGINATION.MAX_PAGE, {
      message: `page must be at most ${PAGINATION.MAX_PAGE}`
    })
    .optional(),
  page_size: z
    .string()
    .regex(/^\d+$/, 'page_size must be a non-negative integer')
    .transform(Number)
    .refine(size => size <= PAGINATION.MAX_PAGE_SIZE, {
      message: `page_size must be at most ${PAGINATION.MAX_PAGE_SIZE}`
    })
    .optional(),
})

const ID_PATTERN = /^[+-]?\d+$/

/**
 * Parse a path id as a signed 32-bit integer
 */
export function parseUserId(raw: string | undefined): number {
  if (raw === undefined || !ID_PATTERN.test(raw)) {
    throw new ValidationError(ERROR_MESSAGES.INVALID_USER_ID)
  }

  const id = Number(raw)
  if (id < MIN_USER_ID || id > MAX_USER_ID) {
    throw new ValidationError(ERROR_MESSAGES.INVALID_USER_ID)
  }
  return id
}

function serializePage(page: UserPage) {
  return {
    users: page.users,
    total: page.total,
    page: page.page,
    page_size: page.pageSize,
    total_pages: page.totalPages,
  }
}

/**
 * User CRUD routes, mounted under /api/v1/users
 */
export function createUserRoutes(userService: UserService): Hono<AppEnv> {
  const app = new Hono<AppEnv>()

  const userBody = validator('json', value => {
    const result = userBodySchema.safeParse(value)
    if (!result.success) {
      throw new ValidationError(ERROR_MESSAGES.VALIDATION_FAILED, formatValidationIssues(result.error))
    }
    return result.data
  })

  const userIdParam = validator('param', value => ({
    id: parseUserId(value.id)
  }))

  // Create a user
  app.post('/', userBody, async c => {
    const user = await userService.createUser(c.req.valid('json'), c.req.raw.signal)
    return c.json(user, 201)
  })

  // List users, one page at a time
  app.get('/',
    validator('query', value => {
      const result = listQuerySchema.safeParse(value)
      if (!result.success) {
        throw new ValidationError(ERROR_MESSAGES.INVALID_PAGINATION, formatValidationIssues(result.error))
      }
      return result.data
    }),
    async c => {
      const { page, page_size: pageSize } = c.req.valid('query')
      const result = await userService.listUsers({ page, pageSize }, c.req.raw.signal)
      return c.json(serializePage(result))
    }
  )

  // Get a single user with their current age
  app.get('/:id', userIdParam, async c => {
    const { id } = c.req.valid('param')
    const user = await userService.getUser(id, c.req.raw.signal)
    return c.json(user)
  })

  // Replace a user's name and date of birth
  app.put('/:id', userIdParam, userBody, async c => {
    const { id } = c.req.valid('param')
    const user = await userService.updateUser(id, c.req.valid('json'), c.req.raw.signal)
    return c.json(user)
  })

  // Delete a user
  app.delete('/:id', userIdParam, async c => {
    const { id } = c.req.valid('param')
    await userService.deleteUser(id, c.req.raw.signal)
    return c.body(null, 204)
  })

  return app
}
