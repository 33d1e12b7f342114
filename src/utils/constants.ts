// Application constants

export const API_PREFIX = '/api/v1'

export const REQUEST_ID_HEADER = 'X-Request-ID'

// Pagination
export const PAGINATION = {
  DEFAULT_PAGE: 1,
  DEFAULT_PAGE_SIZE: 10,
  MAX_PAGE_SIZE: 100,
  // Keeps the row offset of the last page inside a 32-bit integer
  MAX_PAGE: Math.floor(2_147_483_647 / 100) + 1,
} as const

// User field limits
export const USER_LIMITS = {
  NAME_MIN_LENGTH: 2,
  NAME_MAX_LENGTH: 100,
} as const

// Path ids are signed 32-bit integers, matching the serial column
export const MAX_USER_ID = 2_147_483_647
export const MIN_USER_ID = -2_147_483_648

// Client-facing error messages
export const ERROR_MESSAGES = {
  INVALID_DATE: 'Invalid date format. Expected YYYY-MM-DD',
  INVALID_USER_ID: 'Invalid user ID',
  INVALID_PAGINATION: 'Invalid pagination parameters',
  USER_NOT_FOUND: 'User not found',
  VALIDATION_FAILED: 'Validation failed',
  INTERNAL_ERROR: 'Internal server error',
  NOT_FOUND: 'Not found',
} as const
