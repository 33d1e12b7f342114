// Error handling middleware
import type { ErrorHandler, NotFoundHandler } from 'hono'
import { HTTPException } from 'hono/http-exception'
import type { ContentfulStatusCode } from 'hono/utils/http-status'
import type { AppEnv } from '../types/app'
import { ERROR_MESSAGES } from '../utils/constants'

export enum ErrorCode {
  // Validation errors
  VALIDATION_ERROR = 'VALID_001',
  INVALID_DATE = 'VALID_002',

  // Resource errors
  RESOURCE_NOT_FOUND = 'RES_001',

  // System errors
  DATABASE_ERROR = 'SYS_002',
}

export interface ErrorResponse {
  error: string
  request_id: string
  details?: string[]
}

// Malformed request body, path or query; details carry one message per field
export class ValidationError extends Error {
  public code = ErrorCode.VALIDATION_ERROR

  constructor(
    message: string,
    public details: string[] = []
  ) {
    super(message)
    this.name = 'ValidationError'
  }
}

export class InvalidDateError extends Error {
  public code = ErrorCode.INVALID_DATE

  constructor(message: string = ERROR_MESSAGES.INVALID_DATE) {
    super(message)
    this.name = 'InvalidDateError'
  }
}

export class NotFoundError extends Error {
  public code = ErrorCode.RESOURCE_NOT_FOUND

  constructor(message: string = ERROR_MESSAGES.USER_NOT_FOUND) {
    super(message)
    this.name = 'NotFoundError'
  }
}

/**
 * Any failure of the backing store. The message is safe to show to clients;
 * the driver error stays in `cause`.
 */
export class StorageError extends Error {
  public code = ErrorCode.DATABASE_ERROR

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'StorageError'
  }
}

function errorBody(message: string, requestId: string | undefined, details?: string[]): ErrorResponse {
  return {
    error: message,
    request_id: requestId ?? '',
    ...(details && details.length > 0 && { details })
  }
}

function statusFor(error: Error): ContentfulStatusCode {
  if (error instanceof HTTPException) {
    return error.status
  }
  if (error instanceof ValidationError || error instanceof InvalidDateError) {
    return 400
  }
  if (error instanceof NotFoundError) {
    return 404
  }
  return 500
}

export const errorHandler: ErrorHandler<AppEnv> = (error, c) => {
  const requestId: string | undefined = c.get('requestId')
  const status = statusFor(error)

  if (error instanceof ValidationError) {
    return c.json(errorBody(error.message, requestId, error.details), status)
  }

  if (
    error instanceof HTTPException ||
    error instanceof InvalidDateError ||
    error instanceof NotFoundError ||
    error instanceof StorageError
  ) {
    return c.json(errorBody(error.message || ERROR_MESSAGES.INTERNAL_ERROR, requestId), status)
  }

  // Unexpected errors are logged in full but never echoed to the caller
  console.error(`[${requestId ?? '-'}] Unhandled error:`, error)
  return c.json(errorBody(ERROR_MESSAGES.INTERNAL_ERROR, requestId), 500)
}

export const notFoundHandler: NotFoundHandler<AppEnv> = c => {
  return c.json(errorBody(ERROR_MESSAGES.NOT_FOUND, c.get('requestId')), 404)
}
