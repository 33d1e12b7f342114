import type { ZodError } from 'zod'

/**
 * One message per failed field, prefixed with the field path when there is one
 */
export function formatValidationIssues(error: ZodError): string[] {
  return error.errors.map(issue => {
    const path = issue.path.join('.')
    return path ? `${path}: ${issue.message}` : issue.message
  })
}

// Length in characters (code points), not UTF-16 units
export function characterLength(value: string): number {
  return Array.from(value).length
}
