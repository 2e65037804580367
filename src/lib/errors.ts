import { ZodError } from 'zod'

export class NotFoundError extends Error {
  readonly status = 404

  constructor(message: string) {
    super(message)
    this.name = 'NotFoundError'
  }
}

export class ForbiddenError extends Error {
  readonly status = 403

  constructor(message: string) {
    super(message)
    this.name = 'ForbiddenError'
  }
}

export class ValidationError extends Error {
  readonly status = 400

  constructor(message: string, readonly issues: string[] = []) {
    super(message)
    this.name = 'ValidationError'
  }
}

/** Store-level failure: connection loss, constraint violation, bad query. */
export class PersistenceError extends Error {
  readonly status = 500

  constructor(message: string, readonly code?: string) {
    super(message)
    this.name = 'PersistenceError'
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

export const DATABASE_ERROR_MESSAGE = 'Sorry, there was a database error. Please try again.'

export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.')
    return path ? `${path}: ${issue.message}` : issue.message
  })
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Map a thrown error onto the JSON error shape every API route returns.
 * Unknown errors are logged with the route scope and surface as 500.
 */
export function toErrorResponse(error: unknown, scope: string): Response {
  if (error instanceof ZodError) {
    return Response.json({ error: 'Invalid request', issues: formatZodIssues(error) }, { status: 400 })
  }

  if (error instanceof ValidationError) {
    return Response.json({ error: error.message, issues: error.issues }, { status: error.status })
  }

  if (error instanceof NotFoundError || error instanceof ForbiddenError) {
    return Response.json({ error: error.message }, { status: error.status })
  }

  if (error instanceof PersistenceError) {
    console.error(`${scope} database error:`, error)
    return Response.json(
      { error: 'Database error', response_text: DATABASE_ERROR_MESSAGE },
      { status: error.status }
    )
  }

  console.error(`${scope} error:`, error)
  return Response.json({ error: 'Internal server error' }, { status: 500 })
}
