/**
 * Custom error classes for the analysis core.
 * Every failure the core reports is one of these; none is retried or recovered locally.
 */

import type { CommitRef } from '@shared/types'

/**
 * Base error class for all application errors.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message)
    this.name = 'AppError'
  }
}

/**
 * Error thrown when a git backend call fails for a reason with no dedicated class.
 */
export class GitError extends AppError {
  constructor(
    message: string,
    public readonly operation: string,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'GitError'
  }
}

/**
 * Error thrown when a requested ref, object or control file does not exist.
 */
export class NotFoundError extends AppError {
  constructor(
    message: string,
    public readonly resourceType: 'ref' | 'commit' | 'tree' | 'blob' | 'file',
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'NotFoundError'
  }
}

/**
 * Error thrown when two tips share no ancestor.
 * Distinct from an empty divergence: the histories cannot be compared at all.
 */
export class UnrelatedHistoryError extends AppError {
  constructor(
    public readonly local: CommitRef,
    public readonly remote: CommitRef
  ) {
    super(`No common ancestor between ${local} and ${remote}`)
    this.name = 'UnrelatedHistoryError'
  }
}

/**
 * Error thrown when on-disk state (a control file, a path name) cannot be parsed or decoded.
 */
export class MalformedStateError extends AppError {
  constructor(
    message: string,
    public readonly source: string,
    public readonly line?: number,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'MalformedStateError'
  }
}

/**
 * Error thrown when a push would overwrite remote state other than what the caller expected.
 */
export class NegotiationRejectedError extends AppError {
  constructor(
    public readonly expected: CommitRef,
    public readonly advertised: CommitRef[],
    public readonly refnames: string[]
  ) {
    super(
      `Remote ${refnames.join(', ') || '(no refs)'} is at ${
        advertised.join(', ') || '(nothing advertised)'
      }, expected ${expected}`
    )
    this.name = 'NegotiationRejectedError'
  }
}

/**
 * Error thrown when a validation check fails.
 */
export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message)
    this.name = 'ValidationError'
  }
}
