export type ErrorKind =
  | 'configuration'
  | 'transport'
  | 'malformed_input'
  | 'persistence'

/**
 * Base class for the server's error taxonomy. `kind` lets log lines and
 * handlers branch without instanceof chains.
 */
export abstract class AppError extends Error {
  abstract readonly kind: ErrorKind

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Invalid race or server settings. Fatal for whatever was being built. */
export class ConfigurationError extends AppError {
  readonly kind = 'configuration' as const
}

/** A single send/receive failure, local to one connection. */
export class TransportError extends AppError {
  readonly kind = 'transport' as const

  constructor(
    readonly connectionId: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
  }
}

/** Bad client command payload. Logged and ignored. */
export class MalformedInputError extends AppError {
  readonly kind = 'malformed_input' as const

  constructor(
    message: string,
    readonly raw?: string,
  ) {
    super(message)
  }
}

/** A result-save failure for one racer. */
export class PersistenceError extends AppError {
  readonly kind = 'persistence' as const

  constructor(
    readonly raceId: string,
    readonly racerId: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message
  return String(e)
}
