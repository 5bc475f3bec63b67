/**
 * Base class for every error raised while loading, compiling or rendering CRDs.
 */
export class CrdGenError extends Error {
  override name: string = "CrdGenError"

  /** The underlying error, if any */
  public override readonly cause: unknown

  constructor(message: string, options?: { cause?: unknown }) {
    super(message)
    this.cause = options?.cause

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }

  /**
   * Create a CrdGenError from an unknown thrown value
   */
  static from(err: unknown): CrdGenError {
    if (err instanceof CrdGenError) {
      return err
    }

    if (err instanceof Error) {
      return new CrdGenError(err.message, { cause: err })
    }

    return new CrdGenError(String(err), { cause: err })
  }
}

/**
 * A CRD source could not be read or fetched.
 */
export class InputError extends CrdGenError {
  override name = "InputError" as const

  /** File path or URL that failed */
  public readonly source: string

  constructor(options: { source: string; message: string; cause?: unknown }) {
    super(`Cannot read CRD from ${options.source}: ${options.message}`, { cause: options.cause })
    this.source = options.source
  }
}

/**
 * A CRD document is malformed, or none of its versions matches the selection criterion.
 */
export class SchemaError extends CrdGenError {
  override name = "SchemaError" as const

  /** Kind of the offending resource, when known */
  public readonly kind?: string

  /** File path or URL the document came from, when known */
  public readonly source?: string

  constructor(options: { message: string; kind?: string; source?: string; cause?: unknown }) {
    const subject = options.kind ?? options.source
    super(subject ? `${subject}: ${options.message}` : options.message, { cause: options.cause })
    this.kind = options.kind
    this.source = options.source
  }
}

/**
 * Side of a consistency check: which resource, and the value it carries
 */
export interface ConsistencySide {
  kind: string
  value: string
}

/**
 * Two resources of one batch disagree on their API group or version.
 */
export class ConsistencyError extends CrdGenError {
  override name = "ConsistencyError" as const

  /** The field the resources disagree on */
  public readonly field: "group" | "version"

  public readonly first: ConsistencySide

  public readonly second: ConsistencySide

  constructor(options: { field: "group" | "version"; first: ConsistencySide; second: ConsistencySide }) {
    const { field, first, second } = options
    super(`Not all CRDs have the same ${field}: ${first.kind} has ${field} "${first.value}", ${second.kind} has ${field} "${second.value}"`)
    this.field = field
    this.first = first
    this.second = second
  }
}
