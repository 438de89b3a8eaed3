export class SubscriptionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "SubscriptionError"
  }
}

/** Bad caller input: URL scheme, filter bounds, regex, duplicate URL. Never retried. */
export class ValidationError extends SubscriptionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "ValidationError"
  }
}

/** The subscription URL could not be downloaded. */
export class FetchError extends SubscriptionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "FetchError"
  }
}

/** The download worked but yielded no usable endpoint descriptor. */
export class ParseError extends SubscriptionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "ParseError"
  }
}

export function errorMessage(e: unknown) {
  if (e instanceof Error) return e.message || e.name
  return String(e)
}

// One line for logs: message, aggregated members and the cause chain.
export function describeError(e: unknown): string {
  if (e instanceof AggregateError) {
    const causes = e.errors.map((x) => errorMessage(x)).join(" | ")
    return causes ? `${e.message}; causes=${causes}` : e.message
  }
  if (e instanceof Error) {
    const cause = e.cause
    if (cause != null && cause !== e) return `${errorMessage(e)} (cause=${describeError(cause)})`
    return errorMessage(e)
  }
  return String(e)
}
