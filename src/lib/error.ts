import type { Endpoint } from "./config"

// Bad user input (port, host, signal payload). Raised before any socket exists.
export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "ConfigError"
  }
}

// The listener could not be bound at startup. Not recoverable: with no
// listener there is nothing to serve.
export class ListenerBindError extends Error {
  readonly endpoint: Endpoint
  readonly code: string | undefined

  constructor(endpoint: Endpoint, cause: unknown, detail?: string) {
    const base = `Failed to listen on ${endpoint.host}:${endpoint.port}: ${describeError(cause)}`
    super(detail ? `${base} (${detail})` : base, { cause })
    this.name = "ListenerBindError"
    this.endpoint = endpoint
    this.code = errorCode(cause)
  }
}

// A platform display query failed or produced output we could not read.
export class ProbeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "ProbeError"
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}

// Node system errors carry a string `code` such as EADDRINUSE or ECONNREFUSED
export function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) {
    return undefined
  }
  return typeof err.code === "string" ? err.code : undefined
}
