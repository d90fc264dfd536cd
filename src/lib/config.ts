import { ConfigError } from "./error"

export const DEFAULT_WATCH_HOST = "127.0.0.1"
export const DEFAULT_LISTEN_HOST = "0.0.0.0"
export const DEFAULT_PORT = 12345
export const DEFAULT_SIGNAL = "sleep_display"

// The detector samples the display once per second
export const POLL_INTERVAL_MS = 1000
// Largest payload we send, and the slice size the listener matches against
export const MAX_SIGNAL_BYTES = 1024
export const CONNECT_TIMEOUT_MS = 5000

export interface Endpoint {
  host: string
  port: number
}

export interface WatchConfig {
  target: Readonly<Endpoint>
  content: string
}

export interface ListenConfig {
  bind: Readonly<Endpoint>
  signal: string
}

export function parsePort(raw: string | number): number {
  const text = String(raw).trim()
  if (!/^\d+$/.test(text)) {
    throw new ConfigError(`Invalid port number: ${String(raw)}`)
  }
  const port = Number.parseInt(text, 10)
  if (port < 1 || port > 65535) {
    throw new ConfigError(`Port number ${port} must be between 1-65535`)
  }
  return port
}

export function parseHost(raw: string): string {
  const host = raw.trim()
  if (host.length === 0) {
    throw new ConfigError("Host must not be empty")
  }
  return host
}

export function parseSignal(raw: string): string {
  if (raw.length === 0) {
    throw new ConfigError("Signal message must not be empty")
  }
  const size = Buffer.byteLength(raw, "utf8")
  if (size > MAX_SIGNAL_BYTES) {
    throw new ConfigError(
      `Signal message is ${size} bytes; at most ${MAX_SIGNAL_BYTES} are allowed`,
    )
  }
  return raw
}

export interface RawWatchArgs {
  host?: string
  port?: string | number
  content?: string
}

export interface RawListenArgs {
  ip?: string
  port?: string | number
  signal?: string
}

export function resolveWatchConfig(args: RawWatchArgs): WatchConfig {
  return Object.freeze({
    target: Object.freeze({
      host: parseHost(args.host ?? DEFAULT_WATCH_HOST),
      port: parsePort(args.port ?? DEFAULT_PORT),
    }),
    content: parseSignal(args.content ?? DEFAULT_SIGNAL),
  })
}

export function resolveListenConfig(args: RawListenArgs): ListenConfig {
  return Object.freeze({
    bind: Object.freeze({
      host: parseHost(args.ip ?? DEFAULT_LISTEN_HOST),
      port: parsePort(args.port ?? DEFAULT_PORT),
    }),
    signal: parseSignal(args.signal ?? DEFAULT_SIGNAL),
  })
}

// Returns every argument in rawArgs that is not a known option.
// `known` holds bare names ("port", "p"). The token after a known option
// that takes a value is skipped so values starting with "-" are not flagged.
export function findUnknownOptions(
  rawArgs: ReadonlyArray<string>,
  known: ReadonlyArray<string>,
  takesValue: ReadonlyArray<string> = [],
): Array<string> {
  const unknown: Array<string> = []
  for (let i = 0; i < rawArgs.length; i++) {
    const arg = rawArgs[i]
    // stray positionals are rejected along with unknown flags
    if (!arg.startsWith("-") || arg === "-" || arg === "--") {
      unknown.push(arg)
      continue
    }
    const name = arg.replace(/^-{1,2}/, "").split("=")[0]
    if (!known.includes(name)) {
      unknown.push(arg)
      continue
    }
    if (takesValue.includes(name) && !arg.includes("=")) {
      i += 1
    }
  }
  return unknown
}
