import type { Socket } from "node:net"

import consola from "consola"

import { MAX_SIGNAL_BYTES } from "~/lib/config"
import { describeError } from "~/lib/error"

export type ConnectionState = "opened" | "reading" | "matched" | "ignored" | "closed"

export type ChunkOutcome = "matched" | "ignored" | "undecodable"

export interface SignalConnectionOptions {
  expectedSignal: string
  onSignal: () => void
  onClosed?: (connection: SignalConnection) => void
}

/**
 * Lifecycle of one accepted socket.
 *
 *   opened -> reading -> (matched | ignored) -> reading ... -> closed
 *
 * Matching is per chunk: each received buffer is cut into slices of at most
 * MAX_SIGNAL_BYTES, and a slice must equal the expected signal on its own.
 * Nothing is carried over between chunks, so a signal split across two
 * deliveries does not match.
 */
export class SignalConnection {
  private state: ConnectionState = "opened"
  private matches = 0
  private readonly decoder = new TextDecoder("utf-8", { fatal: true })
  readonly remote: string

  constructor(
    private readonly opts: SignalConnectionOptions,
    remote = "unknown",
  ) {
    this.remote = remote
  }

  getState(): ConnectionState {
    return this.state
  }

  getMatchCount(): number {
    return this.matches
  }

  // Drive the state machine from a live socket
  attach(socket: Socket) {
    this.start()

    socket.on("data", (data: Buffer) => {
      this.receive(data)
    })
    socket.once("end", () => {
      this.close()
      socket.end()
    })
    socket.on("error", (err) => {
      consola.error(`Receive error from ${this.remote}:`, describeError(err))
      this.close()
      socket.destroy()
    })
    socket.once("close", () => {
      this.close()
    })
  }

  start() {
    if (this.state !== "opened") return
    this.state = "reading"
    consola.debug(`Connection from ${this.remote} ready`)
  }

  // Process one delivery. Returns the outcome of every slice it contained.
  receive(data: Uint8Array): Array<ChunkOutcome> {
    if (this.state === "closed") return []

    const outcomes: Array<ChunkOutcome> = []
    for (let offset = 0; offset < data.length; offset += MAX_SIGNAL_BYTES) {
      outcomes.push(this.handleSlice(data.subarray(offset, offset + MAX_SIGNAL_BYTES)))
    }
    return outcomes
  }

  close() {
    if (this.state === "closed") return
    this.state = "closed"
    consola.debug(`Connection from ${this.remote} closed`)
    this.opts.onClosed?.(this)
  }

  private handleSlice(slice: Uint8Array): ChunkOutcome {
    let message: string
    try {
      message = this.decoder.decode(slice)
    } catch {
      // not UTF-8: dropped without a state change
      return "undecodable"
    }

    if (message === this.opts.expectedSignal) {
      this.state = "matched"
      this.matches += 1
      consola.info(`Received ${this.opts.expectedSignal} signal from ${this.remote}`)
      this.opts.onSignal()
      this.state = "reading"
      return "matched"
    }

    this.state = "ignored"
    consola.warn(`Received unexpected message from ${this.remote}: ${message}`)
    this.state = "reading"
    return "ignored"
  }
}
