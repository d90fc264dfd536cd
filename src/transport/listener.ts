import consola from "consola"
import net from "node:net"

import type { DisplaySleeper } from "~/display/sleeper"

import { SignalConnection } from "./connection"

export interface SignalListenerOptions {
  expectedSignal: string
  // Must not reject; wrap platform sleepers with guardedSleeper
  sleeper: DisplaySleeper
}

export interface SignalListener {
  server: net.Server
  // Live connections, used when draining and in diagnostics
  getActiveConnections: () => number
  // Destroy every in-flight socket so close() cannot wait on them
  destroyConnections: () => void
}

// Build a server whose every accepted socket runs its own SignalConnection.
// Connections share nothing but the bookkeeping set below.
export function createSignalListener(opts: SignalListenerOptions): SignalListener {
  const sockets = new Set<net.Socket>()

  const server = net.createServer((socket) => {
    const remote = `${socket.remoteAddress ?? "unknown"}:${socket.remotePort ?? 0}`
    consola.info(`New connection from ${remote}`)

    sockets.add(socket)
    socket.once("close", () => {
      sockets.delete(socket)
    })

    const connection = new SignalConnection(
      {
        expectedSignal: opts.expectedSignal,
        onSignal: () => {
          void opts.sleeper.sleepDisplay()
        },
      },
      remote,
    )
    connection.attach(socket)
  })

  return {
    server,
    getActiveConnections: () => sockets.size,
    destroyConnections: () => {
      for (const socket of sockets) {
        socket.destroy()
      }
      sockets.clear()
    },
  }
}
