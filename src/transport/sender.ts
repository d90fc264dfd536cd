import consola from "consola"
import net from "node:net"

import { CONNECT_TIMEOUT_MS, type Endpoint } from "~/lib/config"
import { describeError } from "~/lib/error"

export type SendResult = { ok: true } | { ok: false; error: Error }

export interface SendOptions {
  connectTimeoutMs?: number
}

/**
 * Open one connection to the peer, write the payload once, close.
 *
 * Never rejects: refused, unreachable and timed-out connections resolve with
 * `{ ok: false }` after logging. There is no retry; the next display-on edge
 * sends again.
 */
export async function sendSignal(
  target: Endpoint,
  payload: string,
  opts: SendOptions = {},
): Promise<SendResult> {
  const timeoutMs = opts.connectTimeoutMs ?? CONNECT_TIMEOUT_MS

  return new Promise((resolve) => {
    let settled = false
    const finish = (result: SendResult) => {
      if (settled) return
      settled = true
      resolve(result)
    }

    const socket = new net.Socket()

    socket.setTimeout(timeoutMs)

    socket.once("timeout", () => {
      const error = new Error(`Connection to ${target.host}:${target.port} timed out`)
      consola.error("Connection failed:", error.message)
      socket.destroy()
      finish({ ok: false, error })
    })

    socket.on("error", (err) => {
      consola.error("Connection failed:", describeError(err))
      socket.destroy()
      finish({ ok: false, error: err })
    })

    socket.once("close", () => {
      consola.debug("Connection closed")
      finish({ ok: false, error: new Error("Connection closed before the signal was sent") })
    })

    socket.connect(target.port, target.host, () => {
      consola.debug(`Connected to ${target.host}:${target.port}`)
      socket.setTimeout(0)
      // 'finish' fires only once the payload was flushed to the kernel
      socket.once("finish", () => {
        consola.success(`Signal sent: ${payload}`)
        finish({ ok: true })
        // release the socket even if the peer keeps its side open
        socket.destroy()
      })
      socket.end(payload, "utf8")
    })
  })
}
