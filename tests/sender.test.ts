import { test, expect, afterEach, vi } from "vitest"
import net from "node:net"

import { errorCode } from "../src/lib/error"
import { sendSignal } from "../src/transport/sender"

import { freePort } from "./helpers"

const servers: Array<net.Server> = []

afterEach(async () => {
  await Promise.all(
    servers.splice(0).map(
      (server) => new Promise<void>((resolve) => server.close(() => resolve())),
    ),
  )
})

// Collects everything each accepted connection sends
async function recordingServer() {
  const received: Array<string> = []
  const server = net.createServer((socket) => {
    const chunks: Array<Buffer> = []
    socket.on("data", (chunk: Buffer) => chunks.push(chunk))
    // the sender may already be gone when the reply FIN goes out
    socket.on("error", () => undefined)
    socket.on("end", () => {
      received.push(Buffer.concat(chunks).toString("utf8"))
      socket.end()
    })
  })
  servers.push(server)
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()))
  const address = server.address()
  const port = typeof address === "object" && address !== null ? address.port : 0
  return { port, received }
}

test("sendSignal writes the payload and closes the connection", async () => {
  const { port, received } = await recordingServer()

  const result = await sendSignal({ host: "127.0.0.1", port }, "sleep_display")

  expect(result).toEqual({ ok: true })
  await expect.poll(() => received).toEqual(["sleep_display"])
})

test("each call opens its own connection", async () => {
  const { port, received } = await recordingServer()

  await sendSignal({ host: "127.0.0.1", port }, "first")
  await sendSignal({ host: "127.0.0.1", port }, "second")

  await expect.poll(() => received.length).toBe(2)
  expect([...received].sort()).toEqual(["first", "second"])
})

test("a refused connection resolves with the error instead of throwing", async () => {
  const port = await freePort()

  const result = await sendSignal({ host: "127.0.0.1", port }, "sleep_display")

  expect(result.ok).toBe(false)
  if (!result.ok) {
    expect(errorCode(result.error)).toBe("ECONNREFUSED")
  }
})

test("the sender closes its socket even when the peer keeps its side open", async () => {
  let peerClosed = false
  const server = net.createServer({ allowHalfOpen: true }, (socket) => {
    socket.on("error", () => undefined)
    socket.on("close", () => {
      peerClosed = true
    })
    socket.resume()
  })
  servers.push(server)
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()))
  const address = server.address()
  const port = typeof address === "object" && address !== null ? address.port : 0

  const result = await sendSignal({ host: "127.0.0.1", port }, "sleep_display")

  expect(result).toEqual({ ok: true })
  await expect.poll(() => peerClosed).toBe(true)
})

test("a connection that never completes times out", async () => {
  const port = await freePort()
  const connect = vi.spyOn(net.Socket.prototype, "connect").mockReturnThis()

  try {
    const result = await sendSignal(
      { host: "127.0.0.1", port },
      "sleep_display",
      { connectTimeoutMs: 50 },
    )

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.message).toBe(`Connection to 127.0.0.1:${port} timed out`)
    }
  } finally {
    connect.mockRestore()
  }
})
