import { test, expect, afterEach } from "vitest"
import net from "node:net"

import { ListenerSupervisor } from "../src/daemon/listener-supervisor"
import type { DisplaySleeper } from "../src/display/sleeper"
import { ListenerBindError } from "../src/lib/error"
import { createSignalListener } from "../src/transport/listener"

import { sendRaw, sleep, waitFor } from "./helpers"

const supervisors: Array<ListenerSupervisor> = []

afterEach(async () => {
  await Promise.all(supervisors.splice(0).map((s) => s.stop()))
})

function countingSleeper() {
  const counter = { calls: 0 }
  const sleeper: DisplaySleeper = {
    sleepDisplay: async () => {
      counter.calls += 1
    },
  }
  return { sleeper, counter }
}

async function startSupervisor(sleeper: DisplaySleeper, expectedSignal = "sleep_display") {
  const supervisor = new ListenerSupervisor({
    endpoint: { host: "127.0.0.1", port: 0 },
    createListener: () => createSignalListener({ expectedSignal, sleeper }),
    rebindDelayMs: 10,
  })
  supervisors.push(supervisor)
  const bound = await supervisor.start()
  return { supervisor, port: bound.port }
}

test("the exact signal triggers exactly one sleep", async () => {
  const { sleeper, counter } = countingSleeper()
  const { port } = await startSupervisor(sleeper)

  await sendRaw(port, ["sleep_display"])

  expect(counter.calls).toBe(1)
})

test("other payloads trigger nothing", async () => {
  const { sleeper, counter } = countingSleeper()
  const { port } = await startSupervisor(sleeper)

  await sendRaw(port, ["sleep_displayX"])
  await sendRaw(port, ["Sleep_Display"])
  await sendRaw(port, [Buffer.from([0xc3, 0x28])])

  expect(counter.calls).toBe(0)
})

test("concurrent connections each trigger independently", async () => {
  const { sleeper, counter } = countingSleeper()
  const { port } = await startSupervisor(sleeper)

  await Promise.all(Array.from({ length: 12 }, () => sendRaw(port, ["sleep_display"])))

  expect(counter.calls).toBe(12)
})

test("a connection error closes only that connection", async () => {
  const { sleeper, counter } = countingSleeper()
  const { supervisor, port } = await startSupervisor(sleeper)

  const broken = net.connect(port, "127.0.0.1")
  broken.on("error", () => undefined)
  await new Promise<void>((resolve) => broken.once("connect", () => resolve()))
  broken.resetAndDestroy()

  await sendRaw(port, ["sleep_display"])

  expect(counter.calls).toBe(1)
  expect(supervisor.getState()).toBe("listening")
})

test("rebinds to the same port after a listener error", async () => {
  const { sleeper, counter } = countingSleeper()
  const { supervisor, port } = await startSupervisor(sleeper)
  const first = supervisor.getListener()

  first?.server.emit("error", new Error("simulated listener failure"))

  await waitFor(() => supervisor.getRebindCount() === 1)
  expect(supervisor.getState()).toBe("listening")
  expect(supervisor.getListener()).not.toBe(first)
  expect(supervisor.getBoundEndpoint()).toEqual({ host: "127.0.0.1", port })

  await sendRaw(port, ["sleep_display"])
  expect(counter.calls).toBe(1)
})

test("rebinds after the listener is closed out from under it", async () => {
  const { sleeper, counter } = countingSleeper()
  const { supervisor, port } = await startSupervisor(sleeper)

  supervisor.getListener()?.server.close()

  await waitFor(() => supervisor.getRebindCount() === 1)
  await sendRaw(port, ["sleep_display"])
  expect(counter.calls).toBe(1)
})

test("keeps healing across repeated failures", async () => {
  const { sleeper } = countingSleeper()
  const { supervisor } = await startSupervisor(sleeper)

  for (let round = 1; round <= 3; round++) {
    supervisor.getListener()?.server.emit("error", new Error(`failure ${round}`))
    await waitFor(() => supervisor.getRebindCount() === round)
  }
  expect(supervisor.getState()).toBe("listening")
})

test("stop closes the listener and refuses new connections", async () => {
  const { sleeper, counter } = countingSleeper()
  const { supervisor, port } = await startSupervisor(sleeper)

  await supervisor.stop()

  expect(supervisor.getState()).toBe("stopped")
  expect(supervisor.getListener()).toBeNull()
  await expect(sendRaw(port, ["sleep_display"])).rejects.toThrow()
  expect(counter.calls).toBe(0)
})

test("stop abandons connections still reading", async () => {
  const { sleeper } = countingSleeper()
  const { supervisor, port } = await startSupervisor(sleeper)

  const idle = net.connect(port, "127.0.0.1")
  idle.on("error", () => undefined)
  const closed = new Promise<void>((resolve) => idle.once("close", () => resolve()))
  await new Promise<void>((resolve) => idle.once("connect", () => resolve()))
  await waitFor(() => supervisor.getListener()?.getActiveConnections() === 1)

  await supervisor.stop()
  await closed
})

test("no rebind happens after stop", async () => {
  const { sleeper } = countingSleeper()
  const { supervisor } = await startSupervisor(sleeper)

  supervisor.getListener()?.server.emit("error", new Error("late failure"))
  await supervisor.stop()
  await sleep(50)

  expect(supervisor.getRebindCount()).toBe(0)
  expect(supervisor.getState()).toBe("stopped")
})

test("a failed first bind rejects with ListenerBindError", async () => {
  const blocker = net.createServer()
  await new Promise<void>((resolve) => blocker.listen(0, "127.0.0.1", () => resolve()))
  const address = blocker.address()
  const port = typeof address === "object" && address !== null ? address.port : 0

  const { sleeper } = countingSleeper()
  const supervisor = new ListenerSupervisor({
    endpoint: { host: "127.0.0.1", port },
    createListener: () => createSignalListener({ expectedSignal: "sleep_display", sleeper }),
  })

  try {
    const error = await supervisor.start().then(
      () => null,
      (err: unknown) => err,
    )
    expect(error).toBeInstanceOf(ListenerBindError)
    if (error instanceof ListenerBindError) {
      expect(error.code).toBe("EADDRINUSE")
      expect(error.endpoint).toEqual({ host: "127.0.0.1", port })
      expect(error.message).toContain(
        "(another process is accepting connections on this port)",
      )
    }
    expect(supervisor.getState()).toBe("stopped")
  } finally {
    await new Promise<void>((resolve) => blocker.close(() => resolve()))
  }
})
