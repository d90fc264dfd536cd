import consola from "consola"

import { describeError } from "~/lib/error"

import type { DaemonOptions, LifecycleState, ShutdownHook } from "./types"

const SHUTDOWN_SIGNALS: Array<NodeJS.Signals> = ["SIGINT", "SIGTERM", "SIGHUP"]

// Exit codes: 0 clean, 1 fatal error, 2 forced termination
const EXIT_OK = 0
const EXIT_FATAL = 1
const EXIT_FORCED = 2

// The one process-wide reference a signal handler can reach. Set when a
// controller becomes ready, cleared when it stops.
let activeController: DaemonController | null = null

export function getActiveController(): DaemonController | null {
  return activeController
}

function dispatchSignal(signal: NodeJS.Signals) {
  activeController?.handleSignal(signal)
}

function dispatchFatal(err: unknown) {
  consola.error("Unhandled error, initiating shutdown:", err)
  if (activeController) {
    void activeController.beginShutdown("fatal", EXIT_FATAL)
  } else {
    process.exit(EXIT_FATAL)
  }
}

let processHandlersInstalled = false

function installProcessHandlers() {
  if (processHandlersInstalled) return
  processHandlersInstalled = true
  for (const signal of SHUTDOWN_SIGNALS) {
    process.on(signal, dispatchSignal)
  }
  process.on("uncaughtException", dispatchFatal)
  process.on("unhandledRejection", dispatchFatal)
}

function removeProcessHandlers() {
  if (!processHandlersInstalled) return
  processHandlersInstalled = false
  for (const signal of SHUTDOWN_SIGNALS) {
    process.removeListener(signal, dispatchSignal)
  }
  process.removeListener("uncaughtException", dispatchFatal)
  process.removeListener("unhandledRejection", dispatchFatal)
}

// Lifecycle owner for one side of the link (watcher or listener).
// - Owns the lifecycle state machine
// - Installs signal handlers (single owner)
// - Runs registered cleanup hooks on shutdown
//
// Signal handlers only record the signal and start the shutdown sequence;
// closing sockets and timers happens in hooks on the normal event loop.
export class DaemonController {
  private state: LifecycleState = "init"
  private readonly shutdownTimeoutMs: number
  private readonly exitOnShutdown: boolean
  private readonly installSignalHandlers: boolean
  private readonly hooks: Array<ShutdownHook> = []
  private forced = false
  private shutdown: Promise<void> | null = null
  private readonly resolveStopped: () => void
  private readonly stopped: Promise<void>
  private readonly resolveForced: () => void
  private readonly forcedSignal: Promise<"forced">

  constructor(
    private readonly opts: DaemonOptions,
    private readonly startFn: () => Promise<void>,
  ) {
    this.shutdownTimeoutMs = opts.shutdownTimeoutMs ?? 5000
    this.exitOnShutdown = opts.exitOnShutdown ?? true
    this.installSignalHandlers = opts.installSignalHandlers ?? true
    let resolveStopped = () => {}
    this.stopped = new Promise((resolve) => {
      resolveStopped = () => resolve()
    })
    this.resolveStopped = resolveStopped
    let resolveForced = () => {}
    this.forcedSignal = new Promise((resolve) => {
      resolveForced = () => resolve("forced")
    })
    this.resolveForced = resolveForced
  }

  // Register a cleanup hook to be called during shutdown.
  // Hooks run in registration order and should be idempotent.
  registerHook(hook: ShutdownHook) {
    this.hooks.push(hook)
  }

  getState() {
    return this.state
  }

  async start(): Promise<void> {
    if (this.state !== "init") {
      throw new Error(`Cannot start from state ${this.state}`)
    }

    this.state = "starting"
    consola.info(`Starting ${this.opts.name}...`)

    try {
      await this.startFn()
    } catch (error) {
      this.state = "failed"
      this.resolveStopped()
      throw error
    }

    this.state = "ready"
    activeController = this
    if (this.installSignalHandlers) {
      installProcessHandlers()
    }
    consola.info(`${this.opts.name} running. Press Control-C to terminate`)
  }

  // Called from the process signal listener; marks state and hands off
  handleSignal(signal: NodeJS.Signals) {
    consola.info("Signal received:", signal)
    if (this.state === "draining") {
      consola.warn("Second signal received during shutdown: forcing termination")
      this.forced = true
      this.resolveForced()
      if (this.exitOnShutdown) process.exit(EXIT_FORCED)
      return
    }
    void this.beginShutdown(signal)
  }

  // Begin the graceful shutdown sequence. Calling it again returns the
  // sequence already in progress.
  beginShutdown(reason: string, exitCode = EXIT_OK): Promise<void> {
    if (this.shutdown) return this.shutdown
    if (this.state !== "ready") {
      if (this.state !== "failed") this.state = "stopped"
      this.resolveStopped()
      return Promise.resolve()
    }
    this.shutdown = this.runShutdown(reason, exitCode)
    return this.shutdown
  }

  // Resolves once the controller reaches a terminal state
  waitForShutdown(): Promise<void> {
    return this.stopped
  }

  private async runShutdown(reason: string, exitCode: number) {
    this.state = "draining"
    consola.info("Shutting down gracefully...", { reason })

    let timer: NodeJS.Timeout | undefined
    const deadline = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), this.shutdownTimeoutMs)
    })

    // a second signal stops waiting on the hook that is running
    const outcome = await Promise.race([this.runHooks(), deadline, this.forcedSignal])
    clearTimeout(timer)

    if (outcome === "timeout") {
      consola.warn("Shutdown deadline reached; forcing termination")
      this.forced = true
    }

    if (activeController === this) {
      activeController = null
      removeProcessHandlers()
    }

    this.state = "stopped"
    consola.info("Shutdown complete")
    this.resolveStopped()

    if (this.exitOnShutdown) {
      process.exit(this.forced ? EXIT_FORCED : exitCode)
    }
  }

  private async runHooks(): Promise<"done"> {
    for (const hook of this.hooks) {
      if (this.forced) break
      try {
        await hook()
      } catch (err) {
        consola.warn("Shutdown hook failed:", describeError(err))
      }
    }
    return "done"
  }
}
