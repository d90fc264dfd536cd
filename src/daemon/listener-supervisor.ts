import consola from "consola"
import invariant from "tiny-invariant"

import type { Endpoint } from "~/lib/config"
import { ListenerBindError, describeError, errorCode } from "~/lib/error"
import { isPortInUse } from "~/lib/port-check"
import type { SignalListener } from "~/transport/listener"

export type SupervisorState = "idle" | "listening" | "rebinding" | "stopped"

export interface ListenerSupervisorOptions {
  endpoint: Endpoint
  // Builds a fresh, unbound listener for every (re)bind
  createListener: () => SignalListener
  // Pause between a failure and the rebind attempt
  rebindDelayMs?: number
}

/**
 * Keeps exactly one listener bound while running.
 *
 * A failed first bind is fatal and rejects start(). Once running, an error or
 * unexpected close on the current server drops it and schedules one rebind to
 * the same address; a rebind that fails is handled the same way, so the
 * policy repeats for as long as the supervisor runs.
 */
export class ListenerSupervisor {
  private state: SupervisorState = "idle"
  private running = false
  private current: SignalListener | null = null
  private bound: Endpoint | null = null
  private rebindTimer: NodeJS.Timeout | null = null
  private rebinds = 0
  private readonly rebindDelayMs: number

  constructor(private readonly opts: ListenerSupervisorOptions) {
    this.rebindDelayMs = opts.rebindDelayMs ?? 250
  }

  getState(): SupervisorState {
    return this.state
  }

  getRebindCount(): number {
    return this.rebinds
  }

  getListener(): SignalListener | null {
    return this.current
  }

  // Address actually bound; differs from the configured one only for port 0
  getBoundEndpoint(): Endpoint | null {
    return this.bound
  }

  async start(): Promise<Endpoint> {
    invariant(this.state === "idle", `Cannot start supervisor from state ${this.state}`)
    this.running = true

    const { endpoint } = this.opts
    let listener: SignalListener
    try {
      listener = await this.bind(endpoint)
    } catch (err) {
      this.running = false
      this.state = "stopped"
      throw new ListenerBindError(endpoint, err, await this.diagnose(endpoint, err))
    }

    const address = listener.server.address()
    invariant(address !== null && typeof address === "object", "TCP listener has no address")
    this.bound = { host: endpoint.host, port: address.port }
    this.state = "listening"
    consola.info(`Listening on ${this.bound.host}:${this.bound.port}...`)
    return this.bound
  }

  async stop(): Promise<void> {
    if (this.state === "stopped") return
    this.running = false
    this.state = "stopped"

    if (this.rebindTimer) {
      clearTimeout(this.rebindTimer)
      this.rebindTimer = null
    }

    const listener = this.current
    this.current = null
    if (listener) {
      // in-flight handlers are abandoned so close() can complete
      listener.destroyConnections()
      await this.close(listener)
    }
    consola.info("Listener stopped")
  }

  private bind(endpoint: Endpoint): Promise<SignalListener> {
    const listener = this.opts.createListener()
    const { server } = listener

    return new Promise((resolve, reject) => {
      const onError = (err: Error) => {
        server.removeListener("listening", onListening)
        reject(err)
      }
      const onListening = () => {
        server.removeListener("error", onError)
        this.adopt(listener)
        resolve(listener)
      }
      server.once("error", onError)
      server.once("listening", onListening)
      server.listen(endpoint.port, endpoint.host)
    })
  }

  private adopt(listener: SignalListener) {
    this.current = listener
    listener.server.on("error", (err) => {
      this.handleFailure(listener, err)
    })
    listener.server.on("close", () => {
      this.handleFailure(listener, new Error("listener closed unexpectedly"))
    })
  }

  private handleFailure(listener: SignalListener, err: Error) {
    // stale handles and shutdown-initiated closes are not failures
    if (!this.running || listener !== this.current) return

    consola.warn("Listener failed:", describeError(err))
    this.current = null
    void this.close(listener)
    this.scheduleRebind()
  }

  private scheduleRebind() {
    if (!this.running || this.rebindTimer) return
    this.state = "rebinding"
    this.rebindTimer = setTimeout(() => {
      this.rebindTimer = null
      void this.rebind()
    }, this.rebindDelayMs)
  }

  private async rebind() {
    if (!this.running) return
    invariant(this.bound, "Rebind requested before the first bind")

    let listener: SignalListener
    try {
      listener = await this.bind(this.bound)
    } catch (err) {
      consola.error("Failed to restart listener:", describeError(err))
      this.scheduleRebind()
      return
    }

    if (!this.running) {
      // stop() ran while the bind was in progress
      this.current = null
      await this.close(listener)
      return
    }

    this.rebinds += 1
    this.state = "listening"
    consola.success(`Listener restarted on ${this.bound.host}:${this.bound.port}`)
  }

  private close(listener: SignalListener): Promise<void> {
    return new Promise((resolve) => {
      if (!listener.server.listening) {
        resolve()
        return
      }
      listener.server.close((err) => {
        if (err) consola.debug("Listener close reported:", describeError(err))
        resolve()
      })
    })
  }

  private async diagnose(endpoint: Endpoint, err: unknown): Promise<string | undefined> {
    if (errorCode(err) !== "EADDRINUSE") return undefined
    const answered = await isPortInUse(endpoint.port, endpoint.host)
    return answered
      ? "another process is accepting connections on this port"
      : "the address is still held by another socket"
  }
}
