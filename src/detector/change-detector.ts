import consola from "consola"

import type { DisplayProbe } from "~/display/probe"
import { describeError } from "~/lib/error"

export interface TickResult {
  state: boolean
  changed: boolean
  // true when this tick invoked onDisplayOn
  fired: boolean
}

export interface ChangeDetectorOptions {
  probe: DisplayProbe
  onDisplayOn: () => Promise<unknown> | void
}

/**
 * Edge-triggered watcher for the local display.
 *
 * Each tick samples the probe once. `onDisplayOn` runs only on a transition
 * into "on" (including the first reading, when nothing was recorded yet), so
 * a display that stays on never re-fires, and an off/on cycle fires again.
 * A failed probe counts as "off" so an unreadable display never wakes the
 * peer's sleep path.
 *
 * `onDisplayOn` is started but not awaited: a slow send must not hold up
 * the next sample.
 */
export class ChangeDetector {
  private lastState: boolean | undefined = undefined
  private readonly probe: DisplayProbe
  private readonly onDisplayOn: () => Promise<unknown> | void

  constructor(opts: ChangeDetectorOptions) {
    this.probe = opts.probe
    this.onDisplayOn = opts.onDisplayOn
  }

  getLastState(): boolean | undefined {
    return this.lastState
  }

  async tick(): Promise<TickResult> {
    const state = await this.readProbe()

    if (state === this.lastState) {
      return { state, changed: false, fired: false }
    }

    consola.info(`Display state changed: ${state ? "On" : "Off"}`)
    this.lastState = state

    if (!state) {
      return { state, changed: true, fired: false }
    }

    consola.info("Sending display-on signal")
    this.fire()
    return { state, changed: true, fired: true }
  }

  private fire() {
    const onError = (err: unknown) => {
      consola.error("Display-on handler failed:", describeError(err))
    }
    try {
      void Promise.resolve(this.onDisplayOn()).catch(onError)
    } catch (err) {
      onError(err)
    }
  }

  private async readProbe(): Promise<boolean> {
    try {
      return await this.probe.isDisplayOn()
    } catch (err) {
      consola.warn("Display probe failed, treating display as off:", describeError(err))
      return false
    }
  }
}
