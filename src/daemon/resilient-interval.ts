import consola from "consola"

export interface ResilientIntervalHandle {
  stop: () => Promise<void>
}

export interface ResilientIntervalOptions {
  // Maximum backoff in milliseconds
  maxBackoffMs?: number
  // Backoff multiplier
  backoffMultiplier?: number
  // Run fn right away instead of waiting one interval first
  runImmediately?: boolean
}

// startResilientInterval runs an async function periodically. Runs never
// overlap: the next one is scheduled only after the previous one settles.
// A rejection is logged and delays the next run with exponential backoff;
// the next success restores the normal cadence.
export function startResilientInterval(
  fn: () => Promise<unknown>,
  intervalMs: number,
  opts: ResilientIntervalOptions = {},
): ResilientIntervalHandle {
  let stopped = false
  let timer: NodeJS.Timeout | null = null
  let inFlight: Promise<void> | null = null
  let consecutiveFailures = 0

  const maxBackoff = opts.maxBackoffMs ?? intervalMs * 10
  const multiplier = opts.backoffMultiplier ?? 2

  async function runOnce() {
    if (stopped) return

    try {
      await fn()
      consecutiveFailures = 0
      scheduleNext(intervalMs)
    } catch (err) {
      consecutiveFailures += 1
      consola.error("Periodic task failed:", err)

      const backoff = Math.min(
        Math.round(intervalMs * Math.pow(multiplier, consecutiveFailures)),
        maxBackoff,
      )
      scheduleNext(backoff)
    }
  }

  function scheduleNext(delay: number) {
    if (stopped) return
    if (timer) clearTimeout(timer)
    timer = setTimeout(
      () => {
        timer = null
        inFlight = runOnce().finally(() => {
          inFlight = null
        })
      },
      Math.max(0, delay),
    )
  }

  scheduleNext(opts.runImmediately ? 0 : intervalMs)

  return {
    stop: async () => {
      stopped = true
      if (timer) clearTimeout(timer)
      timer = null
      // let a run that already started finish so stop() leaves nothing behind
      if (inFlight) await inFlight
    },
  }
}
