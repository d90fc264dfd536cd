import consola from "consola"

import { describeError } from "~/lib/error"

import { runCommand, type CommandRunner } from "./exec"

export interface DisplaySleeper {
  sleepDisplay: () => Promise<void>
}

export function createDisplaySleeper(
  platform: NodeJS.Platform = process.platform,
  run: CommandRunner = runCommand,
): DisplaySleeper {
  switch (platform) {
    case "darwin":
      return {
        sleepDisplay: async () => {
          await run("pmset", ["displaysleepnow"])
        },
      }
    case "linux":
      return {
        sleepDisplay: async () => {
          await run("xset", ["dpms", "force", "off"])
        },
      }
    default:
      return {
        sleepDisplay: () =>
          Promise.reject(
            new Error(`Display sleep is not supported on ${platform}`),
          ),
      }
  }
}

// Wraps a sleeper so a failed sleep is logged and never reaches the caller.
// Connection handlers invoke this without awaiting the platform command.
export function guardedSleeper(sleeper: DisplaySleeper): DisplaySleeper {
  return {
    sleepDisplay: async () => {
      try {
        await sleeper.sleepDisplay()
        consola.success("Display sleep command sent")
      } catch (err) {
        consola.error("Error putting display to sleep:", describeError(err))
      }
    },
  }
}
