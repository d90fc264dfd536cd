import { ProbeError, describeError } from "~/lib/error"

import { runCommand, type CommandRunner } from "./exec"

export interface DisplayProbe {
  isDisplayOn: () => Promise<boolean>
}

// IODisplayWrangler reports CurrentPowerState 1 while the panel is asleep
const DISPLAY_ASLEEP_STATE = 1

export function parseIoregPowerState(output: string): boolean {
  const match = /"CurrentPowerState"\s*=\s*(\d+)/.exec(output)
  if (!match) {
    throw new ProbeError("CurrentPowerState not found in IODisplayWrangler properties")
  }
  return Number.parseInt(match[1], 10) !== DISPLAY_ASLEEP_STATE
}

export function parseXsetMonitorState(output: string): boolean {
  const match = /Monitor is (\w+)/.exec(output)
  if (!match) {
    throw new ProbeError("DPMS monitor state not reported by xset")
  }
  return match[1] === "On"
}

function commandProbe(
  command: string,
  args: Array<string>,
  parse: (output: string) => boolean,
  run: CommandRunner,
): DisplayProbe {
  return {
    isDisplayOn: async () => {
      let output: string
      try {
        output = await run(command, args)
      } catch (err) {
        throw new ProbeError(`${command} failed: ${describeError(err)}`, {
          cause: err,
        })
      }
      return parse(output)
    },
  }
}

export function createDisplayProbe(
  platform: NodeJS.Platform = process.platform,
  run: CommandRunner = runCommand,
): DisplayProbe {
  switch (platform) {
    case "darwin":
      return commandProbe(
        "ioreg",
        ["-r", "-d", "1", "-n", "IODisplayWrangler"],
        parseIoregPowerState,
        run,
      )
    case "linux":
      return commandProbe("xset", ["q"], parseXsetMonitorState, run)
    default:
      return {
        isDisplayOn: () =>
          Promise.reject(
            new ProbeError(`Display state query is not supported on ${platform}`),
          ),
      }
  }
}
