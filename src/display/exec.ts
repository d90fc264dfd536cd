import { execFile } from "node:child_process"
import { promisify } from "node:util"

const execFileAsync = promisify(execFile)

export const COMMAND_TIMEOUT_MS = 5000

export type CommandRunner = (command: string, args: Array<string>) => Promise<string>

// Runs a platform utility and resolves with its stdout
export const runCommand: CommandRunner = async (command, args) => {
  const { stdout } = await execFileAsync(command, args, {
    timeout: COMMAND_TIMEOUT_MS,
    windowsHide: true,
  })
  return stdout
}
