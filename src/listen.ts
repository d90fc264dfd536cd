import { defineCommand, showUsage } from "citty"
import consola from "consola"

import { DaemonController } from "./daemon/controller"
import { ListenerSupervisor } from "./daemon/listener-supervisor"
import {
  createDisplaySleeper,
  guardedSleeper,
  type DisplaySleeper,
} from "./display/sleeper"
import {
  DEFAULT_LISTEN_HOST,
  DEFAULT_PORT,
  DEFAULT_SIGNAL,
  findUnknownOptions,
  resolveListenConfig,
  type ListenConfig,
} from "./lib/config"
import { ConfigError, ListenerBindError, describeError } from "./lib/error"
import { createSignalListener } from "./transport/listener"

export interface RunListenerOptions {
  ip?: string
  port?: string | number
  signal?: string
  verbose?: boolean
}

export interface ListenerDeps {
  sleeper?: DisplaySleeper
  rebindDelayMs?: number
  exitOnShutdown?: boolean
  installSignalHandlers?: boolean
}

export interface ListenerRuntime {
  config: ListenConfig
  controller: DaemonController
  supervisor: ListenerSupervisor
}

export async function runListener(
  options: RunListenerOptions,
  deps: ListenerDeps = {},
): Promise<ListenerRuntime> {
  // Validate everything before touching the network
  const config = resolveListenConfig(options)

  if (options.verbose) {
    consola.level = 5
    consola.info("Verbose logging enabled")
  }

  consola.info(
    [
      "Configuration:",
      `  Listen IP: ${config.bind.host}`,
      `  Listen port: ${config.bind.port}`,
      `  Expected signal: ${config.signal}`,
    ].join("\n"),
  )

  const sleeper = guardedSleeper(deps.sleeper ?? createDisplaySleeper())

  const supervisor = new ListenerSupervisor({
    endpoint: config.bind,
    createListener: () =>
      createSignalListener({ expectedSignal: config.signal, sleeper }),
    rebindDelayMs: deps.rebindDelayMs,
  })

  const controller = new DaemonController(
    {
      name: "listener",
      exitOnShutdown: deps.exitOnShutdown,
      installSignalHandlers: deps.installSignalHandlers,
    },
    async () => {
      await supervisor.start()
    },
  )

  controller.registerHook(() => supervisor.stop())

  await controller.start()

  return { config, controller, supervisor }
}

const KNOWN_OPTIONS = ["ip", "port", "p", "signal", "s", "verbose", "v", "help", "h"]
const VALUE_OPTIONS = ["ip", "port", "p", "signal", "s"]

export const listen = defineCommand({
  meta: {
    name: "listen",
    description: "Listen for the peer's signal and put the local display to sleep",
  },
  args: {
    ip: {
      type: "string",
      default: DEFAULT_LISTEN_HOST,
      description: "Listen IP address",
    },
    port: {
      alias: "p",
      type: "string",
      default: String(DEFAULT_PORT),
      description: "Listen port number",
    },
    signal: {
      alias: "s",
      type: "string",
      default: DEFAULT_SIGNAL,
      description: "Expected signal message",
    },
    verbose: {
      alias: "v",
      type: "boolean",
      default: false,
      description: "Enable verbose logging",
    },
  },
  async run({ args, rawArgs, cmd }) {
    const unknown = findUnknownOptions(rawArgs, KNOWN_OPTIONS, VALUE_OPTIONS)
    if (unknown.length > 0) {
      consola.error(`Unknown argument: ${unknown.join(" ")}`)
      await showUsage(cmd)
      process.exit(1)
    }

    if (rawArgs.length === 0) {
      consola.info("Note: No parameters specified, using default configuration")
      await showUsage(cmd)
    }

    let runtime: ListenerRuntime
    try {
      runtime = await runListener({
        ip: args.ip,
        port: args.port,
        signal: args.signal,
        verbose: args.verbose,
      })
    } catch (error) {
      if (error instanceof ConfigError || error instanceof ListenerBindError) {
        consola.error(`Error: ${error.message}`)
      } else {
        consola.error("Failed to start listener:", describeError(error))
      }
      process.exit(1)
    }

    await runtime.controller.waitForShutdown()
  },
})
