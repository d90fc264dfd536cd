import { defineCommand, showUsage } from "citty"
import consola from "consola"

import { DaemonController } from "./daemon/controller"
import {
  startResilientInterval,
  type ResilientIntervalHandle,
} from "./daemon/resilient-interval"
import { ChangeDetector } from "./detector/change-detector"
import { createDisplayProbe, type DisplayProbe } from "./display/probe"
import {
  DEFAULT_PORT,
  DEFAULT_SIGNAL,
  DEFAULT_WATCH_HOST,
  POLL_INTERVAL_MS,
  findUnknownOptions,
  resolveWatchConfig,
  type WatchConfig,
} from "./lib/config"
import { ConfigError, describeError } from "./lib/error"
import { sendSignal, type SendOptions } from "./transport/sender"

export interface RunWatcherOptions {
  host?: string
  port?: string | number
  content?: string
  verbose?: boolean
}

export interface WatcherDeps {
  probe?: DisplayProbe
  pollIntervalMs?: number
  send?: SendOptions
  exitOnShutdown?: boolean
  installSignalHandlers?: boolean
}

export interface WatcherRuntime {
  config: WatchConfig
  controller: DaemonController
  detector: ChangeDetector
  interval: () => ResilientIntervalHandle | null
}

export async function runWatcher(
  options: RunWatcherOptions,
  deps: WatcherDeps = {},
): Promise<WatcherRuntime> {
  // Validate everything before touching the network
  const config = resolveWatchConfig(options)

  if (options.verbose) {
    consola.level = 5
    consola.info("Verbose logging enabled")
  }

  consola.info(
    [
      "Configuration:",
      `  Target host: ${config.target.host}`,
      `  Target port: ${config.target.port}`,
      `  Message content: ${config.content}`,
    ].join("\n"),
  )

  const detector = new ChangeDetector({
    probe: deps.probe ?? createDisplayProbe(),
    onDisplayOn: () => sendSignal(config.target, config.content, deps.send),
  })

  let interval: ResilientIntervalHandle | null = null

  const controller = new DaemonController(
    {
      name: "watcher",
      exitOnShutdown: deps.exitOnShutdown,
      installSignalHandlers: deps.installSignalHandlers,
    },
    async () => {
      interval = startResilientInterval(
        () => detector.tick(),
        deps.pollIntervalMs ?? POLL_INTERVAL_MS,
        { runImmediately: true },
      )
    },
  )

  controller.registerHook(async () => {
    await interval?.stop()
  })

  await controller.start()

  return { config, controller, detector, interval: () => interval }
}

const KNOWN_OPTIONS = ["host", "port", "p", "content", "c", "verbose", "v", "help", "h"]
const VALUE_OPTIONS = ["host", "port", "p", "content", "c"]

export const watch = defineCommand({
  meta: {
    name: "watch",
    description: "Watch the local display and signal the peer when it turns on",
  },
  args: {
    host: {
      type: "string",
      default: DEFAULT_WATCH_HOST,
      description: "Target host IP address",
    },
    port: {
      alias: "p",
      type: "string",
      default: String(DEFAULT_PORT),
      description: "Target port number",
    },
    content: {
      alias: "c",
      type: "string",
      default: DEFAULT_SIGNAL,
      description: "Message content to send",
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
      consola.error(`Unrecognized argument: ${unknown.join(" ")}`)
      await showUsage(cmd)
      process.exit(1)
    }

    if (rawArgs.length === 0) {
      consola.info("Note: No parameters specified, using default configuration")
      await showUsage(cmd)
    }

    let runtime: WatcherRuntime
    try {
      runtime = await runWatcher({
        host: args.host,
        port: args.port,
        content: args.content,
        verbose: args.verbose,
      })
    } catch (error) {
      if (error instanceof ConfigError) {
        consola.error(`Error: ${error.message}`)
      } else {
        consola.error("Failed to start watcher:", describeError(error))
      }
      process.exit(1)
    }

    await runtime.controller.waitForShutdown()
  },
})
