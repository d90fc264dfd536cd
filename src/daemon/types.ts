export type LifecycleState =
  | "init"
  | "starting"
  | "ready"
  | "draining"
  | "stopped"
  | "failed"

export interface DaemonOptions {
  // Used in log lines ("watcher", "listener")
  name: string
  shutdownTimeoutMs?: number
  // When true, the controller will call process.exit at the end of shutdown.
  // For testing, this can be set to false to avoid terminating the test runner.
  exitOnShutdown?: boolean
  // When false, no process signal or crash handlers are installed. Tests
  // drive shutdown through beginShutdown() instead.
  installSignalHandlers?: boolean
}

export type ShutdownHook = () => Promise<void> | void
