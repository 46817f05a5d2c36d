/** Levels in increasing severity; pino's default names. */
export type LogLevelName = "trace" | "debug" | "info" | "warn" | "error" | "fatal"
