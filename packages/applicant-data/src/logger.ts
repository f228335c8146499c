import pc from "picocolors"

export type LogLevel = "debug" | "info" | "warn" | "error"

/**
 * Where the data model reports things worth knowing about but not worth failing for.
 */
export interface Logger {
  debug: (message: string, data?: unknown) => void
  info: (message: string, data?: unknown) => void
  warn: (message: string, data?: unknown) => void
  error: (message: string, data?: unknown) => void
}

export interface LoggerOptions {
  /**
   * Messages below this level are dropped.
   * Default: "info"
   */
  level?: LogLevel
  /**
   * Shown next to each message.
   */
  context?: string
  /**
   * Default: whether stdout is a TTY.
   */
  colors?: boolean
}

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

const levelTags: Record<LogLevel, (tag: string) => string> = {
  debug: pc.gray,
  info: pc.blue,
  warn: pc.yellow,
  error: pc.red,
}

/**
 * Formats one log line, e.g. `[warn] (merge) 2 conflicts`.
 */
export function formatLogLine(
  level: LogLevel,
  message: string,
  context: string,
  useColors: boolean
): string {
  const tag = useColors ? levelTags[level](`[${level}]`) : `[${level}]`
  let ctx = ""
  if (context) {
    ctx = useColors ? `${pc.dim(`(${context})`)} ` : `(${context}) `
  }
  return `${tag} ${ctx}${message}`
}

/**
 * Creates a logger that writes to the console.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const minPriority = levelPriority[options.level ?? "info"]
  const context = options.context ?? ""
  const useColors = options.colors ?? (process.stdout.isTTY ?? false)

  const log =
    (level: LogLevel, write: (...args: unknown[]) => void) =>
    (message: string, data?: unknown): void => {
      if (levelPriority[level] < minPriority) {
        return
      }
      const line = formatLogLine(level, message, context, useColors)
      if (data === undefined) {
        write(line)
      } else {
        write(line, data)
      }
    }

  return {
    debug: log("debug", console.debug),
    info: log("info", console.info),
    warn: log("warn", console.warn),
    error: log("error", console.error),
  }
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
}
