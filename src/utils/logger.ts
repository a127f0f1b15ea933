import chalk from "chalk"

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

type LoggerOptions = {
  readonly level?: LogLevel
  readonly prefix?: string
  readonly env?: NodeJS.ProcessEnv
}

export type Logger = {
  readonly level: LogLevel
  readonly prefix: string
  error: (message: string, error?: Error) => void
  warn: (message: string) => void
  info: (message: string) => void
  debug: (message: string) => void
  success: (message: string) => void
  createChild: (suffix: string) => Logger
}

export const resolveLogLevelFromEnv = (env: NodeJS.ProcessEnv): LogLevel => {
  if (env.ARBOR_DEBUG === "true") {
    return LogLevel.DEBUG
  }
  if (env.ARBOR_VERBOSE === "true") {
    return LogLevel.INFO
  }
  return LogLevel.WARN
}

const joinPrefix = (prefix: string, text: string): string => {
  return prefix.length > 0 ? `${prefix} ${text}` : text
}

/** Every line goes to stderr; stdout carries only command output (paths, tables, JSON). */
export const createLogger = (options: LoggerOptions = {}): Logger => {
  const env = options.env ?? process.env
  const printStacks = env.ARBOR_DEBUG === "true"

  const build = (prefix: string, level: LogLevel): Logger => {
    const emit = (threshold: LogLevel, line: string, write: (text: string) => void = console.error): void => {
      if (level >= threshold) {
        write(joinPrefix(prefix, line))
      }
    }

    return {
      level,
      prefix,
      error: (message, error) => {
        emit(LogLevel.ERROR, `Error: ${message}`, (text) => console.error(chalk.red(text)))
        if (level >= LogLevel.ERROR && printStacks && error?.stack !== undefined) {
          console.error(chalk.gray(error.stack))
        }
      },
      warn: (message) => emit(LogLevel.WARN, message, (text) => console.warn(chalk.yellow(text))),
      info: (message) => emit(LogLevel.INFO, message),
      debug: (message) => emit(LogLevel.DEBUG, `[DEBUG] ${message}`, (text) => console.error(chalk.gray(text))),
      success: (message) => emit(LogLevel.INFO, message, (text) => console.error(chalk.green(text))),
      createChild: (suffix) => build(joinPrefix(prefix, suffix), level),
    }
  }

  return build(options.prefix ?? "", options.level ?? resolveLogLevelFromEnv(env))
}
