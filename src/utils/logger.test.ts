import chalk from "chalk"
import { afterEach, describe, expect, it, vi } from "vitest"
import { createLogger, LogLevel, resolveLogLevelFromEnv } from "./logger"

afterEach(() => {
  vi.restoreAllMocks()
})

describe("resolveLogLevelFromEnv", () => {
  it("defaults to WARN and honours ARBOR_VERBOSE and ARBOR_DEBUG", () => {
    expect(resolveLogLevelFromEnv({})).toBe(LogLevel.WARN)
    expect(resolveLogLevelFromEnv({ ARBOR_VERBOSE: "true" })).toBe(LogLevel.INFO)
    expect(resolveLogLevelFromEnv({ ARBOR_VERBOSE: "true", ARBOR_DEBUG: "true" })).toBe(LogLevel.DEBUG)
    expect(resolveLogLevelFromEnv({ ARBOR_DEBUG: "1" })).toBe(LogLevel.WARN)
  })
})

describe("createLogger", () => {
  it("filters by level and keeps stdout free", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined)
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined)
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined)
    const logger = createLogger({ level: LogLevel.WARN, prefix: "[arbor]", env: {} })

    logger.error("failed")
    logger.warn("watch out")
    logger.info("info message")
    logger.debug("debug message")
    logger.success("done")

    expect(errorSpy).toHaveBeenCalledTimes(1)
    expect(warnSpy).toHaveBeenCalledTimes(1)
    expect(logSpy).not.toHaveBeenCalled()
    expect(String(errorSpy.mock.calls[0]?.[0])).toContain("[arbor] Error: failed")
    expect(String(warnSpy.mock.calls[0]?.[0])).toContain("[arbor] watch out")
  })

  it("prints errors at every level through the same gate as the other lines", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined)

    for (const level of [LogLevel.ERROR, LogLevel.WARN, LogLevel.INFO, LogLevel.DEBUG]) {
      createLogger({ level, env: {} }).error("failed")
    }

    expect(errorSpy.mock.calls.map((call) => String(call[0]))).toEqual(
      Array.from({ length: 4 }, () => chalk.red("Error: failed")),
    )
  })

  it("prints success lines at INFO", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined)

    createLogger({ level: LogLevel.INFO, prefix: "[arbor]", env: {} }).success("done")

    expect(String(errorSpy.mock.calls[0]?.[0])).toContain("[arbor] done")
  })

  it("prints info and debug lines when verbose enough", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined)
    const logger = createLogger({ level: LogLevel.DEBUG, env: {} })

    logger.info("creating worktree")
    logger.debug("git worktree add")

    expect(errorSpy).toHaveBeenCalledTimes(2)
    expect(String(errorSpy.mock.calls[0]?.[0])).toBe("creating worktree")
    expect(String(errorSpy.mock.calls[1]?.[0])).toContain("[DEBUG] git worktree add")
  })

  it("prints stack traces only when ARBOR_DEBUG is set", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined)
    const error = new Error("boom")
    error.stack = "mock-stack"

    createLogger({ level: LogLevel.ERROR, env: {} }).error("failed", error)
    expect(errorSpy).toHaveBeenCalledTimes(1)

    createLogger({ level: LogLevel.ERROR, env: { ARBOR_DEBUG: "true" } }).error("failed", error)
    expect(errorSpy).toHaveBeenCalledTimes(3)
    expect(String(errorSpy.mock.calls[2]?.[0])).toContain("mock-stack")
  })

  it("inherits prefix and level in child loggers", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined)
    const child = createLogger({ level: LogLevel.DEBUG, prefix: "[root]", env: {} }).createChild("[hooks]")

    child.debug("trace")

    expect(child.level).toBe(LogLevel.DEBUG)
    expect(child.prefix).toBe("[root] [hooks]")
    expect(String(errorSpy.mock.calls[0]?.[0])).toContain("[root] [hooks] [DEBUG] trace")
  })
})
