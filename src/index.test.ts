import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"

const createCliMock = vi.fn()

vi.mock("./cli/index", () => {
  return {
    createCli: createCliMock,
  }
})

// The entry point runs on import; let its promise chain settle.
const startEntryPoint = async (run: () => Promise<number>) => {
  const exitSpy = vi.spyOn(process, "exit").mockImplementation((() => undefined) as never)
  const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined)
  createCliMock.mockReturnValue({ run: vi.fn(run) })

  await import("./index")
  await new Promise<void>((resolve) => {
    setTimeout(resolve, 0)
  })
  return { exitSpy, errorSpy }
}

describe("entry point", () => {
  let previousDebug: string | undefined

  beforeEach(() => {
    vi.resetModules()
    createCliMock.mockReset()
    previousDebug = process.env.ARBOR_DEBUG
    delete process.env.ARBOR_DEBUG
  })

  afterEach(() => {
    if (previousDebug === undefined) {
      delete process.env.ARBOR_DEBUG
    } else {
      process.env.ARBOR_DEBUG = previousDebug
    }
    vi.restoreAllMocks()
  })

  it("does not call exit after a successful run", async () => {
    const { exitSpy } = await startEntryPoint(async () => 0)

    expect(exitSpy).not.toHaveBeenCalled()
  })

  it("exits with the code the command returned", async () => {
    const { exitSpy } = await startEntryPoint(async () => 8)

    expect(exitSpy).toHaveBeenCalledWith(8)
  })

  it("exits 1 when the command throws", async () => {
    const { exitSpy, errorSpy } = await startEntryPoint(async () => {
      throw new Error("status file unreadable")
    })

    expect(errorSpy).toHaveBeenCalledTimes(1)
    expect(errorSpy).toHaveBeenCalledWith("Error:", "status file unreadable")
    expect(exitSpy).toHaveBeenCalledWith(1)
  })

  it("prints the stack under ARBOR_DEBUG", async () => {
    process.env.ARBOR_DEBUG = "true"
    const error = new Error("status file unreadable")
    error.stack = "stack-trace"

    const { errorSpy } = await startEntryPoint(async () => {
      throw error
    })

    expect(errorSpy).toHaveBeenNthCalledWith(2, "stack-trace")
  })

  it("reports thrown values that are not errors", async () => {
    const { exitSpy, errorSpy } = await startEntryPoint(async () => {
      throw "lock lost"
    })

    expect(errorSpy).toHaveBeenCalledWith("An unexpected error occurred:", "lock lost")
    expect(exitSpy).toHaveBeenCalledWith(1)
  })
})
