import { describe, expect, it } from "vitest"
import { OPERATION_NAMES } from "./constants"
import { createHookContext, createHookManager } from "./hook-manager"
import { createOperationRunner, type OperationWarning } from "./operation-runner"

const createContext = () => {
  return createHookContext({ operation: OPERATION_NAMES.INIT, parameters: { kind: "bulk", force: false } })
}

describe("createOperationRunner", () => {
  it("runs pre hooks before the body", async () => {
    const hooks = createHookManager()
    const calls: string[] = []
    hooks.registerPreHook(OPERATION_NAMES.INIT, {
      name: "pre",
      priority: 1,
      preExecute: async () => {
        calls.push("pre")
      },
    })
    const runner = createOperationRunner({ hooks })

    const result = await runner.run(createContext(), async () => {
      calls.push("body")
      return 42
    })

    expect(result).toBe(42)
    expect(calls).toEqual(["pre", "body"])
  })

  it("exposes the failure to error hooks and rethrows the original error", async () => {
    const hooks = createHookManager()
    const seen: Array<string | undefined> = []
    hooks.registerErrorHook(OPERATION_NAMES.INIT, {
      name: "first",
      priority: 1,
      onError: async (ctx) => {
        seen.push(ctx.error?.message)
        throw new Error("reporter down")
      },
    })
    const runner = createOperationRunner({ hooks })
    const failure = new Error("body failed")
    const ctx = createContext()

    await expect(
      runner.run(ctx, async () => {
        throw failure
      }),
    ).rejects.toBe(failure)
    expect(seen).toEqual(["body failed"])
    expect(ctx.error).toBe(failure)
  })

  it("records tolerated failures as warnings", async () => {
    const runner = createOperationRunner({ hooks: createHookManager() })
    const warnings: OperationWarning[] = []

    await runner.runTolerated({
      phase: "post",
      run: async () => {
        throw new Error("editor missing")
      },
      warnings,
    })
    await runner.runTolerated({ phase: "post", run: async () => undefined, warnings })

    expect(warnings).toEqual([{ phase: "post", code: "INTERNAL_ERROR", message: "editor missing" }])
  })
})
