import { describe, expect, it, vi } from "vitest"
import { OPERATION_NAMES } from "../core/constants"
import { createHookContext, createHookManager, type HookContext } from "../core/hook-manager"
import type { IdeRegistry } from "../integrations/ide"
import { createIdeOpeningHook, registerIdeOpeningHook } from "./ide-opening"

const createFakeIdes = () => {
  return {
    get: vi.fn<IdeRegistry["get"]>(),
    open: vi.fn<IdeRegistry["open"]>(async () => undefined),
  }
}

const worktreeContext = (ide: string | null): HookContext => {
  const ctx = createHookContext({
    operation: OPERATION_NAMES.CREATE_WORKTREE,
    parameters: {
      kind: "worktree",
      repoUrl: "repo",
      repoPath: "/src/repo",
      remote: "origin",
      branch: "feature-x",
      worktreePath: "/code/repo/origin/feature-x",
      ide,
      force: false,
    },
  })
  ctx.results.targetPath = "/code/repo/origin/feature-x"
  return ctx
}

describe("createIdeOpeningHook", () => {
  it("opens the produced path and records the IDE", async () => {
    const ides = createFakeIdes()
    const ctx = worktreeContext("cursor")

    await createIdeOpeningHook({ ides }).postExecute(ctx)

    expect(ides.open).toHaveBeenCalledWith("cursor", "/code/repo/origin/feature-x")
    expect(ctx.results.openedIde).toBe("cursor")
  })

  it("skips when no IDE was requested", async () => {
    const ides = createFakeIdes()
    const ctx = worktreeContext(null)

    await createIdeOpeningHook({ ides }).postExecute(ctx)

    expect(ides.open).not.toHaveBeenCalled()
    expect(ctx.results.openedIde).toBeNull()
  })

  it("skips after a failed operation", async () => {
    const ides = createFakeIdes()
    const ctx = worktreeContext("vscode")
    ctx.error = new Error("git worktree add failed")

    await createIdeOpeningHook({ ides }).postExecute(ctx)

    expect(ides.open).not.toHaveBeenCalled()
  })

  it("is registered for the operations that produce something to open", () => {
    const hookManager = createHookManager()
    registerIdeOpeningHook({ hookManager, hook: createIdeOpeningHook({ ides: createFakeIdes() }) })

    const registered = [
      OPERATION_NAMES.CREATE_WORKTREE,
      OPERATION_NAMES.LOAD_WORKTREE,
      OPERATION_NAMES.OPEN_WORKTREE,
      OPERATION_NAMES.CREATE_WORKSPACE_WORKTREES,
      OPERATION_NAMES.DELETE_WORKTREE,
    ].map((operation) => hookManager.listHooks(operation).length)

    expect(registered).toEqual([1, 1, 1, 1, 0])
  })
})
