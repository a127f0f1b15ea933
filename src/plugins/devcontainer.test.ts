import { mkdir, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { afterEach, describe, expect, it } from "vitest"
import { OPERATION_NAMES } from "../core/constants"
import { createHookContext, createHookManager } from "../core/hook-manager"
import { cleanupRepoFixtures, createTempRoot } from "../test-utils/repo-fixture"
import { createFileSystem } from "../utils/fs"
import { createDevcontainerHook, detectDevcontainer, registerDevcontainerHook } from "./devcontainer"

const fs = createFileSystem()

afterEach(async () => {
  await cleanupRepoFixtures()
})

const worktreeContext = (repoPath: string) => {
  return createHookContext({
    operation: OPERATION_NAMES.CREATE_WORKTREE,
    parameters: {
      kind: "worktree",
      repoUrl: "repo",
      repoPath,
      remote: "origin",
      branch: "feature-x",
      worktreePath: join(repoPath, "..", "wt"),
      ide: null,
      force: false,
    },
  })
}

describe("detectDevcontainer", () => {
  it("finds .devcontainer/devcontainer.json and .devcontainer.json", async () => {
    const nested = await createTempRoot()
    await mkdir(join(nested, ".devcontainer"), { recursive: true })
    await writeFile(join(nested, ".devcontainer", "devcontainer.json"), "{}", "utf8")
    const rootFile = await createTempRoot()
    await writeFile(join(rootFile, ".devcontainer.json"), "{}", "utf8")
    const plain = await createTempRoot()

    await expect(detectDevcontainer({ fs, repoPath: nested })).resolves.toBe(true)
    await expect(detectDevcontainer({ fs, repoPath: rootFile })).resolves.toBe(true)
    await expect(detectDevcontainer({ fs, repoPath: plain })).resolves.toBe(false)
  })
})

describe("createDevcontainerHook", () => {
  it("requests a detached checkout when a devcontainer exists", async () => {
    const repoPath = await createTempRoot()
    await writeFile(join(repoPath, ".devcontainer.json"), "{}", "utf8")
    const hookManager = createHookManager()
    registerDevcontainerHook({ hookManager, hook: createDevcontainerHook({ fs }) })
    const ctx = worktreeContext(repoPath)

    await hookManager.executePreWorktreeCreationHooks(OPERATION_NAMES.CREATE_WORKTREE, ctx)

    expect(ctx.metadata.detached).toBe(true)
    expect(hookManager.listHooks(OPERATION_NAMES.LOAD_WORKTREE)).toEqual([
      { phase: "preWorktreeCreation", name: "devcontainer-detached-worktree", priority: 10 },
    ])
  })

  it("leaves the checkout attached otherwise", async () => {
    const repoPath = await createTempRoot()
    const ctx = worktreeContext(repoPath)

    await createDevcontainerHook({ fs }).beforeWorktreeCreation(ctx)

    expect(ctx.metadata.detached).toBe(false)
  })
})
