import { mkdir, realpath, rm, stat, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { afterEach, describe, expect, it } from "vitest"
import { cleanupRepoFixtures, createTempRoot, initGitRepo, runGit } from "../test-utils/repo-fixture"
import { createGitClient } from "./client"

const git = createGitClient()

afterEach(async () => {
  await cleanupRepoFixtures()
})

const setupRepo = async (): Promise<{ readonly root: string; readonly repoPath: string }> => {
  const root = await realpath(await createTempRoot())
  const repoPath = await initGitRepo(join(root, "repo"))
  return { root, repoPath }
}

describe("createGitClient", () => {
  it("creates, lists and removes a worktree", async () => {
    const { root, repoPath } = await setupRepo()
    const worktreePath = join(root, "wt", "feature-x")
    await git.createBranch(repoPath, "feature-x")

    await git.createWorktree({ repoPath, worktreePath, branch: "feature-x" })

    const listed = await git.listWorktrees(repoPath)
    expect(listed.map((entry) => [entry.path, entry.branch])).toEqual([
      [repoPath, "main"],
      [worktreePath, "feature-x"],
    ])
    await expect(git.getCurrentBranch(worktreePath)).resolves.toBe("feature-x")

    await git.removeWorktree({ repoPath, worktreePath, force: false })
    expect((await git.listWorktrees(repoPath)).map((entry) => entry.path)).toEqual([repoPath])
  })

  it("clones a standalone checkout of a local branch", async () => {
    const { root, repoPath } = await setupRepo()
    const clonePath = join(root, "wt", "pinned")
    await git.createBranch(repoPath, "pinned")
    await mkdir(join(root, "wt"), { recursive: true })

    await git.clone({ source: repoPath, targetPath: clonePath, branch: "pinned" })

    expect((await stat(join(clonePath, ".git"))).isDirectory()).toBe(true)
    await expect(git.getCurrentBranch(clonePath)).resolves.toBe("pinned")
    expect((await git.listWorktrees(repoPath)).map((entry) => entry.path)).toEqual([repoPath])
  })

  it("resolves the main checkout from a subdirectory and from a linked worktree", async () => {
    const { root, repoPath } = await setupRepo()
    const nested = join(repoPath, "src", "deep")
    await mkdir(nested, { recursive: true })
    const worktreePath = join(root, "wt", "side")
    await git.createBranch(repoPath, "side")
    await git.createWorktree({ repoPath, worktreePath, branch: "side" })

    await expect(git.getRepositoryRoot(nested)).resolves.toBe(repoPath)
    await expect(git.getRepositoryRoot(worktreePath)).resolves.toBe(repoPath)
    await expect(git.getRepositoryRoot(join(root, "wt"))).rejects.toMatchObject({ code: "NOT_GIT_REPOSITORY" })
  })

  it("wraps git failures with stderr", async () => {
    const { root, repoPath } = await setupRepo()

    await expect(
      git.createWorktree({ repoPath, worktreePath: join(root, "wt", "nope"), branch: "does-not-exist" }),
    ).rejects.toMatchObject({ code: "GIT_COMMAND_FAILED", details: { cwd: repoPath } })
  })

  it("reports branch existence and creates branches", async () => {
    const { repoPath } = await setupRepo()

    await expect(git.branchExists(repoPath, "topic")).resolves.toBe(false)
    await git.createBranch(repoPath, "topic")
    await expect(git.branchExists(repoPath, "topic")).resolves.toBe(true)
  })

  it("detects conflicting parent references", async () => {
    const { repoPath } = await setupRepo()
    await git.createBranch(repoPath, "feature")

    await expect(git.checkReferenceConflict(repoPath, "feature/login")).rejects.toMatchObject({
      code: "INVALID_BRANCH_NAME",
      details: { conflictingRef: "refs/heads/feature" },
    })
    await expect(git.checkReferenceConflict(repoPath, "topic/login")).resolves.toBeUndefined()
  })

  it("reports dirty state through status", async () => {
    const { repoPath } = await setupRepo()

    await expect(git.status(repoPath)).resolves.toBe("")
    await writeFile(join(repoPath, "notes.txt"), "draft\n", "utf8")

    await expect(git.status(repoPath)).resolves.toBe("?? notes.txt")
  })

  it("names the repository after origin or falls back to the directory", async () => {
    const { repoPath } = await setupRepo()

    await expect(git.getRemoteURL(repoPath, "origin")).resolves.toBeNull()
    await expect(git.getRepositoryName(repoPath)).resolves.toBe("repo")

    await runGit(repoPath, ["remote", "add", "origin", "git@github.com:acme/app.git"])
    await expect(git.getRemoteURL(repoPath, "origin")).resolves.toBe("git@github.com:acme/app.git")
    await expect(git.getRepositoryName(repoPath)).resolves.toBe("github.com/acme/app")
  })

  it("fetches from a local remote and creates a tracking branch", async () => {
    const { root, repoPath } = await setupRepo()
    const upstreamPath = await initGitRepo(join(root, "upstream"))
    await runGit(upstreamPath, ["branch", "shared"])
    await runGit(repoPath, ["remote", "add", "upstream", upstreamPath])

    await expect(git.remoteBranchExists(repoPath, "upstream", "shared")).resolves.toBe(false)
    await git.fetchRemote(repoPath, "upstream")
    await expect(git.remoteBranchExists(repoPath, "upstream", "shared")).resolves.toBe(true)

    await git.createTrackingBranch({ repoPath, branch: "shared", remote: "upstream", remoteBranch: "shared" })
    await expect(runGit(repoPath, ["config", "--get", "branch.shared.remote"])).resolves.toBe("upstream")
    await expect(git.getDefaultBranch(repoPath, "upstream")).resolves.toBe("main")
  })

  it("falls back to the current branch when no remote is configured", async () => {
    const { repoPath } = await setupRepo()

    await expect(git.getDefaultBranch(repoPath, "origin")).resolves.toBe("main")
  })

  it("prunes worktrees whose directory disappeared", async () => {
    const { root, repoPath } = await setupRepo()
    const worktreePath = join(root, "wt", "gone")
    await git.createBranch(repoPath, "gone")
    await git.createWorktree({ repoPath, worktreePath, branch: "gone" })
    await rm(worktreePath, { recursive: true, force: true })

    await git.pruneWorktrees(repoPath)

    expect((await git.listWorktrees(repoPath)).map((entry) => entry.path)).toEqual([repoPath])
  })
})
