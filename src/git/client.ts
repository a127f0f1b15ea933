import { basename, dirname, join, resolve } from "node:path"
import { DEFAULT_BRANCH } from "../core/constants"
import { createCliError } from "../core/errors"
import type { Logger } from "../utils/logger"
import { runGitCommand } from "./exec"
import { repositoryNameFromUrl } from "./repository-name"
import { parseWorktreePorcelain, type GitWorktreeEntry } from "./worktree"

export type CreateWorktreeInput = {
  readonly repoPath: string
  readonly worktreePath: string
  readonly branch: string
}

export type CloneInput = {
  readonly source: string
  readonly targetPath: string
  /** Branch to check out; the source's default branch when omitted. */
  readonly branch?: string
  readonly recursive?: boolean
}

export type RemoveWorktreeInput = {
  readonly repoPath: string
  readonly worktreePath: string
  readonly force: boolean
}

export type GitClient = {
  status: (worktreePath: string) => Promise<string>
  /** Main checkout of the repository containing `cwd`, also when `cwd` is inside a linked worktree. */
  getRepositoryRoot: (cwd: string) => Promise<string>
  createWorktree: (input: CreateWorktreeInput) => Promise<void>
  clone: (input: CloneInput) => Promise<void>
  removeWorktree: (input: RemoveWorktreeInput) => Promise<void>
  pruneWorktrees: (repoPath: string) => Promise<void>
  listWorktrees: (repoPath: string) => Promise<GitWorktreeEntry[]>
  branchExists: (repoPath: string, branch: string) => Promise<boolean>
  createBranch: (repoPath: string, branch: string, startPoint?: string) => Promise<void>
  checkReferenceConflict: (repoPath: string, branch: string) => Promise<void>
  getCurrentBranch: (repoPath: string) => Promise<string | null>
  getRemoteURL: (repoPath: string, remote: string) => Promise<string | null>
  getRepositoryName: (repoPath: string) => Promise<string>
  getDefaultBranch: (repoPath: string, remote: string) => Promise<string>
  /** Branch a remote URL's HEAD points at, or null when the remote does not advertise one. */
  getRemoteHeadBranch: (input: { readonly url: string; readonly cwd: string }) => Promise<string | null>
  fetchRemote: (repoPath: string, remote: string, branch?: string) => Promise<void>
  remoteBranchExists: (repoPath: string, remote: string, branch: string) => Promise<boolean>
  createTrackingBranch: (input: {
    readonly repoPath: string
    readonly branch: string
    readonly remote: string
    readonly remoteBranch: string
  }) => Promise<void>
}

const refExists = async (cwd: string, ref: string): Promise<boolean> => {
  const result = await runGitCommand({ cwd, args: ["show-ref", "--verify", "--quiet", ref], reject: false })
  return result.exitCode === 0
}

const parseSymrefHead = (output: string): string | null => {
  for (const line of output.split("\n")) {
    const match = /^ref:\s+refs\/heads\/(\S+)\s+HEAD$/.exec(line.trim())
    if (match?.[1] !== undefined) {
      return match[1]
    }
  }
  return null
}

export const createGitClient = ({ logger }: { readonly logger?: Logger } = {}): GitClient => {
  const getCurrentBranch = async (repoPath: string): Promise<string | null> => {
    const result = await runGitCommand({ cwd: repoPath, args: ["symbolic-ref", "--quiet", "--short", "HEAD"], reject: false })
    const branch = result.stdout.trim()
    return result.exitCode === 0 && branch.length > 0 ? branch : null
  }

  const getRemoteURL = async (repoPath: string, remote: string): Promise<string | null> => {
    const result = await runGitCommand({ cwd: repoPath, args: ["config", "--get", `remote.${remote}.url`], reject: false })
    const url = result.stdout.trim()
    return result.exitCode === 0 && url.length > 0 ? url : null
  }

  const status = async (worktreePath: string): Promise<string> => {
    const result = await runGitCommand({ cwd: worktreePath, args: ["status", "--porcelain"] })
    return result.stdout
  }

  return {
    status,
    getRepositoryRoot: async (cwd) => {
      const toplevel = await runGitCommand({ cwd, args: ["rev-parse", "--show-toplevel"], reject: false })
      if (toplevel.exitCode !== 0) {
        throw createCliError("NOT_GIT_REPOSITORY", {
          message: `Not a git repository: ${cwd}`,
          details: { path: cwd },
        })
      }
      const worktreeRoot = toplevel.stdout.trim()
      const commonDir = await runGitCommand({
        cwd,
        args: ["rev-parse", "--path-format=absolute", "--git-common-dir"],
        reject: false,
      })
      const gitCommonDir = commonDir.exitCode === 0 ? commonDir.stdout.trim() : join(worktreeRoot, ".git")
      return basename(gitCommonDir) === ".git" ? dirname(gitCommonDir) : worktreeRoot
    },
    createWorktree: async ({ repoPath, worktreePath, branch }) => {
      const args = ["worktree", "add", worktreePath, branch]
      logger?.debug(`git ${args.join(" ")}`)
      await runGitCommand({ cwd: repoPath, args })
    },
    clone: async ({ source, targetPath, branch, recursive = false }) => {
      const args = [
        "clone",
        ...(recursive ? ["--recurse-submodules"] : []),
        ...(branch === undefined ? [] : ["--branch", branch]),
        source,
        targetPath,
      ]
      logger?.debug(`git ${args.join(" ")}`)
      await runGitCommand({ cwd: dirname(targetPath), args })
    },
    removeWorktree: async ({ repoPath, worktreePath, force }) => {
      const args = force ? ["worktree", "remove", "--force", worktreePath] : ["worktree", "remove", worktreePath]
      logger?.debug(`git ${args.join(" ")}`)
      await runGitCommand({ cwd: repoPath, args })
    },
    pruneWorktrees: async (repoPath) => {
      await runGitCommand({ cwd: repoPath, args: ["worktree", "prune"] })
    },
    listWorktrees: async (repoPath) => {
      const result = await runGitCommand({ cwd: repoPath, args: ["worktree", "list", "--porcelain", "-z"] })
      return parseWorktreePorcelain(result.stdout)
    },
    branchExists: async (repoPath, branch) => refExists(repoPath, `refs/heads/${branch}`),
    createBranch: async (repoPath, branch, startPoint) => {
      const args = startPoint === undefined ? ["branch", branch] : ["branch", branch, startPoint]
      await runGitCommand({ cwd: repoPath, args })
    },
    checkReferenceConflict: async (repoPath, branch) => {
      const parts = branch.split("/")
      for (let index = 1; index < parts.length; index += 1) {
        const parent = parts.slice(0, index).join("/")
        for (const ref of [`refs/heads/${parent}`, `refs/tags/${parent}`]) {
          if (await refExists(repoPath, ref)) {
            throw createCliError("INVALID_BRANCH_NAME", {
              message: `Cannot create branch '${branch}': reference '${ref}' already exists`,
              details: { branch, conflictingRef: ref },
            })
          }
        }
      }
    },
    getCurrentBranch,
    getRemoteURL,
    getRepositoryName: async (repoPath) => {
      const originUrl = await getRemoteURL(repoPath, "origin")
      const fromUrl = originUrl === null ? null : repositoryNameFromUrl(originUrl)
      if (fromUrl !== null) {
        return fromUrl
      }
      const directoryName = basename(resolve(repoPath))
      return directoryName.endsWith(".git") ? directoryName.slice(0, -".git".length) : directoryName
    },
    getDefaultBranch: async (repoPath, remote) => {
      const local = await runGitCommand({
        cwd: repoPath,
        args: ["symbolic-ref", "--quiet", "--short", `refs/remotes/${remote}/HEAD`],
        reject: false,
      })
      const prefix = `${remote}/`
      const localHead = local.stdout.trim()
      if (local.exitCode === 0 && localHead.startsWith(prefix)) {
        return localHead.slice(prefix.length)
      }
      if ((await getRemoteURL(repoPath, remote)) !== null) {
        const remoteHead = await runGitCommand({
          cwd: repoPath,
          args: ["ls-remote", "--symref", remote, "HEAD"],
          reject: false,
        })
        const parsed = remoteHead.exitCode === 0 ? parseSymrefHead(remoteHead.stdout) : null
        if (parsed !== null) {
          return parsed
        }
        logger?.debug(`could not read default branch of ${remote}; falling back to the current branch`)
      }
      return (await getCurrentBranch(repoPath)) ?? DEFAULT_BRANCH
    },
    getRemoteHeadBranch: async ({ url, cwd }) => {
      const result = await runGitCommand({ cwd, args: ["ls-remote", "--symref", url, "HEAD"] })
      return parseSymrefHead(result.stdout)
    },
    fetchRemote: async (repoPath, remote, branch) => {
      const args = branch === undefined ? ["fetch", remote] : ["fetch", remote, branch]
      await runGitCommand({ cwd: repoPath, args })
    },
    remoteBranchExists: async (repoPath, remote, branch) => refExists(repoPath, `refs/remotes/${remote}/${branch}`),
    createTrackingBranch: async ({ repoPath, branch, remote, remoteBranch }) => {
      await runGitCommand({ cwd: repoPath, args: ["branch", "--track", branch, `${remote}/${remoteBranch}`] })
    },
  }
}
