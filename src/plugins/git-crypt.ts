import { basename, dirname, join, resolve } from "node:path"
import { OPERATION_NAMES } from "../core/constants"
import { createCliError } from "../core/errors"
import type { HookManager, PostWorktreeCheckoutHook } from "../core/hook-manager"
import type { FileSystem } from "../utils/fs"
import type { Logger } from "../utils/logger"

export const GIT_CRYPT_HOOK_NAME = "git-crypt-worktree-checkout"

export const usesGitCrypt = async ({
  fs,
  repoPath,
}: {
  readonly fs: FileSystem
  readonly repoPath: string
}): Promise<boolean> => {
  const attributesPath = join(repoPath, ".gitattributes")
  if ((await fs.exists(attributesPath)) !== true) {
    return false
  }
  return (await fs.readFile(attributesPath)).includes("filter=git-crypt")
}

/**
 * Resolves the git directory of a checkout: the `.git` directory of a standalone clone, or the
 * per-worktree directory named by the `.git` file git writes into a linked worktree.
 */
export const resolveWorktreeGitDir = async ({
  fs,
  repoPath,
  worktreePath,
}: {
  readonly fs: FileSystem
  readonly repoPath: string
  readonly worktreePath: string
}): Promise<string> => {
  const dotGit = join(worktreePath, ".git")
  if (await fs.exists(dotGit)) {
    if (await fs.isDirectory(dotGit)) {
      return dotGit
    }
    const match = /^gitdir:\s*(.+)$/m.exec(await fs.readFile(dotGit))
    if (match?.[1] !== undefined) {
      return resolve(worktreePath, match[1].trim())
    }
  }
  return join(repoPath, ".git", "worktrees", basename(worktreePath))
}

export const createGitCryptHook = ({
  fs,
  logger,
}: {
  readonly fs: FileSystem
  readonly logger?: Logger
}): PostWorktreeCheckoutHook => {
  return {
    name: GIT_CRYPT_HOOK_NAME,
    priority: 50,
    afterWorktreeCheckout: async (ctx) => {
      if (ctx.parameters.kind !== "worktree") {
        return
      }
      const { repoPath, worktreePath } = ctx.parameters
      if ((await usesGitCrypt({ fs, repoPath })) !== true) {
        return
      }

      const keyPath = join(repoPath, ".git", "git-crypt", "keys", "default")
      if ((await fs.exists(keyPath)) !== true) {
        throw createCliError("DEPENDENCY_MISSING", {
          message: "git-crypt key not found in repository. Please ensure the repository is unlocked with git-crypt unlock",
          details: { repoPath, keyPath },
        })
      }

      const target = join(await resolveWorktreeGitDir({ fs, repoPath, worktreePath }), "git-crypt", "keys", "default")
      await fs.mkdirAll(dirname(target))
      await fs.copyFile(keyPath, target)
      logger?.info(`Copied git-crypt key into ${target}`)
    },
  }
}

export const registerGitCryptHook = ({
  hookManager,
  hook,
}: {
  readonly hookManager: HookManager
  readonly hook: PostWorktreeCheckoutHook
}): void => {
  hookManager.registerPostWorktreeCheckoutHook(OPERATION_NAMES.CREATE_WORKTREE, hook)
  hookManager.registerPostWorktreeCheckoutHook(OPERATION_NAMES.LOAD_WORKTREE, hook)
}
