import { join } from "node:path"
import { OPERATION_NAMES } from "../core/constants"
import type { HookManager, PreWorktreeCreationHook } from "../core/hook-manager"
import type { FileSystem } from "../utils/fs"
import type { Logger } from "../utils/logger"

export const DEVCONTAINER_HOOK_NAME = "devcontainer-detached-worktree"

const DEVCONTAINER_CANDIDATES = [[".devcontainer", "devcontainer.json"], [".devcontainer.json"]] as const

export const detectDevcontainer = async ({
  fs,
  repoPath,
}: {
  readonly fs: FileSystem
  readonly repoPath: string
}): Promise<boolean> => {
  for (const segments of DEVCONTAINER_CANDIDATES) {
    if (await fs.exists(join(repoPath, ...segments))) {
      return true
    }
  }
  return false
}

/** A linked worktree's `.git` file points at a host path a dev container cannot follow, so these repositories get a standalone clone. */
export const createDevcontainerHook = ({
  fs,
  logger,
}: {
  readonly fs: FileSystem
  readonly logger?: Logger
}): PreWorktreeCreationHook => {
  return {
    name: DEVCONTAINER_HOOK_NAME,
    priority: 10,
    beforeWorktreeCreation: async (ctx) => {
      if (ctx.parameters.kind !== "worktree") {
        return
      }
      if (await detectDevcontainer({ fs, repoPath: ctx.parameters.repoPath })) {
        ctx.metadata.detached = true
        logger?.info("Devcontainer detected, cloning a standalone checkout")
      }
    },
  }
}

export const registerDevcontainerHook = ({
  hookManager,
  hook,
}: {
  readonly hookManager: HookManager
  readonly hook: PreWorktreeCreationHook
}): void => {
  hookManager.registerPreWorktreeCreationHook(OPERATION_NAMES.CREATE_WORKTREE, hook)
  hookManager.registerPreWorktreeCreationHook(OPERATION_NAMES.LOAD_WORKTREE, hook)
}
