import { OPERATION_NAMES } from "../core/constants"
import type { HookManager, PostHook } from "../core/hook-manager"
import type { IdeRegistry } from "../integrations/ide"

export const IDE_OPENING_HOOK_NAME = "ide-opening"

export const createIdeOpeningHook = ({ ides }: { readonly ides: IdeRegistry }): PostHook => {
  return {
    name: IDE_OPENING_HOOK_NAME,
    priority: 150,
    postExecute: async (ctx) => {
      if (ctx.error !== null) {
        return
      }
      const { parameters } = ctx
      if (parameters.kind !== "worktree" && parameters.kind !== "workspace") {
        return
      }
      if (parameters.ide === null || parameters.ide.length === 0) {
        return
      }
      const target = ctx.results.targetPath
      if (target === null) {
        throw new Error("cannot open IDE: the operation produced no path")
      }
      await ides.open(parameters.ide, target)
      ctx.results.openedIde = parameters.ide
    },
  }
}

export const registerIdeOpeningHook = ({
  hookManager,
  hook,
}: {
  readonly hookManager: HookManager
  readonly hook: PostHook
}): void => {
  for (const operation of [
    OPERATION_NAMES.CREATE_WORKTREE,
    OPERATION_NAMES.LOAD_WORKTREE,
    OPERATION_NAMES.OPEN_WORKTREE,
    OPERATION_NAMES.CREATE_WORKSPACE_WORKTREES,
  ]) {
    hookManager.registerPostHook(operation, hook)
  }
}
