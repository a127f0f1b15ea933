import type { HookManager } from "../core/hook-manager"
import type { IdeRegistry } from "../integrations/ide"
import type { FileSystem } from "../utils/fs"
import type { Logger } from "../utils/logger"
import { createDevcontainerHook, registerDevcontainerHook } from "./devcontainer"
import { createGitCryptHook, registerGitCryptHook } from "./git-crypt"
import { createIdeOpeningHook, registerIdeOpeningHook } from "./ide-opening"
import { registerScriptHooks } from "./script-hooks"

export type DefaultHookOptions = {
  readonly hookManager: HookManager
  readonly fs: FileSystem
  readonly ides: IdeRegistry
  readonly logger?: Logger
  /** User scripts; null turns them off (`--no-hooks` or `hooks.enabled: false`). */
  readonly scripts: { readonly hooksDir: string; readonly timeoutMs: number } | null
}

export const registerDefaultHooks = ({ hookManager, fs, ides, logger, scripts }: DefaultHookOptions): void => {
  const child = (name: string): Logger | undefined => logger?.createChild(`[${name}]`)

  registerDevcontainerHook({ hookManager, hook: createDevcontainerHook({ fs, logger: child("devcontainer") }) })
  registerGitCryptHook({ hookManager, hook: createGitCryptHook({ fs, logger: child("git-crypt") }) })
  registerIdeOpeningHook({ hookManager, hook: createIdeOpeningHook({ ides }) })
  if (scripts !== null) {
    registerScriptHooks({
      hookManager,
      options: { hooksDir: scripts.hooksDir, timeoutMs: scripts.timeoutMs, fs, logger: child("hooks") },
    })
  }
}
