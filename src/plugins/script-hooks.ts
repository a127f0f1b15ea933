import { constants as fsConstants } from "node:fs"
import { access, appendFile, mkdir } from "node:fs/promises"
import { dirname, join } from "node:path"
import { execa } from "execa"
import { DEFAULT_HOOK_TIMEOUT_MS, OPERATION_NAMES, type OperationName } from "../core/constants"
import { createCliError } from "../core/errors"
import type { HookContext, HookManager } from "../core/hook-manager"
import type { FileSystem } from "../utils/fs"
import type { Logger } from "../utils/logger"

export const SCRIPT_HOOK_PRIORITY = 100

export type ScriptPhase = "pre" | "post" | "error"

/** Script base names, e.g. `pre-create` and `post-workspace-create`. */
export const SCRIPT_NAMES: Readonly<Record<OperationName, string>> = {
  [OPERATION_NAMES.CREATE_WORKTREE]: "create",
  [OPERATION_NAMES.DELETE_WORKTREE]: "delete",
  [OPERATION_NAMES.DELETE_ALL_WORKTREES]: "delete-all",
  [OPERATION_NAMES.LOAD_WORKTREE]: "load",
  [OPERATION_NAMES.OPEN_WORKTREE]: "open",
  [OPERATION_NAMES.CREATE_WORKSPACE_WORKTREES]: "workspace-create",
  [OPERATION_NAMES.DELETE_WORKSPACE]: "workspace-delete",
  [OPERATION_NAMES.DELETE_REPOSITORY]: "repository-delete",
  [OPERATION_NAMES.CLONE_REPOSITORY]: "repository-clone",
  [OPERATION_NAMES.CREATE_WORKSPACE]: "workspace-new",
  [OPERATION_NAMES.ADD_REPOSITORY_TO_WORKSPACE]: "workspace-add",
  [OPERATION_NAMES.REMOVE_REPOSITORY_FROM_WORKSPACE]: "workspace-remove",
  [OPERATION_NAMES.INIT]: "init",
}

export type ScriptHookOptions = {
  readonly hooksDir: string
  readonly timeoutMs?: number
  readonly fs: FileSystem
  readonly logger?: Logger
}

export type ScriptHookRunner = {
  readonly logsDir: string
  run: (phase: ScriptPhase, ctx: HookContext) => Promise<void>
}

type ScriptResult = {
  readonly exitCode: number
  readonly stderr: string
  readonly timedOut: boolean
  readonly startedAt: string
  readonly endedAt: string
}

const nowTimestamp = (): string => {
  return new Date().toISOString().replace(/[^\d]/g, "").slice(0, 14)
}

const toLogFileName = ({ script, branch }: { readonly script: string; readonly branch: string | null }): string => {
  const safeBranch = branch !== null && branch.length > 0 ? branch.replace(/[^\w.-]/g, "_") : "none"
  return `${nowTimestamp()}_${script}_${safeBranch}.log`
}

const branchOf = (ctx: HookContext): string | null => {
  const { parameters } = ctx
  return parameters.kind === "worktree" || parameters.kind === "workspace" ? parameters.branch : null
}

export const buildScriptEnv = (ctx: HookContext): Record<string, string> => {
  const { parameters } = ctx
  const env: Record<string, string> = {
    ARBOR_TOOL: "arbor",
    ARBOR_OPERATION: ctx.operation,
    ARBOR_FORCE: parameters.force ? "1" : "0",
    ARBOR_IS_TTY: process.stdout.isTTY === true ? "1" : "0",
    ARBOR_BRANCH: branchOf(ctx) ?? "",
    ARBOR_TARGET_PATH: ctx.results.targetPath ?? "",
    ARBOR_DETACHED: ctx.metadata.detached ? "1" : "0",
  }
  if (parameters.kind === "worktree") {
    env.ARBOR_REPO_URL = parameters.repoUrl
    env.ARBOR_REPO_PATH = parameters.repoPath
    env.ARBOR_REMOTE = parameters.remote
    env.ARBOR_WORKTREE_PATH = parameters.worktreePath
  }
  if (parameters.kind === "repository") {
    env.ARBOR_REPO_URL = parameters.repoUrl
    env.ARBOR_REPO_PATH = parameters.repoPath ?? ""
  }
  if (parameters.kind === "workspace") {
    env.ARBOR_WORKSPACE = parameters.workspaceName
    env.ARBOR_WORKSPACE_FILE = parameters.workspaceFile ?? ""
    if (parameters.repository !== undefined) {
      env.ARBOR_REPOSITORY = parameters.repository
    }
  }
  if (ctx.error !== null) {
    env.ARBOR_ERROR = ctx.error.message
  }
  return env
}

const resolveWorkingDirectory = async ({
  fs,
  ctx,
  fallback,
}: {
  readonly fs: FileSystem
  readonly ctx: HookContext
  readonly fallback: string
}): Promise<string> => {
  const { parameters } = ctx
  const candidates =
    parameters.kind === "worktree"
      ? [parameters.worktreePath, parameters.repoPath]
      : parameters.kind === "repository" && parameters.repoPath !== null
        ? [parameters.repoPath]
        : []
  for (const candidate of candidates) {
    if (await fs.isDirectory(candidate)) {
      return candidate
    }
  }
  return fallback
}

const isExecutable = async (path: string): Promise<boolean> => {
  try {
    await access(path, fsConstants.X_OK)
    return true
  } catch {
    return false
  }
}

export const createScriptHookRunner = ({
  hooksDir,
  timeoutMs = DEFAULT_HOOK_TIMEOUT_MS,
  fs,
  logger,
}: ScriptHookOptions): ScriptHookRunner => {
  const logsDir = join(dirname(hooksDir), "logs")

  const writeLog = async ({
    script,
    branch,
    result,
  }: {
    readonly script: string
    readonly branch: string | null
    readonly result: ScriptResult
  }): Promise<void> => {
    await mkdir(logsDir, { recursive: true })
    const content = [
      `hook=${script}`,
      `start=${result.startedAt}`,
      `end=${result.endedAt}`,
      `exitCode=${String(result.exitCode)}`,
      `timedOut=${String(result.timedOut)}`,
      `stderr=${result.stderr}`,
      "",
    ].join("\n")
    await appendFile(join(logsDir, toLogFileName({ script, branch })), content, "utf8")
  }

  const run = async (phase: ScriptPhase, ctx: HookContext): Promise<void> => {
    const script = `${phase}-${SCRIPT_NAMES[ctx.operation]}`
    const path = join(hooksDir, script)
    if ((await fs.exists(path)) !== true) {
      return
    }
    if ((await isExecutable(path)) !== true) {
      throw createCliError("HOOK_NOT_EXECUTABLE", {
        message: `Hook is not executable: ${script}`,
        details: { hook: script, path },
      })
    }

    logger?.debug(`running ${path}`)
    const startedAt = new Date().toISOString()
    const execution = await execa(path, [], {
      cwd: await resolveWorkingDirectory({ fs, ctx, fallback: hooksDir }),
      env: buildScriptEnv(ctx),
      timeout: timeoutMs,
      reject: false,
    })
    const result: ScriptResult = {
      exitCode: execution.exitCode ?? 1,
      stderr: execution.stderr,
      timedOut: execution.timedOut,
      startedAt,
      endedAt: new Date().toISOString(),
    }
    await writeLog({ script, branch: branchOf(ctx), result })

    if (result.timedOut) {
      throw createCliError("HOOK_TIMEOUT", {
        message: `Hook timed out: ${script}`,
        details: { hook: script, timeoutMs, stderr: result.stderr },
      })
    }
    if (result.exitCode !== 0) {
      throw createCliError("HOOK_FAILED", {
        message: `Hook failed: ${script} (exitCode=${String(result.exitCode)})`,
        details: { hook: script, exitCode: result.exitCode, stderr: result.stderr },
      })
    }
  }

  return {
    logsDir,
    run,
  }
}

export const registerScriptHooks = ({
  hookManager,
  options,
}: {
  readonly hookManager: HookManager
  readonly options: ScriptHookOptions
}): void => {
  const runner = createScriptHookRunner(options)
  for (const operation of Object.values(OPERATION_NAMES)) {
    hookManager.registerPreHook(operation, {
      name: `script:pre-${SCRIPT_NAMES[operation]}`,
      priority: SCRIPT_HOOK_PRIORITY,
      preExecute: (ctx) => runner.run("pre", ctx),
    })
    hookManager.registerPostHook(operation, {
      name: `script:post-${SCRIPT_NAMES[operation]}`,
      priority: SCRIPT_HOOK_PRIORITY,
      postExecute: (ctx) => runner.run("post", ctx),
    })
    hookManager.registerErrorHook(operation, {
      name: `script:error-${SCRIPT_NAMES[operation]}`,
      priority: SCRIPT_HOOK_PRIORITY,
      onError: (ctx) => runner.run("error", ctx),
    })
  }
}
