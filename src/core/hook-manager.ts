import type { Logger } from "../utils/logger"
import type { OperationName } from "./constants"
import { CliError, createCliError, toErrorMessage } from "./errors"

export type WorktreeOperationParameters = {
  readonly kind: "worktree"
  readonly repoUrl: string
  readonly repoPath: string
  readonly remote: string
  readonly branch: string
  readonly worktreePath: string
  readonly ide: string | null
  readonly force: boolean
}

export type WorkspaceOperationParameters = {
  readonly kind: "workspace"
  readonly workspaceName: string
  readonly workspaceFile: string | null
  readonly branch: string | null
  readonly ide: string | null
  readonly force: boolean
  /** Member repository an add or remove operation targets. */
  readonly repository?: string
}

export type RepositoryOperationParameters = {
  readonly kind: "repository"
  readonly repoUrl: string
  readonly repoPath: string | null
  readonly force: boolean
}

export type BulkOperationParameters = {
  readonly kind: "bulk"
  readonly force: boolean
}

export type HookParameters =
  | WorktreeOperationParameters
  | WorkspaceOperationParameters
  | RepositoryOperationParameters
  | BulkOperationParameters

/** Side channel a hook uses to steer later phases of the same operation. */
export type HookMetadata = {
  detached: boolean
}

export type HookResults = {
  /** Worktree directory or generated workspace file the operation produced. */
  targetPath: string | null
  openedIde: string | null
}

export type HookContext = {
  readonly operation: OperationName
  readonly parameters: HookParameters
  readonly results: HookResults
  readonly metadata: HookMetadata
  /** Set only when a post phase runs after the primary action failed. */
  error: Error | null
}

type HookIdentity = {
  readonly name: string
  readonly priority: number
}

export type PreHook = HookIdentity & {
  preExecute: (ctx: HookContext) => Promise<void>
}

export type PostHook = HookIdentity & {
  postExecute: (ctx: HookContext) => Promise<void>
}

export type ErrorHook = HookIdentity & {
  onError: (ctx: HookContext) => Promise<void>
}

export type PreWorktreeCreationHook = HookIdentity & {
  beforeWorktreeCreation: (ctx: HookContext) => Promise<void>
}

export type PostWorktreeCheckoutHook = HookIdentity & {
  afterWorktreeCheckout: (ctx: HookContext) => Promise<void>
}

export type HookPhase = "pre" | "post" | "error" | "preWorktreeCreation" | "postWorktreeCheckout"

const PHASE_LABELS: Readonly<Record<HookPhase, string>> = {
  pre: "pre-hook",
  post: "post-hook",
  error: "error-hook",
  preWorktreeCreation: "pre-worktree creation hook",
  postWorktreeCheckout: "post-worktree checkout hook",
}

export type RegisteredHookSummary = {
  readonly phase: HookPhase
  readonly name: string
  readonly priority: number
}

export type HookManager = {
  registerPreHook: (operation: OperationName, hook: PreHook) => void
  registerPostHook: (operation: OperationName, hook: PostHook) => void
  registerErrorHook: (operation: OperationName, hook: ErrorHook) => void
  registerPreWorktreeCreationHook: (operation: OperationName, hook: PreWorktreeCreationHook) => void
  registerPostWorktreeCheckoutHook: (operation: OperationName, hook: PostWorktreeCheckoutHook) => void
  executePreHooks: (operation: OperationName, ctx: HookContext) => Promise<void>
  executePostHooks: (operation: OperationName, ctx: HookContext) => Promise<void>
  executeErrorHooks: (operation: OperationName, ctx: HookContext) => Promise<void>
  executePreWorktreeCreationHooks: (operation: OperationName, ctx: HookContext) => Promise<void>
  executePostWorktreeCheckoutHooks: (operation: OperationName, ctx: HookContext) => Promise<void>
  listHooks: (operation: OperationName) => ReadonlyArray<RegisteredHookSummary>
}

export const createHookContext = ({
  operation,
  parameters,
}: {
  readonly operation: OperationName
  readonly parameters: HookParameters
}): HookContext => {
  return {
    operation,
    parameters,
    results: { targetPath: null, openedIde: null },
    metadata: { detached: false },
    error: null,
  }
}

const validateHook = ({ phase, hook }: { readonly phase: HookPhase; readonly hook: HookIdentity }): void => {
  if (typeof hook.name !== "string" || hook.name.trim().length === 0) {
    throw createCliError("INVALID_ARGUMENT", {
      message: `Cannot register ${PHASE_LABELS[phase]} without a name`,
      details: { phase },
    })
  }
  if (Number.isInteger(hook.priority) !== true) {
    throw createCliError("INVALID_ARGUMENT", {
      message: `Hook priority must be an integer: ${hook.name}`,
      details: { phase, hook: hook.name, priority: hook.priority },
    })
  }
}

type PhaseRegistry<H extends HookIdentity> = {
  register: (operation: OperationName, hook: H) => void
  snapshot: (operation: OperationName) => readonly H[]
}

// Lists are replaced on register, never mutated, so an execution keeps iterating the list it
// started with even if a hook is registered mid-flight.
const createPhaseRegistry = <H extends HookIdentity>(phase: HookPhase): PhaseRegistry<H> => {
  const byOperation = new Map<OperationName, readonly H[]>()
  return {
    register: (operation, hook) => {
      validateHook({ phase, hook })
      const next = [...(byOperation.get(operation) ?? []), hook].sort((a, b) => a.priority - b.priority)
      byOperation.set(operation, next)
    },
    snapshot: (operation) => byOperation.get(operation) ?? [],
  }
}

export const createHookManager = ({ logger }: { readonly logger?: Logger } = {}): HookManager => {
  const pre = createPhaseRegistry<PreHook>("pre")
  const post = createPhaseRegistry<PostHook>("post")
  const onError = createPhaseRegistry<ErrorHook>("error")
  const preWorktreeCreation = createPhaseRegistry<PreWorktreeCreationHook>("preWorktreeCreation")
  const postWorktreeCheckout = createPhaseRegistry<PostWorktreeCheckoutHook>("postWorktreeCheckout")

  const runPhase = async <H extends HookIdentity>({
    phase,
    operation,
    registry,
    invoke,
  }: {
    readonly phase: HookPhase
    readonly operation: OperationName
    readonly registry: PhaseRegistry<H>
    readonly invoke: (hook: H) => Promise<void>
  }): Promise<void> => {
    for (const hook of registry.snapshot(operation)) {
      logger?.debug(`${PHASE_LABELS[phase]} ${hook.name} (priority=${String(hook.priority)}) for ${operation}`)
      try {
        await invoke(hook)
      } catch (error) {
        throw createCliError("HOOK_FAILED", {
          message: `${PHASE_LABELS[phase]} ${hook.name} failed: ${toErrorMessage(error)}`,
          details: {
            hook: hook.name,
            phase,
            operation,
            priority: hook.priority,
            causeCode: error instanceof CliError ? error.code : null,
          },
          cause: error,
        })
      }
    }
  }

  return {
    registerPreHook: (operation, hook) => pre.register(operation, hook),
    registerPostHook: (operation, hook) => post.register(operation, hook),
    registerErrorHook: (operation, hook) => onError.register(operation, hook),
    registerPreWorktreeCreationHook: (operation, hook) => preWorktreeCreation.register(operation, hook),
    registerPostWorktreeCheckoutHook: (operation, hook) => postWorktreeCheckout.register(operation, hook),
    executePreHooks: async (operation, ctx) => {
      await runPhase({ phase: "pre", operation, registry: pre, invoke: (hook) => hook.preExecute(ctx) })
    },
    executePostHooks: async (operation, ctx) => {
      await runPhase({ phase: "post", operation, registry: post, invoke: (hook) => hook.postExecute(ctx) })
    },
    executeErrorHooks: async (operation, ctx) => {
      await runPhase({ phase: "error", operation, registry: onError, invoke: (hook) => hook.onError(ctx) })
    },
    executePreWorktreeCreationHooks: async (operation, ctx) => {
      await runPhase({
        phase: "preWorktreeCreation",
        operation,
        registry: preWorktreeCreation,
        invoke: (hook) => hook.beforeWorktreeCreation(ctx),
      })
    },
    executePostWorktreeCheckoutHooks: async (operation, ctx) => {
      await runPhase({
        phase: "postWorktreeCheckout",
        operation,
        registry: postWorktreeCheckout,
        invoke: (hook) => hook.afterWorktreeCheckout(ctx),
      })
    },
    listHooks: (operation) => {
      const summarize = (phase: HookPhase, hooks: readonly HookIdentity[]): RegisteredHookSummary[] => {
        return hooks.map((hook) => ({ phase, name: hook.name, priority: hook.priority }))
      }
      return [
        ...summarize("preWorktreeCreation", preWorktreeCreation.snapshot(operation)),
        ...summarize("pre", pre.snapshot(operation)),
        ...summarize("postWorktreeCheckout", postWorktreeCheckout.snapshot(operation)),
        ...summarize("post", post.snapshot(operation)),
        ...summarize("error", onError.snapshot(operation)),
      ]
    },
  }
}
