import { dirname, join } from "node:path"
import { assertValidBranchName } from "../git/branch-name"
import type { GitClient } from "../git/client"
import { repositoryNameFromUrl } from "../git/repository-name"
import type { FileSystem } from "../utils/fs"
import type { Logger } from "../utils/logger"
import { DEFAULT_BRANCH, DEFAULT_REMOTE, OPERATION_NAMES, type OperationName } from "./constants"
import { CliError, createCliError, ensureCliError, hasErrorCode, toErrorMessage } from "./errors"
import { createHookContext, type HookManager } from "./hook-manager"
import { createOperationRunner, type OperationWarning } from "./operation-runner"
import type { WorktreeInfo } from "./status-codec"
import type { StatusStore, WorktreeEntry } from "./status-store"

export type WorktreeOperationState =
  | "Requested"
  | "BranchResolved"
  | "PathComputed"
  | "GitWorktreeCreated"
  | "StatusRecorded"
  | "HooksRun"
  | "Done"
  | "DoneWithWarnings"
  | "RolledBack"

export type ConfirmPrompt = (message: string) => Promise<boolean>

export type CreateWorktreeInput = {
  readonly repoUrl: string
  readonly branch: string
  readonly repoPath: string
  readonly remote?: string
  readonly force?: boolean
  readonly ide?: string | null
  /** Generated workspace file the worktree belongs to. */
  readonly workspacePath?: string
}

export type CreateWorktreeResult = {
  readonly state: "Done" | "DoneWithWarnings"
  readonly repoUrl: string
  readonly path: string
  readonly worktree: WorktreeInfo
  readonly warnings: readonly OperationWarning[]
  readonly openedIde: string | null
}

export type DeleteWorktreeInput = {
  readonly repoUrl: string
  readonly branch: string
  readonly remote?: string
  readonly force?: boolean
  /** Set by bulk operations that already asked once. */
  readonly skipConfirmation?: boolean
}

export type DeleteWorktreeResult = {
  readonly repoUrl: string
  readonly worktree: WorktreeInfo
  readonly warnings: readonly OperationWarning[]
}

export type DeleteAllWorktreesResult = {
  readonly deleted: readonly DeleteWorktreeResult[]
  readonly warnings: readonly OperationWarning[]
}

export type LoadWorktreeInput = {
  readonly repoUrl: string
  readonly repoPath: string
  /** `<remote>:<branch>` or a bare branch on the default remote. */
  readonly remoteSource: string
  readonly force?: boolean
  readonly ide?: string | null
}

export type OpenWorktreeInput = {
  readonly repoUrl: string
  readonly branch: string
  readonly remote?: string
  readonly ide?: string | null
}

export type OpenWorktreeResult = {
  readonly repoUrl: string
  readonly worktree: WorktreeInfo
  readonly openedIde: string | null
}

export type DeleteRepositoryResult = {
  readonly repoUrl: string
  readonly removedWorktrees: readonly WorktreeInfo[]
  readonly warnings: readonly OperationWarning[]
}

export type CloneRepositoryInput = {
  readonly url: string
  /** Clones submodules too; on by default. */
  readonly recursive?: boolean
}

export type CloneRepositoryResult = {
  readonly repoUrl: string
  readonly path: string
  readonly defaultBranch: string
  readonly warnings: readonly OperationWarning[]
}

export type WorktreeOrchestrator = {
  clone: (input: CloneRepositoryInput) => Promise<CloneRepositoryResult>
  create: (input: CreateWorktreeInput) => Promise<CreateWorktreeResult>
  delete: (input: DeleteWorktreeInput) => Promise<DeleteWorktreeResult>
  deleteAll: (input: { readonly force?: boolean }) => Promise<DeleteAllWorktreesResult>
  deleteRepository: (input: { readonly repoUrl: string; readonly force?: boolean }) => Promise<DeleteRepositoryResult>
  list: (input?: { readonly repoUrl?: string }) => Promise<ReadonlyArray<WorktreeEntry>>
  load: (input: LoadWorktreeInput) => Promise<CreateWorktreeResult>
  open: (input: OpenWorktreeInput) => Promise<OpenWorktreeResult>
  buildPath: (repoUrl: string, remote: string, branch: string) => string
}

export type WorktreeOrchestratorOptions = {
  readonly store: StatusStore
  readonly hooks: HookManager
  readonly git: GitClient
  readonly fs: FileSystem
  readonly basePath: string
  readonly defaultRemote?: string
  readonly confirm?: ConfirmPrompt
  readonly logger?: Logger
}

type BranchResolver = (input: {
  readonly repoPath: string
  readonly remote: string
  readonly branch: string
}) => Promise<void>

export const parseRemoteSource = ({
  remoteSource,
  defaultRemote,
}: {
  readonly remoteSource: string
  readonly defaultRemote: string
}): { readonly remote: string; readonly branch: string } => {
  const trimmed = remoteSource.trim()
  const separator = trimmed.indexOf(":")
  const remote = separator > 0 ? trimmed.slice(0, separator) : defaultRemote
  const branch = separator > 0 ? trimmed.slice(separator + 1) : trimmed
  if (branch.length === 0) {
    throw createCliError("INVALID_ARGUMENT", {
      message: `Invalid remote branch "${remoteSource}": expected <remote>:<branch> or <branch>`,
      details: { remoteSource },
    })
  }
  return { remote, branch }
}

const withState = (error: unknown, state: WorktreeOperationState, path: string): CliError => {
  const cliError = ensureCliError(error)
  return createCliError(cliError.code, {
    message: cliError.message,
    details: { ...cliError.details, state, path },
    cause: error,
  })
}

export const createWorktreeOrchestrator = ({
  store,
  hooks,
  git,
  fs,
  basePath,
  defaultRemote = DEFAULT_REMOTE,
  confirm = async () => false,
  logger,
}: WorktreeOrchestratorOptions): WorktreeOrchestrator => {
  const buildPath = (repoUrl: string, remote: string, branch: string): string => {
    return join(basePath, repoUrl, remote, branch)
  }

  const runner = createOperationRunner({ hooks, logger })

  const cleanupStep = async (label: string, step: () => Promise<void>): Promise<void> => {
    try {
      await step()
    } catch (error) {
      logger?.warn(`rollback: ${label} failed: ${toErrorMessage(error)}`)
    }
  }

  const findWorktree = async (lookup: {
    readonly repoUrl: string
    readonly branch: string
    readonly remote?: string
  }): Promise<WorktreeInfo | null> => {
    try {
      return await store.getWorktree(lookup)
    } catch (error) {
      if (hasErrorCode(error, "WORKTREE_NOT_FOUND") || hasErrorCode(error, "REPOSITORY_NOT_FOUND")) {
        return null
      }
      throw error
    }
  }

  const registerRepository = async ({
    repoUrl,
    repoPath,
    remote,
  }: {
    readonly repoUrl: string
    readonly repoPath: string
    readonly remote: string
  }): Promise<void> => {
    const defaultBranch = await git.getDefaultBranch(repoPath, remote)
    try {
      await store.addRepository({ repoUrl, path: repoPath, remotes: { [remote]: { defaultBranch } } })
      logger?.info(`Registered repository ${repoUrl} (${repoPath})`)
    } catch (error) {
      // Another process registered it between our two attempts.
      if (!hasErrorCode(error, "REPOSITORY_EXISTS")) {
        throw error
      }
    }
  }

  const addToStatus = async ({
    repoUrl,
    repoPath,
    worktree,
  }: {
    readonly repoUrl: string
    readonly repoPath: string
    readonly worktree: WorktreeInfo
  }): Promise<WorktreeInfo> => {
    try {
      return await store.addWorktree({ repoUrl, worktree })
    } catch (error) {
      if (!hasErrorCode(error, "REPOSITORY_NOT_FOUND")) {
        throw error
      }
    }
    await registerRepository({ repoUrl, repoPath, remote: worktree.remote })
    return store.addWorktree({ repoUrl, worktree })
  }

  const rollbackWorktree = async ({
    repoPath,
    worktreePath,
    detached,
  }: {
    readonly repoPath: string
    readonly worktreePath: string
    readonly detached: boolean
  }): Promise<void> => {
    if (detached) {
      await cleanupStep(`remove ${worktreePath}`, () => fs.removeAll(worktreePath))
      return
    }
    await cleanupStep("git worktree remove", () => git.removeWorktree({ repoPath, worktreePath, force: true }))
    await cleanupStep(`remove ${worktreePath}`, () => fs.removeAll(worktreePath))
    await cleanupStep("git worktree prune", () => git.pruneWorktrees(repoPath))
  }

  const createFromCurrentBranch: BranchResolver = async ({ repoPath, branch }) => {
    if (await git.branchExists(repoPath, branch)) {
      return
    }
    await git.checkReferenceConflict(repoPath, branch)
    const current = await git.getCurrentBranch(repoPath)
    await git.createBranch(repoPath, branch, current ?? undefined)
    logger?.info(`Created branch ${branch} from ${current ?? "HEAD"}`)
  }

  const fetchTrackingBranch: BranchResolver = async ({ repoPath, remote, branch }) => {
    await git.fetchRemote(repoPath, remote, branch)
    if (!(await git.remoteBranchExists(repoPath, remote, branch))) {
      throw createCliError("INVALID_ARGUMENT", {
        message: `Remote branch not found: ${remote}/${branch}`,
        details: { repoPath, remote, branch },
      })
    }
    if (await git.branchExists(repoPath, branch)) {
      return
    }
    await git.createTrackingBranch({ repoPath, branch, remote, remoteBranch: branch })
  }

  const createWorktree = async ({
    operation,
    input,
    resolveBranch,
  }: {
    readonly operation: OperationName
    readonly input: CreateWorktreeInput
    readonly resolveBranch: BranchResolver
  }): Promise<CreateWorktreeResult> => {
    const { repoUrl, branch, repoPath } = input
    const remote = input.remote ?? defaultRemote
    const force = input.force === true
    const worktreePath = buildPath(repoUrl, remote, branch)
    const ctx = createHookContext({
      operation,
      parameters: {
        kind: "worktree",
        repoUrl,
        repoPath,
        remote,
        branch,
        worktreePath,
        ide: input.ide ?? null,
        force,
      },
    })

    let state: WorktreeOperationState = "Requested"
    const transition = (next: WorktreeOperationState): void => {
      state = next
      logger?.debug(`${operation} ${repoUrl} ${remote}:${branch} -> ${state}`)
    }

    return runner.run<CreateWorktreeResult>(ctx, async () => {
      if (repoUrl.trim().length === 0) {
        throw createCliError("INVALID_ARGUMENT", { message: "Repository id must not be empty", details: { repoPath } })
      }
      assertValidBranchName(branch)
      if (!(await fs.exists(join(repoPath, ".git")))) {
        throw createCliError("NOT_GIT_REPOSITORY", {
          message: `Not a git repository: ${repoPath}`,
          details: { path: repoPath },
        })
      }
      await store.readStatusStrict()

      await hooks.executePreWorktreeCreationHooks(operation, ctx)

      const existing = await findWorktree({ repoUrl, branch, remote })
      if (existing !== null) {
        throw createCliError("WORKTREE_EXISTS", {
          message: `Worktree already exists: ${repoUrl} ${remote}:${branch}`,
          details: { repoUrl, remote, branch, path: existing.path },
        })
      }
      await resolveBranch({ repoPath, remote, branch })
      transition("BranchResolved")

      if (await fs.exists(worktreePath)) {
        if (!force) {
          throw createCliError("DIRECTORY_EXISTS", {
            message: `Directory already exists: ${worktreePath}`,
            details: { path: worktreePath },
          })
        }
        logger?.warn(`Removing leftover directory ${worktreePath}`)
        await fs.removeAll(worktreePath)
        await git.pruneWorktrees(repoPath)
      }
      transition("PathComputed")

      const detached = ctx.metadata.detached
      await fs.mkdirAll(dirname(worktreePath))
      try {
        if (detached) {
          await git.clone({ source: repoPath, targetPath: worktreePath, branch })
        } else {
          await git.createWorktree({ repoPath, worktreePath, branch })
        }
      } catch (error) {
        await cleanupStep(`remove ${worktreePath}`, () => fs.removeAll(worktreePath))
        transition("RolledBack")
        throw withState(error, "RolledBack", worktreePath)
      }
      transition("GitWorktreeCreated")

      const worktree: WorktreeInfo = {
        remote,
        branch,
        path: worktreePath,
        ...(input.workspacePath === undefined ? {} : { workspacePath: input.workspacePath }),
        ...(detached ? { detached: true } : {}),
      }
      try {
        await addToStatus({ repoUrl, repoPath, worktree })
      } catch (error) {
        await rollbackWorktree({ repoPath, worktreePath, detached })
        transition("RolledBack")
        throw withState(error, "RolledBack", worktreePath)
      }
      transition("StatusRecorded")

      ctx.results.targetPath = worktreePath
      const warnings: OperationWarning[] = []
      await runner.runTolerated({
        phase: "postWorktreeCheckout",
        run: () => hooks.executePostWorktreeCheckoutHooks(operation, ctx),
        warnings,
      })
      await runner.runTolerated({ phase: "post", run: () => hooks.executePostHooks(operation, ctx), warnings })
      transition("HooksRun")

      transition(warnings.length === 0 ? "Done" : "DoneWithWarnings")
      return {
        state: warnings.length === 0 ? "Done" : "DoneWithWarnings",
        repoUrl,
        path: worktreePath,
        worktree,
        warnings,
        openedIde: ctx.results.openedIde,
      }
    })
  }

  // Clones land where a worktree of the default branch would, under the remote git names "origin".
  const cloneRepository = async ({ url, recursive = true }: CloneRepositoryInput): Promise<CloneRepositoryResult> => {
    const repoUrl = repositoryNameFromUrl(url)
    if (repoUrl === null) {
      throw createCliError("INVALID_ARGUMENT", {
        message: `Unsupported repository URL: ${url}`,
        details: { url },
      })
    }
    const ctx = createHookContext({
      operation: OPERATION_NAMES.CLONE_REPOSITORY,
      parameters: { kind: "repository", repoUrl, repoPath: null, force: false },
    })

    return runner.run<CloneRepositoryResult>(ctx, async () => {
      const document = await store.readStatusStrict()
      if (document.repositories[repoUrl] !== undefined) {
        throw createCliError("REPOSITORY_EXISTS", {
          message: `Repository already exists: ${repoUrl}`,
          details: { repoUrl },
        })
      }

      await fs.mkdirAll(basePath)
      const defaultBranch = (await git.getRemoteHeadBranch({ url, cwd: basePath })) ?? DEFAULT_BRANCH
      const targetPath = buildPath(repoUrl, DEFAULT_REMOTE, defaultBranch)
      if (await fs.exists(targetPath)) {
        throw createCliError("DIRECTORY_EXISTS", {
          message: `Directory already exists: ${targetPath}`,
          details: { path: targetPath },
        })
      }

      await fs.mkdirAll(dirname(targetPath))
      try {
        await git.clone({ source: url, targetPath, recursive })
        await store.addRepository({ repoUrl, path: targetPath, remotes: { [DEFAULT_REMOTE]: { defaultBranch } } })
      } catch (error) {
        await cleanupStep(`remove ${targetPath}`, () => fs.removeAll(targetPath))
        throw error
      }
      logger?.info(`Cloned ${url} into ${targetPath}`)

      ctx.results.targetPath = targetPath
      const warnings: OperationWarning[] = []
      await runner.runTolerated({
        phase: "post",
        run: () => hooks.executePostHooks(OPERATION_NAMES.CLONE_REPOSITORY, ctx),
        warnings,
      })
      return { repoUrl, path: targetPath, defaultBranch, warnings }
    })
  }

  const assertCleanWorktree = async (worktree: WorktreeInfo): Promise<void> => {
    if (!(await fs.exists(worktree.path))) {
      return
    }
    const status = await git.status(worktree.path)
    if (status.trim().length > 0) {
      throw createCliError("DIRTY_WORKTREE", {
        message: `Worktree has uncommitted changes: ${worktree.path}`,
        details: { path: worktree.path, status },
      })
    }
  }

  const confirmOrCancel = async (message: string, details: Record<string, unknown>): Promise<void> => {
    if (await confirm(message)) {
      return
    }
    throw createCliError("DELETION_CANCELLED", { message: "Deletion cancelled", details })
  }

  // Removes the checkout only; status bookkeeping is left to the caller.
  // A detached checkout is a standalone clone the repository knows nothing about.
  const removeCheckout = async ({
    repoPath,
    worktree,
    force,
  }: {
    readonly repoPath: string
    readonly worktree: WorktreeInfo
    readonly force: boolean
  }): Promise<void> => {
    if (worktree.detached === true) {
      if (await fs.exists(worktree.path)) {
        await fs.removeAll(worktree.path)
      } else {
        logger?.warn(`Worktree directory already missing: ${worktree.path}`)
      }
      return
    }
    if (await fs.exists(worktree.path)) {
      await git.removeWorktree({ repoPath, worktreePath: worktree.path, force })
      await fs.removeAll(worktree.path)
    } else {
      logger?.warn(`Worktree directory already missing: ${worktree.path}`)
      await git.pruneWorktrees(repoPath)
    }
  }

  const deleteWorktree = async (input: DeleteWorktreeInput): Promise<DeleteWorktreeResult> => {
    const { repoUrl, branch } = input
    const force = input.force === true
    const worktree = await store.getWorktree({
      repoUrl,
      branch,
      ...(input.remote === undefined ? {} : { remote: input.remote }),
    })
    const repository = await store.getRepository(repoUrl)
    const ctx = createHookContext({
      operation: OPERATION_NAMES.DELETE_WORKTREE,
      parameters: {
        kind: "worktree",
        repoUrl,
        repoPath: repository.path,
        remote: worktree.remote,
        branch: worktree.branch,
        worktreePath: worktree.path,
        ide: null,
        force,
      },
    })

    return runner.run<DeleteWorktreeResult>(ctx, async () => {
      if (!force && input.skipConfirmation !== true) {
        await confirmOrCancel(`Delete worktree ${worktree.path}?`, { repoUrl, branch, path: worktree.path })
      }
      if (!force) {
        await assertCleanWorktree(worktree)
      }
      await removeCheckout({ repoPath: repository.path, worktree, force })
      try {
        await store.removeWorktree({ repoUrl, branch: worktree.branch, remote: worktree.remote })
      } catch (error) {
        throw createCliError("STATUS_INCONSISTENT", {
          message: `Worktree ${worktree.path} was removed but the status entry could not be: ${toErrorMessage(error)}`,
          details: { repoUrl, remote: worktree.remote, branch: worktree.branch, path: worktree.path },
          cause: error,
        })
      }
      logger?.info(`Deleted worktree ${worktree.path}`)

      ctx.results.targetPath = worktree.path
      const warnings: OperationWarning[] = []
      await runner.runTolerated({
        phase: "post",
        run: () => hooks.executePostHooks(OPERATION_NAMES.DELETE_WORKTREE, ctx),
        warnings,
      })
      return { repoUrl, worktree, warnings }
    })
  }

  return {
    buildPath,
    clone: cloneRepository,
    create: (input) => createWorktree({ operation: OPERATION_NAMES.CREATE_WORKTREE, input, resolveBranch: createFromCurrentBranch }),
    load: async (input) => {
      const { remote, branch } = parseRemoteSource({ remoteSource: input.remoteSource, defaultRemote })
      return createWorktree({
        operation: OPERATION_NAMES.LOAD_WORKTREE,
        input: {
          repoUrl: input.repoUrl,
          repoPath: input.repoPath,
          remote,
          branch,
          force: input.force === true,
          ide: input.ide ?? null,
        },
        resolveBranch: fetchTrackingBranch,
      })
    },
    delete: deleteWorktree,
    deleteAll: async ({ force = false }) => {
      const ctx = createHookContext({
        operation: OPERATION_NAMES.DELETE_ALL_WORKTREES,
        parameters: { kind: "bulk", force },
      })
      return runner.run<DeleteAllWorktreesResult>(ctx, async () => {
        const entries = await store.listAllWorktrees()
        if (entries.length === 0) {
          return { deleted: [], warnings: [] }
        }
        if (!force) {
          await confirmOrCancel(`Delete all ${String(entries.length)} worktrees?`, { count: entries.length })
          for (const entry of entries) {
            await assertCleanWorktree(entry.worktree)
          }
        }

        const deleted: DeleteWorktreeResult[] = []
        for (const entry of entries) {
          deleted.push(
            await deleteWorktree({
              repoUrl: entry.repoUrl,
              branch: entry.worktree.branch,
              remote: entry.worktree.remote,
              force,
              skipConfirmation: true,
            }),
          )
        }

        const warnings: OperationWarning[] = deleted.flatMap((result) => result.warnings)
        await runner.runTolerated({
          phase: "post",
          run: () => hooks.executePostHooks(OPERATION_NAMES.DELETE_ALL_WORKTREES, ctx),
          warnings,
        })
        return { deleted, warnings }
      })
    },
    deleteRepository: async ({ repoUrl, force = false }) => {
      const repository = await store.getRepository(repoUrl)
      const ctx = createHookContext({
        operation: OPERATION_NAMES.DELETE_REPOSITORY,
        parameters: { kind: "repository", repoUrl, repoPath: repository.path, force },
      })
      return runner.run<DeleteRepositoryResult>(ctx, async () => {
        const worktrees = Object.values(repository.worktrees)
        if (!force) {
          await confirmOrCancel(
            `Delete repository ${repoUrl} and its ${String(worktrees.length)} worktrees?`,
            { repoUrl },
          )
          for (const worktree of worktrees) {
            await assertCleanWorktree(worktree)
          }
        }
        for (const worktree of worktrees) {
          await removeCheckout({ repoPath: repository.path, worktree, force })
        }
        try {
          await store.removeRepository(repoUrl)
        } catch (error) {
          throw createCliError("STATUS_INCONSISTENT", {
            message: `Worktrees of ${repoUrl} were removed but the repository entry could not be: ${toErrorMessage(error)}`,
            details: { repoUrl },
            cause: error,
          })
        }

        const warnings: OperationWarning[] = []
        await runner.runTolerated({
          phase: "post",
          run: () => hooks.executePostHooks(OPERATION_NAMES.DELETE_REPOSITORY, ctx),
          warnings,
        })
        return { repoUrl, removedWorktrees: worktrees, warnings }
      })
    },
    list: async ({ repoUrl } = {}) => {
      const entries = await store.listAllWorktrees()
      return repoUrl === undefined ? entries : entries.filter((entry) => entry.repoUrl === repoUrl)
    },
    open: async ({ repoUrl, branch, remote, ide = null }) => {
      const worktree = await store.getWorktree({ repoUrl, branch, ...(remote === undefined ? {} : { remote }) })
      const repository = await store.getRepository(repoUrl)
      const ctx = createHookContext({
        operation: OPERATION_NAMES.OPEN_WORKTREE,
        parameters: {
          kind: "worktree",
          repoUrl,
          repoPath: repository.path,
          remote: worktree.remote,
          branch: worktree.branch,
          worktreePath: worktree.path,
          ide,
          force: false,
        },
      })
      return runner.run<OpenWorktreeResult>(ctx, async () => {
        if (!(await fs.isDirectory(worktree.path))) {
          throw createCliError("WORKTREE_NOT_FOUND", {
            message: `Worktree directory is missing: ${worktree.path}`,
            details: { repoUrl, branch: worktree.branch, path: worktree.path },
          })
        }
        ctx.results.targetPath = worktree.path
        await hooks.executePostHooks(OPERATION_NAMES.OPEN_WORKTREE, ctx)
        return { repoUrl, worktree, openedIde: ctx.results.openedIde }
      })
    },
  }
}
