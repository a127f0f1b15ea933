import { basename, dirname, join, resolve } from "node:path"
import { assertValidBranchName, sanitizeBranchForFileName } from "../git/branch-name"
import type { GitClient } from "../git/client"
import type { FileSystem } from "../utils/fs"
import type { Logger } from "../utils/logger"
import {
  DEFAULT_REMOTE,
  GENERATED_WORKSPACES_DIRECTORY,
  OPERATION_NAMES,
  WORKSPACE_DEFINITIONS_DIRECTORY,
  WORKSPACE_FILE_EXTENSION,
} from "./constants"
import { createCliError, hasErrorCode, toErrorMessage } from "./errors"
import { createHookContext, type HookManager } from "./hook-manager"
import { createOperationRunner, type OperationWarning } from "./operation-runner"
import type { RepositoryRecord, WorkspaceRecord, WorktreeInfo } from "./status-codec"
import type { StatusStore, WorkspaceEntry, WorktreeEntry } from "./status-store"
import type {
  ConfirmPrompt,
  CreateWorktreeResult,
  DeleteWorktreeResult,
  WorktreeOrchestrator,
} from "./worktree-orchestrator"

export type WorkspaceFolder = {
  readonly name: string
  /** Absolute repository path. */
  readonly path: string
}

export type WorkspaceDefinition = {
  readonly name: string
  readonly folders: readonly WorkspaceFolder[]
}

export type CreateWorkspaceWorktreesResult = {
  readonly state: "Done" | "DoneWithWarnings"
  readonly name: string
  readonly generatedFile: string
  readonly worktrees: readonly CreateWorktreeResult[]
  readonly warnings: readonly OperationWarning[]
  readonly openedIde: string | null
}

export type DeleteWorkspaceResult = {
  readonly name: string
  readonly deleted: readonly DeleteWorktreeResult[]
  readonly removedFiles: readonly string[]
  readonly warnings: readonly OperationWarning[]
}

export type CreateWorkspaceResult = {
  readonly name: string
  /** Definition file listing the member repositories. */
  readonly file: string
  readonly repositories: readonly string[]
  readonly warnings: readonly OperationWarning[]
}

export type AddWorkspaceRepositoryResult = {
  readonly name: string
  readonly repoUrl: string
  /** Worktrees created for the branches every earlier member already had. */
  readonly worktrees: readonly CreateWorktreeResult[]
  readonly warnings: readonly OperationWarning[]
}

export type RemoveWorkspaceRepositoryResult = {
  readonly name: string
  readonly repoUrl: string
  /** Worktrees that stay on disk but no longer belong to a generated workspace file. */
  readonly releasedWorktrees: readonly string[]
  readonly warnings: readonly OperationWarning[]
}

export type WorkspaceOrchestrator = {
  createWorkspace: (input: {
    readonly name: string
    readonly repositories: readonly string[]
  }) => Promise<CreateWorkspaceResult>
  addRepository: (input: { readonly name: string; readonly repository: string }) => Promise<AddWorkspaceRepositoryResult>
  removeRepository: (input: {
    readonly name: string
    readonly repository: string
  }) => Promise<RemoveWorkspaceRepositoryResult>
  createWorktreesForWorkspace: (input: {
    readonly workspaceFile: string
    readonly branch: string
    readonly force?: boolean
    readonly ide?: string | null
  }) => Promise<CreateWorkspaceWorktreesResult>
  deleteWorktreesForWorkspace: (input: {
    readonly name: string
    readonly branch: string
    readonly force?: boolean
  }) => Promise<DeleteWorkspaceResult>
  deleteWorkspace: (input: { readonly name: string; readonly force?: boolean }) => Promise<DeleteWorkspaceResult>
  listWorkspaces: () => Promise<ReadonlyArray<WorkspaceEntry>>
  generatedFilePath: (name: string, branch: string) => string
  definitionFilePath: (name: string) => string
}

export type WorkspaceOrchestratorOptions = {
  readonly store: StatusStore
  readonly hooks: HookManager
  readonly git: GitClient
  readonly fs: FileSystem
  readonly worktrees: WorktreeOrchestrator
  readonly basePath: string
  readonly defaultRemote?: string
  readonly confirm?: ConfirmPrompt
  readonly logger?: Logger
  /** Relative repository paths resolve against this directory. */
  readonly cwd?: string
}

type ResolvedMember = {
  readonly repoUrl: string
  readonly path: string
}

type FolderEdit = { readonly add: WorkspaceFolder } | { readonly removePath: string }

const INVALID_WORKSPACE_NAME_CHARACTERS = /[/\\:*?"<>|]/

const assertWorkspaceName = (name: string): void => {
  if (name.trim().length === 0 || INVALID_WORKSPACE_NAME_CHARACTERS.test(name)) {
    throw createCliError("INVALID_ARGUMENT", {
      message: `Invalid workspace name "${name}": must be non-empty without / \\ : * ? " < > |`,
      details: { name },
    })
  }
}

const withoutWorkspace = (worktree: WorktreeInfo): WorktreeInfo => {
  return {
    remote: worktree.remote,
    branch: worktree.branch,
    path: worktree.path,
    ...(worktree.detached === true ? { detached: true } : {}),
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

const invalidWorkspaceFile = (file: string, reason: string): Error => {
  return createCliError("INVALID_WORKSPACE_FILE", {
    message: `Invalid workspace file: ${file} (${reason})`,
    details: { file, reason },
  })
}

/** Parses a `.code-workspace` document; folder paths resolve against the file's directory. */
export const parseWorkspaceFile = ({
  content,
  file,
}: {
  readonly content: string
  readonly file: string
}): WorkspaceDefinition => {
  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch (error) {
    throw invalidWorkspaceFile(file, toErrorMessage(error))
  }
  if (!isRecord(parsed)) {
    throw invalidWorkspaceFile(file, "expected a JSON object")
  }

  const rawFolders = parsed.folders
  if (!Array.isArray(rawFolders)) {
    throw invalidWorkspaceFile(file, "folders must be an array")
  }
  const folders: WorkspaceFolder[] = []
  for (const [index, rawFolder] of rawFolders.entries()) {
    if (!isRecord(rawFolder) || typeof rawFolder.path !== "string") {
      throw invalidWorkspaceFile(file, `folders[${String(index)}].path must be a string`)
    }
    if (rawFolder.path.trim().length === 0) {
      continue
    }
    const path = resolve(dirname(file), rawFolder.path)
    const name = typeof rawFolder.name === "string" && rawFolder.name.length > 0 ? rawFolder.name : basename(path)
    folders.push({ name, path })
  }
  if (folders.length === 0) {
    throw invalidWorkspaceFile(file, "no folders")
  }

  const fileName = basename(file)
  const fallbackName = fileName.endsWith(WORKSPACE_FILE_EXTENSION)
    ? fileName.slice(0, -WORKSPACE_FILE_EXTENSION.length)
    : fileName
  const name = typeof parsed.name === "string" && parsed.name.trim().length > 0 ? parsed.name.trim() : fallbackName
  return { name, folders }
}

export const createWorkspaceOrchestrator = ({
  store,
  hooks,
  git,
  fs,
  worktrees,
  basePath,
  defaultRemote = DEFAULT_REMOTE,
  confirm = async () => false,
  logger,
  cwd = process.cwd(),
}: WorkspaceOrchestratorOptions): WorkspaceOrchestrator => {
  const runner = createOperationRunner({ hooks, logger })

  const generatedFilePath = (name: string, branch: string): string => {
    return join(
      basePath,
      GENERATED_WORKSPACES_DIRECTORY,
      `${name}-${sanitizeBranchForFileName(branch)}${WORKSPACE_FILE_EXTENSION}`,
    )
  }

  const definitionFilePath = (name: string): string => {
    return join(basePath, GENERATED_WORKSPACES_DIRECTORY, WORKSPACE_DEFINITIONS_DIRECTORY, `${name}${WORKSPACE_FILE_EXTENSION}`)
  }

  const findRepository = async (repoUrl: string): Promise<RepositoryRecord | null> => {
    try {
      return await store.getRepository(repoUrl)
    } catch (error) {
      if (hasErrorCode(error, "REPOSITORY_NOT_FOUND")) {
        return null
      }
      throw error
    }
  }

  // A registered id wins over a directory of the same name.
  const resolveMember = async (repository: string): Promise<ResolvedMember> => {
    const identifier = repository.trim()
    if (identifier.length === 0) {
      throw createCliError("INVALID_ARGUMENT", { message: "Repository must not be empty", details: { repository } })
    }
    const registered = await findRepository(identifier)
    if (registered !== null) {
      return { repoUrl: identifier, path: registered.path }
    }

    const candidate = resolve(cwd, identifier)
    if (!(await fs.exists(join(candidate, ".git")))) {
      throw createCliError("REPOSITORY_NOT_FOUND", {
        message: `Repository not found: ${repository} is neither registered nor a git repository`,
        details: { repository, path: candidate },
      })
    }
    const path = await git.getRepositoryRoot(candidate)
    const repoUrl = await git.getRepositoryName(path)
    const existing = await findRepository(repoUrl)
    if (existing !== null) {
      return { repoUrl, path: existing.path }
    }
    const defaultBranch = await git.getDefaultBranch(path, defaultRemote)
    try {
      await store.addRepository({ repoUrl, path, remotes: { [defaultRemote]: { defaultBranch } } })
      logger?.info(`Registered repository ${repoUrl} (${path})`)
    } catch (error) {
      if (!hasErrorCode(error, "REPOSITORY_EXISTS")) {
        throw error
      }
    }
    return { repoUrl, path }
  }

  const identifyMember = async (repository: string): Promise<string> => {
    if ((await findRepository(repository)) !== null) {
      return repository
    }
    return git.getRepositoryName(await git.getRepositoryRoot(resolve(cwd, repository)))
  }

  const folderOf = (member: ResolvedMember, path: string): WorkspaceFolder => {
    return { name: basename(member.repoUrl), path }
  }

  // Rewrites the folders of a workspace file and keeps every other key; false when the file is gone.
  const editWorkspaceFile = async (file: string, edit: FolderEdit): Promise<boolean> => {
    if (!(await fs.exists(file))) {
      logger?.debug(`workspace file ${file} is gone, skipping`)
      return false
    }
    let parsed: unknown
    try {
      parsed = JSON.parse(await fs.readFile(file))
    } catch (error) {
      throw invalidWorkspaceFile(file, toErrorMessage(error))
    }
    if (!isRecord(parsed) || !Array.isArray(parsed.folders)) {
      throw invalidWorkspaceFile(file, "folders must be an array")
    }
    const folders: unknown[] = parsed.folders
    const pointsAt = (folder: unknown, path: string): boolean => {
      return isRecord(folder) && typeof folder.path === "string" && resolve(dirname(file), folder.path) === path
    }
    const nextFolders =
      "add" in edit
        ? folders.some((folder) => pointsAt(folder, edit.add.path))
          ? folders
          : [...folders, { name: edit.add.name, path: edit.add.path }]
        : folders.filter((folder) => !pointsAt(folder, edit.removePath))
    await fs.writeFileAtomic(file, `${JSON.stringify({ ...parsed, folders: nextFolders }, null, 2)}\n`)
    return true
  }

  const generatedEntries = async (name: string, workspace: WorkspaceRecord): Promise<WorktreeEntry[]> => {
    return memberWorktrees(
      workspace,
      (entry) => entry.worktree.workspacePath === generatedFilePath(name, entry.worktree.branch),
    )
  }

  // Branches whose generated workspace has a worktree in every member.
  const sharedBranches = async (name: string, workspace: WorkspaceRecord): Promise<string[]> => {
    const membersByBranch = new Map<string, Set<string>>()
    for (const entry of await generatedEntries(name, workspace)) {
      const members = membersByBranch.get(entry.worktree.branch) ?? new Set<string>()
      members.add(entry.repoUrl)
      membersByBranch.set(entry.worktree.branch, members)
    }
    return [...membersByBranch.entries()]
      .filter(([, members]) => workspace.repositories.every((repoUrl) => members.has(repoUrl)))
      .map(([branch]) => branch)
  }

  const loadDefinition = async (file: string): Promise<WorkspaceDefinition> => {
    if (!(await fs.exists(file))) {
      throw createCliError("INVALID_WORKSPACE_FILE", {
        message: `Workspace file not found: ${file}`,
        details: { file },
      })
    }
    return parseWorkspaceFile({ content: await fs.readFile(file), file })
  }

  // Adds a member once its repository is registered, creating the entry on the first one.
  const recordMember = async ({
    name,
    file,
    repoUrl,
  }: {
    readonly name: string
    readonly file: string
    readonly repoUrl: string
  }): Promise<void> => {
    const include = (current: WorkspaceRecord): WorkspaceRecord => {
      return current.repositories.includes(repoUrl)
        ? current
        : { ...current, repositories: [...current.repositories, repoUrl] }
    }
    try {
      await store.updateWorkspace(name, include)
      return
    } catch (error) {
      if (!hasErrorCode(error, "WORKSPACE_NOT_FOUND")) {
        throw error
      }
    }
    try {
      await store.addWorkspace({ name, workspace: { repositories: [repoUrl], path: file } })
      logger?.info(`Registered workspace ${name}`)
    } catch (error) {
      if (!hasErrorCode(error, "WORKSPACE_EXISTS")) {
        throw error
      }
      await store.updateWorkspace(name, include)
    }
  }

  const removeGeneratedFile = async (file: string): Promise<void> => {
    try {
      await fs.removeAll(file)
    } catch (error) {
      logger?.warn(`Failed to remove ${file}: ${toErrorMessage(error)}`)
    }
  }

  const memberWorktrees = async (
    workspace: WorkspaceRecord,
    belongs: (entry: WorktreeEntry) => boolean,
  ): Promise<WorktreeEntry[]> => {
    const members = new Set(workspace.repositories)
    return (await store.listAllWorktrees()).filter((entry) => members.has(entry.repoUrl) && belongs(entry))
  }

  const deleteMembers = async ({
    entries,
    force,
  }: {
    readonly entries: readonly WorktreeEntry[]
    readonly force: boolean
  }): Promise<DeleteWorktreeResult[]> => {
    const deleted: DeleteWorktreeResult[] = []
    for (const entry of entries) {
      deleted.push(
        await worktrees.delete({
          repoUrl: entry.repoUrl,
          branch: entry.worktree.branch,
          remote: entry.worktree.remote,
          force,
          skipConfirmation: true,
        }),
      )
    }
    return deleted
  }

  return {
    generatedFilePath,
    definitionFilePath,
    createWorkspace: async ({ name, repositories }) => {
      assertWorkspaceName(name)
      const file = definitionFilePath(name)
      const ctx = createHookContext({
        operation: OPERATION_NAMES.CREATE_WORKSPACE,
        parameters: { kind: "workspace", workspaceName: name, workspaceFile: file, branch: null, ide: null, force: false },
      })

      return runner.run<CreateWorkspaceResult>(ctx, async () => {
        const document = await store.readStatusStrict()
        if (document.workspaces[name] !== undefined) {
          throw createCliError("WORKSPACE_EXISTS", { message: `Workspace already exists: ${name}`, details: { name } })
        }
        if (repositories.length === 0) {
          throw createCliError("INVALID_ARGUMENT", {
            message: `Workspace ${name} needs at least one repository`,
            details: { name },
          })
        }

        const members: ResolvedMember[] = []
        for (const repository of repositories) {
          const member = await resolveMember(repository)
          if (members.some((existing) => existing.repoUrl === member.repoUrl)) {
            throw createCliError("INVALID_ARGUMENT", {
              message: `Repository ${member.repoUrl} is listed more than once`,
              details: { name, repoUrl: member.repoUrl },
            })
          }
          members.push(member)
        }

        const definition = { name, folders: members.map((member) => folderOf(member, member.path)) }
        await fs.writeFileAtomic(file, `${JSON.stringify(definition, null, 2)}\n`)
        const ids = members.map((member) => member.repoUrl)
        try {
          await store.addWorkspace({ name, workspace: { repositories: ids, path: file } })
        } catch (error) {
          await removeGeneratedFile(file)
          throw error
        }
        logger?.info(`Created workspace ${name} with ${ids.join(", ")}`)

        ctx.results.targetPath = file
        const warnings: OperationWarning[] = []
        await runner.runTolerated({
          phase: "post",
          run: () => hooks.executePostHooks(OPERATION_NAMES.CREATE_WORKSPACE, ctx),
          warnings,
        })
        return { name, file, repositories: ids, warnings }
      })
    },
    addRepository: async ({ name, repository }) => {
      const workspace = await store.getWorkspace(name)
      const ctx = createHookContext({
        operation: OPERATION_NAMES.ADD_REPOSITORY_TO_WORKSPACE,
        parameters: {
          kind: "workspace",
          workspaceName: name,
          workspaceFile: workspace.path,
          branch: null,
          ide: null,
          force: false,
          repository,
        },
      })

      return runner.run<AddWorkspaceRepositoryResult>(ctx, async () => {
        const member = await resolveMember(repository)
        if (workspace.repositories.includes(member.repoUrl)) {
          throw createCliError("REPOSITORY_EXISTS", {
            message: `Repository ${member.repoUrl} is already in workspace ${name}`,
            details: { workspace: name, repoUrl: member.repoUrl },
          })
        }
        const branches = await sharedBranches(name, workspace)

        await editWorkspaceFile(workspace.path, { add: folderOf(member, member.path) })
        await store.updateWorkspace(name, (current) =>
          current.repositories.includes(member.repoUrl)
            ? current
            : { ...current, repositories: [...current.repositories, member.repoUrl] },
        )
        logger?.info(`Added ${member.repoUrl} to workspace ${name}`)

        const created: CreateWorktreeResult[] = []
        for (const branch of branches) {
          const generatedFile = generatedFilePath(name, branch)
          const result = await worktrees.create({
            repoUrl: member.repoUrl,
            branch,
            repoPath: member.path,
            remote: defaultRemote,
            ide: null,
            workspacePath: generatedFile,
          })
          await editWorkspaceFile(generatedFile, { add: folderOf(member, result.path) })
          created.push(result)
        }

        ctx.results.targetPath = workspace.path
        const warnings: OperationWarning[] = created.flatMap((result) => result.warnings)
        await runner.runTolerated({
          phase: "post",
          run: () => hooks.executePostHooks(OPERATION_NAMES.ADD_REPOSITORY_TO_WORKSPACE, ctx),
          warnings,
        })
        return { name, repoUrl: member.repoUrl, worktrees: created, warnings }
      })
    },
    removeRepository: async ({ name, repository }) => {
      const workspace = await store.getWorkspace(name)
      const ctx = createHookContext({
        operation: OPERATION_NAMES.REMOVE_REPOSITORY_FROM_WORKSPACE,
        parameters: {
          kind: "workspace",
          workspaceName: name,
          workspaceFile: workspace.path,
          branch: null,
          ide: null,
          force: false,
          repository,
        },
      })

      return runner.run<RemoveWorkspaceRepositoryResult>(ctx, async () => {
        const repoUrl = await identifyMember(repository)
        if (!workspace.repositories.includes(repoUrl)) {
          throw createCliError("REPOSITORY_NOT_FOUND", {
            message: `Repository ${repoUrl} is not in workspace ${name}`,
            details: { workspace: name, repoUrl },
          })
        }
        const registered = await store.getRepository(repoUrl)

        const released = await generatedEntries(name, { ...workspace, repositories: [repoUrl] })
        for (const entry of released) {
          await editWorkspaceFile(generatedFilePath(name, entry.worktree.branch), { removePath: entry.worktree.path })
          await store.updateWorktree(
            { repoUrl, branch: entry.worktree.branch, remote: entry.worktree.remote },
            withoutWorkspace,
          )
        }
        await editWorkspaceFile(workspace.path, { removePath: registered.path })
        await store.updateWorkspace(name, (current) => ({
          ...current,
          repositories: current.repositories.filter((member) => member !== repoUrl),
        }))
        logger?.info(`Removed ${repoUrl} from workspace ${name}`)

        ctx.results.targetPath = workspace.path
        const warnings: OperationWarning[] = []
        await runner.runTolerated({
          phase: "post",
          run: () => hooks.executePostHooks(OPERATION_NAMES.REMOVE_REPOSITORY_FROM_WORKSPACE, ctx),
          warnings,
        })
        return { name, repoUrl, releasedWorktrees: released.map((entry) => entry.worktree.path), warnings }
      })
    },
    createWorktreesForWorkspace: async ({ workspaceFile, branch, force = false, ide = null }) => {
      const file = resolve(workspaceFile)
      const definition = await loadDefinition(file)
      const ctx = createHookContext({
        operation: OPERATION_NAMES.CREATE_WORKSPACE_WORKTREES,
        parameters: { kind: "workspace", workspaceName: definition.name, workspaceFile: file, branch, ide, force },
      })

      return runner.run<CreateWorkspaceWorktreesResult>(ctx, async () => {
        assertValidBranchName(branch)
        const members: Array<WorkspaceFolder & { readonly repoUrl: string }> = []
        for (const folder of definition.folders) {
          members.push({ ...folder, repoUrl: await git.getRepositoryName(folder.path) })
        }
        const generatedFile = generatedFilePath(definition.name, branch)
        const project = {
          name: `${definition.name}-${sanitizeBranchForFileName(branch)}`,
          folders: members.map((member) => ({
            name: member.name,
            path: worktrees.buildPath(member.repoUrl, defaultRemote, branch),
          })),
        }
        await fs.writeFileAtomic(generatedFile, `${JSON.stringify(project, null, 2)}\n`)

        const created: CreateWorktreeResult[] = []
        for (const [index, member] of members.entries()) {
          try {
            const result = await worktrees.create({
              repoUrl: member.repoUrl,
              branch,
              repoPath: member.path,
              remote: defaultRemote,
              force,
              ide: null,
              workspacePath: generatedFile,
            })
            await recordMember({ name: definition.name, file, repoUrl: member.repoUrl })
            created.push(result)
          } catch (error) {
            await removeGeneratedFile(generatedFile)
            const completed = created.map((result) => result.repoUrl)
            throw createCliError("WORKSPACE_PARTIAL_FAILURE", {
              message: `Workspace ${definition.name}: ${member.repoUrl} failed after ${String(completed.length)} of ${String(members.length)} repositories: ${toErrorMessage(error)}`,
              details: {
                workspace: definition.name,
                branch,
                completed,
                failed: member.repoUrl,
                pending: members.slice(index + 1).map((pending) => pending.repoUrl),
              },
              cause: error,
            })
          }
        }

        ctx.results.targetPath = generatedFile
        const warnings: OperationWarning[] = created.flatMap((result) => result.warnings)
        await runner.runTolerated({
          phase: "post",
          run: () => hooks.executePostHooks(OPERATION_NAMES.CREATE_WORKSPACE_WORKTREES, ctx),
          warnings,
        })
        return {
          state: warnings.length === 0 ? "Done" : "DoneWithWarnings",
          name: definition.name,
          generatedFile,
          worktrees: created,
          warnings,
          openedIde: ctx.results.openedIde,
        }
      })
    },
    deleteWorktreesForWorkspace: async ({ name, branch, force = false }) => {
      const workspace = await store.getWorkspace(name)
      const ctx = createHookContext({
        operation: OPERATION_NAMES.DELETE_WORKSPACE,
        parameters: { kind: "workspace", workspaceName: name, workspaceFile: workspace.path, branch, ide: null, force },
      })

      return runner.run<DeleteWorkspaceResult>(ctx, async () => {
        const generatedFile = generatedFilePath(name, branch)
        const entries = await memberWorktrees(
          workspace,
          (entry) => entry.worktree.branch === branch && entry.worktree.workspacePath === generatedFile,
        )
        const fileExists = await fs.exists(generatedFile)
        if (entries.length === 0 && !fileExists) {
          throw createCliError("WORKTREE_NOT_FOUND", {
            message: `No worktrees of workspace ${name} on branch ${branch}`,
            details: { workspace: name, branch },
          })
        }
        if (!force) {
          const ok = await confirm(`Delete ${String(entries.length)} worktrees of workspace ${name} on ${branch}?`)
          if (!ok) {
            throw createCliError("DELETION_CANCELLED", { message: "Deletion cancelled", details: { workspace: name, branch } })
          }
        }

        const deleted = await deleteMembers({ entries, force })
        if (fileExists) {
          await fs.removeAll(generatedFile)
        }

        ctx.results.targetPath = generatedFile
        const warnings: OperationWarning[] = deleted.flatMap((result) => result.warnings)
        await runner.runTolerated({
          phase: "post",
          run: () => hooks.executePostHooks(OPERATION_NAMES.DELETE_WORKSPACE, ctx),
          warnings,
        })
        return { name, deleted, removedFiles: fileExists ? [generatedFile] : [], warnings }
      })
    },
    deleteWorkspace: async ({ name, force = false }) => {
      const workspace = await store.getWorkspace(name)
      const ctx = createHookContext({
        operation: OPERATION_NAMES.DELETE_WORKSPACE,
        parameters: {
          kind: "workspace",
          workspaceName: name,
          workspaceFile: workspace.path,
          branch: null,
          ide: null,
          force,
        },
      })

      return runner.run<DeleteWorkspaceResult>(ctx, async () => {
        const entries = await memberWorktrees(
          workspace,
          (entry) => entry.worktree.workspacePath === generatedFilePath(name, entry.worktree.branch),
        )
        if (!force) {
          const ok = await confirm(`Delete workspace ${name} and its ${String(entries.length)} worktrees?`)
          if (!ok) {
            throw createCliError("DELETION_CANCELLED", { message: "Deletion cancelled", details: { workspace: name } })
          }
        }

        const deleted = await deleteMembers({ entries, force })
        const removedFiles: string[] = []
        for (const file of new Set(entries.map((entry) => generatedFilePath(name, entry.worktree.branch)))) {
          if (await fs.exists(file)) {
            await fs.removeAll(file)
            removedFiles.push(file)
          }
        }
        await store.removeWorkspace(name)
        logger?.info(`Deleted workspace ${name}`)

        const warnings: OperationWarning[] = deleted.flatMap((result) => result.warnings)
        await runner.runTolerated({
          phase: "post",
          run: () => hooks.executePostHooks(OPERATION_NAMES.DELETE_WORKSPACE, ctx),
          warnings,
        })
        return { name, deleted, removedFiles, warnings }
      })
    },
    listWorkspaces: () => store.listWorkspaces(),
  }
}
