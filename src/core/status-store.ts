import { constants as fsConstants } from "node:fs"
import { access, mkdir } from "node:fs/promises"
import { dirname, join } from "node:path"
import type { Logger } from "../utils/logger"
import { readTextFileIfExists, writeFileAtomically } from "./atomic-file"
import { DEFAULT_LOCK_TIMEOUT_MS, DEFAULT_STALE_LOCK_TTL_SECONDS } from "./constants"
import { CliError, createCliError } from "./errors"
import { withFileLock } from "./file-lock"
import {
  decodeStatusDocument,
  EMPTY_STATUS_DOCUMENT,
  encodeStatusDocument,
  worktreeKey,
  type RemoteInfo,
  type RepositoryRecord,
  type StatusDocument,
  type WorkspaceRecord,
  type WorktreeInfo,
} from "./status-codec"

export type WorktreeEntry = {
  readonly repoUrl: string
  readonly key: string
  readonly worktree: WorktreeInfo
}

export type RepositoryEntry = {
  readonly repoUrl: string
  readonly repository: RepositoryRecord
}

export type WorkspaceEntry = {
  readonly name: string
  readonly workspace: WorkspaceRecord
}

export type WorktreeLookup = {
  readonly repoUrl: string
  readonly branch: string
  /** Narrows the lookup to one `<remote>:<branch>` key; otherwise the first entry on the branch wins. */
  readonly remote?: string
}

export type StatusStore = {
  readonly statusFile: string
  isInitialized: () => Promise<boolean>
  initialize: () => Promise<{ readonly alreadyInitialized: boolean }>
  readStatusStrict: () => Promise<StatusDocument>
  addRepository: (input: {
    readonly repoUrl: string
    readonly path: string
    readonly remotes: Readonly<Record<string, RemoteInfo>>
  }) => Promise<RepositoryRecord>
  removeRepository: (repoUrl: string) => Promise<RepositoryRecord>
  getRepository: (repoUrl: string) => Promise<RepositoryRecord>
  listRepositories: () => Promise<ReadonlyArray<RepositoryEntry>>
  addWorktree: (input: { readonly repoUrl: string; readonly worktree: WorktreeInfo }) => Promise<WorktreeInfo>
  removeWorktree: (lookup: WorktreeLookup) => Promise<WorktreeInfo>
  /** The update may change anything but the remote and branch the entry is keyed by. */
  updateWorktree: (lookup: WorktreeLookup, update: (current: WorktreeInfo) => WorktreeInfo) => Promise<WorktreeInfo>
  getWorktree: (lookup: WorktreeLookup) => Promise<WorktreeInfo>
  listAllWorktrees: () => Promise<ReadonlyArray<WorktreeEntry>>
  addWorkspace: (input: { readonly name: string; readonly workspace: WorkspaceRecord }) => Promise<WorkspaceRecord>
  updateWorkspace: (name: string, update: (current: WorkspaceRecord) => WorkspaceRecord) => Promise<WorkspaceRecord>
  removeWorkspace: (name: string) => Promise<WorkspaceRecord>
  getWorkspace: (name: string) => Promise<WorkspaceRecord>
  listWorkspaces: () => Promise<ReadonlyArray<WorkspaceEntry>>
}

type CreateStatusStoreOptions = {
  readonly statusFile: string
  readonly lockTimeoutMs?: number
  readonly staleLockTTLSeconds?: number
  readonly logger?: Logger
}

type Mutation<T> = (document: StatusDocument) => {
  readonly document: StatusDocument
  readonly result: T
}

const pathExists = async (path: string): Promise<boolean> => {
  try {
    await access(path, fsConstants.F_OK)
    return true
  } catch {
    return false
  }
}

const notInitializedError = (statusFile: string): CliError => {
  return createCliError("NOT_INITIALIZED", {
    message: "Status file not found. Run `arbor init` first.",
    details: { statusFile },
  })
}

const requireRepository = (document: StatusDocument, repoUrl: string): RepositoryRecord => {
  const repository = document.repositories[repoUrl]
  if (repository === undefined) {
    throw createCliError("REPOSITORY_NOT_FOUND", {
      message: `Repository not found: ${repoUrl}`,
      details: { repoUrl },
    })
  }
  return repository
}

const requireWorkspace = (document: StatusDocument, name: string): WorkspaceRecord => {
  const workspace = document.workspaces[name]
  if (workspace === undefined) {
    throw createCliError("WORKSPACE_NOT_FOUND", {
      message: `Workspace not found: ${name}`,
      details: { name },
    })
  }
  return workspace
}

const requireMembers = (document: StatusDocument, name: string, workspace: WorkspaceRecord): WorkspaceRecord => {
  const missing = workspace.repositories.filter((repoUrl) => document.repositories[repoUrl] === undefined)
  if (missing.length > 0) {
    throw createCliError("REPOSITORY_NOT_FOUND", {
      message: `Workspace ${name} references unregistered repositories: ${missing.join(", ")}`,
      details: { name, missing },
    })
  }
  return workspace
}

// Workspaces never list a repository that is gone.
const withoutMember = (
  workspaces: Readonly<Record<string, WorkspaceRecord>>,
  repoUrl: string,
): Record<string, WorkspaceRecord> => {
  return Object.fromEntries(
    Object.entries(workspaces).map(([name, workspace]) => [
      name,
      { ...workspace, repositories: workspace.repositories.filter((member) => member !== repoUrl) },
    ]),
  )
}

const findWorktreeKey = (repository: RepositoryRecord, lookup: WorktreeLookup): string => {
  if (lookup.remote !== undefined) {
    const key = worktreeKey(lookup.remote, lookup.branch)
    if (repository.worktrees[key] !== undefined) {
      return key
    }
  } else {
    const match = Object.entries(repository.worktrees).find(([, worktree]) => worktree.branch === lookup.branch)
    if (match !== undefined) {
      return match[0]
    }
  }
  throw createCliError("WORKTREE_NOT_FOUND", {
    message: `Worktree not found: ${lookup.repoUrl} ${lookup.branch}`,
    details: { repoUrl: lookup.repoUrl, branch: lookup.branch, remote: lookup.remote ?? null },
  })
}

const withoutKey = <T>(record: Readonly<Record<string, T>>, key: string): Record<string, T> => {
  return Object.fromEntries(Object.entries(record).filter(([candidate]) => candidate !== key))
}

export const createStatusStore = ({
  statusFile,
  lockTimeoutMs = DEFAULT_LOCK_TIMEOUT_MS,
  staleLockTTLSeconds = DEFAULT_STALE_LOCK_TTL_SECONDS,
  logger,
}: CreateStatusStoreOptions): StatusStore => {
  const readDocument = async (): Promise<StatusDocument | null> => {
    const content = await readTextFileIfExists(statusFile)
    if (content === null) {
      return null
    }
    return decodeStatusDocument({ content, file: statusFile })
  }

  const readDocumentOrEmpty = async (): Promise<StatusDocument> => {
    return (await readDocument()) ?? EMPTY_STATUS_DOCUMENT
  }

  const writeDocument = async (document: StatusDocument): Promise<void> => {
    try {
      await writeFileAtomically({ filePath: statusFile, content: encodeStatusDocument(document) })
    } catch (error) {
      throw createCliError("IO_ERROR", {
        message: `Failed to write status file: ${statusFile}`,
        details: { statusFile },
        cause: error,
      })
    }
  }

  const mutate = async <T>(operation: string, mutation: Mutation<T>): Promise<T> => {
    if ((await pathExists(statusFile)) !== true) {
      throw notInitializedError(statusFile)
    }
    return withFileLock({ targetPath: statusFile, operation, timeoutMs: lockTimeoutMs, staleLockTTLSeconds }, async () => {
      const current = await readDocument()
      if (current === null) {
        throw notInitializedError(statusFile)
      }
      const { document, result } = mutation(current)
      await writeDocument(document)
      logger?.debug(`status ${operation} committed`)
      return result
    })
  }

  return {
    statusFile,
    isInitialized: async () => pathExists(statusFile),
    initialize: async () => {
      await mkdir(dirname(statusFile), { recursive: true })
      return withFileLock(
        { targetPath: statusFile, operation: "initialize", timeoutMs: lockTimeoutMs, staleLockTTLSeconds },
        async () => {
          if ((await readDocument()) !== null) {
            return { alreadyInitialized: true }
          }
          await writeDocument(EMPTY_STATUS_DOCUMENT)
          return { alreadyInitialized: false }
        },
      )
    },
    readStatusStrict: async () => {
      const document = await readDocument()
      if (document === null) {
        throw notInitializedError(statusFile)
      }
      return document
    },
    addRepository: async ({ repoUrl, path, remotes }) => {
      if ((await pathExists(join(path, ".git"))) !== true) {
        throw createCliError("NOT_GIT_REPOSITORY", {
          message: `Not a git repository: ${path}`,
          details: { repoUrl, path },
        })
      }
      return mutate("addRepository", (document) => {
        if (document.repositories[repoUrl] !== undefined) {
          throw createCliError("REPOSITORY_EXISTS", {
            message: `Repository already exists: ${repoUrl}`,
            details: { repoUrl },
          })
        }
        const repository: RepositoryRecord = { path, remotes, worktrees: {} }
        return {
          document: { ...document, repositories: { ...document.repositories, [repoUrl]: repository } },
          result: repository,
        }
      })
    },
    removeRepository: async (repoUrl) => {
      return mutate("removeRepository", (document) => {
        const repository = requireRepository(document, repoUrl)
        return {
          document: {
            repositories: withoutKey(document.repositories, repoUrl),
            workspaces: withoutMember(document.workspaces, repoUrl),
          },
          result: repository,
        }
      })
    },
    getRepository: async (repoUrl) => {
      return requireRepository(await readDocumentOrEmpty(), repoUrl)
    },
    listRepositories: async () => {
      const document = await readDocumentOrEmpty()
      return Object.entries(document.repositories).map(([repoUrl, repository]) => ({ repoUrl, repository }))
    },
    addWorktree: async ({ repoUrl, worktree }) => {
      return mutate("addWorktree", (document) => {
        const repository = requireRepository(document, repoUrl)
        const key = worktreeKey(worktree.remote, worktree.branch)
        if (repository.worktrees[key] !== undefined) {
          throw createCliError("WORKTREE_EXISTS", {
            message: `Worktree already exists: ${repoUrl} ${key}`,
            details: { repoUrl, key, path: repository.worktrees[key]?.path ?? null },
          })
        }
        const nextRepository: RepositoryRecord = {
          ...repository,
          worktrees: { ...repository.worktrees, [key]: worktree },
        }
        return {
          document: { ...document, repositories: { ...document.repositories, [repoUrl]: nextRepository } },
          result: worktree,
        }
      })
    },
    removeWorktree: async (lookup) => {
      return mutate("removeWorktree", (document) => {
        const repository = requireRepository(document, lookup.repoUrl)
        const key = findWorktreeKey(repository, lookup)
        const removed = repository.worktrees[key]
        if (removed === undefined) {
          throw createCliError("WORKTREE_NOT_FOUND", {
            message: `Worktree not found: ${lookup.repoUrl} ${key}`,
            details: { repoUrl: lookup.repoUrl, key },
          })
        }
        const nextRepository: RepositoryRecord = { ...repository, worktrees: withoutKey(repository.worktrees, key) }
        return {
          document: { ...document, repositories: { ...document.repositories, [lookup.repoUrl]: nextRepository } },
          result: removed,
        }
      })
    },
    updateWorktree: async (lookup, update) => {
      return mutate("updateWorktree", (document) => {
        const repository = requireRepository(document, lookup.repoUrl)
        const key = findWorktreeKey(repository, lookup)
        const current = repository.worktrees[key]
        if (current === undefined) {
          throw createCliError("WORKTREE_NOT_FOUND", {
            message: `Worktree not found: ${lookup.repoUrl} ${key}`,
            details: { repoUrl: lookup.repoUrl, key },
          })
        }
        const next = update(current)
        if (worktreeKey(next.remote, next.branch) !== key) {
          throw createCliError("INVALID_ARGUMENT", {
            message: `Worktree ${lookup.repoUrl} ${key} cannot be re-keyed to ${worktreeKey(next.remote, next.branch)}`,
            details: { repoUrl: lookup.repoUrl, key },
          })
        }
        const nextRepository: RepositoryRecord = { ...repository, worktrees: { ...repository.worktrees, [key]: next } }
        return {
          document: { ...document, repositories: { ...document.repositories, [lookup.repoUrl]: nextRepository } },
          result: next,
        }
      })
    },
    getWorktree: async (lookup) => {
      const repository = requireRepository(await readDocumentOrEmpty(), lookup.repoUrl)
      const worktree = repository.worktrees[findWorktreeKey(repository, lookup)]
      if (worktree === undefined) {
        throw createCliError("WORKTREE_NOT_FOUND", {
          message: `Worktree not found: ${lookup.repoUrl} ${lookup.branch}`,
          details: { repoUrl: lookup.repoUrl, branch: lookup.branch },
        })
      }
      return worktree
    },
    listAllWorktrees: async () => {
      const document = await readDocumentOrEmpty()
      return Object.entries(document.repositories).flatMap(([repoUrl, repository]) =>
        Object.entries(repository.worktrees).map(([key, worktree]) => ({ repoUrl, key, worktree })),
      )
    },
    addWorkspace: async ({ name, workspace }) => {
      return mutate("addWorkspace", (document) => {
        if (document.workspaces[name] !== undefined) {
          throw createCliError("WORKSPACE_EXISTS", {
            message: `Workspace already exists: ${name}`,
            details: { name },
          })
        }
        requireMembers(document, name, workspace)
        return {
          document: { ...document, workspaces: { ...document.workspaces, [name]: workspace } },
          result: workspace,
        }
      })
    },
    updateWorkspace: async (name, update) => {
      return mutate("updateWorkspace", (document) => {
        const next = requireMembers(document, name, update(requireWorkspace(document, name)))
        return {
          document: { ...document, workspaces: { ...document.workspaces, [name]: next } },
          result: next,
        }
      })
    },
    removeWorkspace: async (name) => {
      return mutate("removeWorkspace", (document) => {
        const workspace = requireWorkspace(document, name)
        return {
          document: { ...document, workspaces: withoutKey(document.workspaces, name) },
          result: workspace,
        }
      })
    },
    getWorkspace: async (name) => {
      return requireWorkspace(await readDocumentOrEmpty(), name)
    },
    listWorkspaces: async () => {
      const document = await readDocumentOrEmpty()
      return Object.entries(document.workspaces).map(([name, workspace]) => ({ name, workspace }))
    },
  }
}
