import { parse, stringify } from "yaml"
import { createCliError } from "./errors"

export type RemoteInfo = {
  readonly defaultBranch: string
}

export type WorktreeInfo = {
  readonly remote: string
  readonly branch: string
  readonly path: string
  readonly workspacePath?: string
  readonly detached?: boolean
}

export type RepositoryRecord = {
  readonly path: string
  readonly remotes: Readonly<Record<string, RemoteInfo>>
  readonly worktrees: Readonly<Record<string, WorktreeInfo>>
}

export type WorkspaceRecord = {
  readonly repositories: ReadonlyArray<string>
  readonly path: string
}

export type StatusDocument = {
  readonly repositories: Readonly<Record<string, RepositoryRecord>>
  readonly workspaces: Readonly<Record<string, WorkspaceRecord>>
}

export const EMPTY_STATUS_DOCUMENT: StatusDocument = {
  repositories: {},
  workspaces: {},
}

export const worktreeKey = (remote: string, branch: string): string => {
  return `${remote}:${branch}`
}

type DecodeContext = {
  readonly file: string
}

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return value !== null && typeof value === "object" && Array.isArray(value) !== true
}

const throwInvalidStatus = ({
  ctx,
  keyPath,
  reason,
}: {
  readonly ctx: DecodeContext
  readonly keyPath: readonly string[]
  readonly reason: string
}): never => {
  const joined = keyPath.length === 0 ? "<root>" : keyPath.join(".")
  throw createCliError("STATUS_FILE_INVALID", {
    message: `Invalid status file: ${ctx.file} (${joined}: ${reason})`,
    details: { file: ctx.file, keyPath: joined, reason },
  })
}

const expectRecord = (value: unknown, ctx: DecodeContext, keyPath: readonly string[]): Record<string, unknown> => {
  if (isRecord(value)) {
    return value
  }
  return throwInvalidStatus({ ctx, keyPath, reason: "must be a mapping" })
}

const optionalRecord = (value: unknown, ctx: DecodeContext, keyPath: readonly string[]): Record<string, unknown> => {
  return value === undefined || value === null ? {} : expectRecord(value, ctx, keyPath)
}

const expectString = (value: unknown, ctx: DecodeContext, keyPath: readonly string[]): string => {
  if (typeof value === "string" && value.length > 0) {
    return value
  }
  return throwInvalidStatus({ ctx, keyPath, reason: "must be a non-empty string" })
}

const decodeWorktree = (value: unknown, ctx: DecodeContext, keyPath: readonly string[]): WorktreeInfo => {
  const raw = expectRecord(value, ctx, keyPath)
  const remote = expectString(raw.remote, ctx, [...keyPath, "remote"])
  const branch = expectString(raw.branch, ctx, [...keyPath, "branch"])
  const key = keyPath[keyPath.length - 1]
  if (key !== worktreeKey(remote, branch)) {
    throwInvalidStatus({ ctx, keyPath, reason: `key must be "${worktreeKey(remote, branch)}"` })
  }
  const worktree: WorktreeInfo = {
    remote,
    branch,
    path: expectString(raw.path, ctx, [...keyPath, "path"]),
  }
  const workspacePath =
    raw.workspace_path === undefined ? undefined : expectString(raw.workspace_path, ctx, [...keyPath, "workspace_path"])
  if (raw.detached !== undefined && typeof raw.detached !== "boolean") {
    throwInvalidStatus({ ctx, keyPath: [...keyPath, "detached"], reason: "must be boolean" })
  }
  return {
    ...worktree,
    ...(workspacePath === undefined ? {} : { workspacePath }),
    ...(raw.detached === true ? { detached: true } : {}),
  }
}

const decodeRepository = (value: unknown, ctx: DecodeContext, keyPath: readonly string[]): RepositoryRecord => {
  const raw = expectRecord(value, ctx, keyPath)
  const remotes = Object.fromEntries(
    Object.entries(optionalRecord(raw.remotes, ctx, [...keyPath, "remotes"])).map(([name, remote]) => {
      const remoteKeyPath = [...keyPath, "remotes", name]
      const record = expectRecord(remote, ctx, remoteKeyPath)
      return [name, { defaultBranch: expectString(record.default_branch, ctx, [...remoteKeyPath, "default_branch"]) }]
    }),
  )
  const worktrees = Object.fromEntries(
    Object.entries(optionalRecord(raw.worktrees, ctx, [...keyPath, "worktrees"])).map(([key, worktree]) => {
      return [key, decodeWorktree(worktree, ctx, [...keyPath, "worktrees", key])]
    }),
  )
  return {
    path: expectString(raw.path, ctx, [...keyPath, "path"]),
    remotes,
    worktrees,
  }
}

const decodeWorkspace = (value: unknown, ctx: DecodeContext, keyPath: readonly string[]): WorkspaceRecord => {
  const raw = expectRecord(value, ctx, keyPath)
  const repositories = raw.repositories ?? []
  if (!Array.isArray(repositories)) {
    return throwInvalidStatus({ ctx, keyPath: [...keyPath, "repositories"], reason: "must be a list" })
  }
  return {
    repositories: repositories.map((repoUrl: unknown, index) =>
      expectString(repoUrl, ctx, [...keyPath, "repositories", String(index)]),
    ),
    path: expectString(raw.path, ctx, [...keyPath, "path"]),
  }
}

export const decodeStatusDocument = ({ content, file }: { readonly content: string; readonly file: string }): StatusDocument => {
  const ctx: DecodeContext = { file }
  let parsed: unknown
  try {
    parsed = parse(content)
  } catch (error) {
    throw createCliError("STATUS_FILE_INVALID", {
      message: `Failed to parse status file: ${file}`,
      details: { file },
      cause: error,
    })
  }
  if (parsed === null || parsed === undefined) {
    return EMPTY_STATUS_DOCUMENT
  }
  const root = expectRecord(parsed, ctx, [])
  const repositories = Object.fromEntries(
    Object.entries(optionalRecord(root.repositories, ctx, ["repositories"])).map(([repoUrl, repository]) => {
      return [repoUrl, decodeRepository(repository, ctx, ["repositories", repoUrl])]
    }),
  )
  const workspaces = Object.fromEntries(
    Object.entries(optionalRecord(root.workspaces, ctx, ["workspaces"])).map(([name, workspace]) => {
      return [name, decodeWorkspace(workspace, ctx, ["workspaces", name])]
    }),
  )
  return { repositories, workspaces }
}

const encodeWorktree = (worktree: WorktreeInfo): Record<string, unknown> => {
  return {
    remote: worktree.remote,
    branch: worktree.branch,
    path: worktree.path,
    ...(worktree.workspacePath === undefined ? {} : { workspace_path: worktree.workspacePath }),
    ...(worktree.detached === true ? { detached: true } : {}),
  }
}

export const encodeStatusDocument = (document: StatusDocument): string => {
  const repositories = Object.fromEntries(
    Object.entries(document.repositories).map(([repoUrl, repository]) => [
      repoUrl,
      {
        path: repository.path,
        remotes: Object.fromEntries(
          Object.entries(repository.remotes).map(([name, remote]) => [name, { default_branch: remote.defaultBranch }]),
        ),
        worktrees: Object.fromEntries(
          Object.entries(repository.worktrees).map(([key, worktree]) => [key, encodeWorktree(worktree)]),
        ),
      },
    ]),
  )
  const workspaces = Object.fromEntries(
    Object.entries(document.workspaces).map(([name, workspace]) => [
      name,
      { repositories: [...workspace.repositories], path: workspace.path },
    ]),
  )
  return stringify({ repositories, workspaces })
}
