export const SCHEMA_VERSION = 1

export const EXIT_CODE = {
  OK: 0,
  NOT_GIT_REPOSITORY: 2,
  INVALID_ARGUMENT: 3,
  SAFETY_REJECTED: 4,
  DEPENDENCY_MISSING: 5,
  LOCK_FAILED: 6,
  NOT_FOUND: 7,
  ALREADY_EXISTS: 8,
  STATUS_FAILED: 9,
  HOOK_FAILED: 10,
  GIT_COMMAND_FAILED: 20,
  CHILD_PROCESS_FAILED: 21,
  PARTIAL_FAILURE: 22,
  INTERNAL_ERROR: 30,
} as const

export const DEFAULT_HOOK_TIMEOUT_MS = 30_000
export const DEFAULT_LOCK_TIMEOUT_MS = 15_000
export const DEFAULT_STALE_LOCK_TTL_SECONDS = 1_800
export const DEFAULT_REMOTE = "origin"
export const DEFAULT_BRANCH = "main"

export const WORKSPACE_FILE_EXTENSION = ".code-workspace"
export const GENERATED_WORKSPACES_DIRECTORY = "workspaces"
/** Below the generated workspaces directory; holds the files `workspace create` writes. */
export const WORKSPACE_DEFINITIONS_DIRECTORY = "definitions"

export const OPERATION_NAMES = {
  CREATE_WORKTREE: "CreateWorkTree",
  DELETE_WORKTREE: "DeleteWorkTree",
  DELETE_ALL_WORKTREES: "DeleteAllWorktrees",
  LOAD_WORKTREE: "LoadWorktree",
  OPEN_WORKTREE: "OpenWorktree",
  CREATE_WORKSPACE_WORKTREES: "CreateWorkspaceWorktrees",
  DELETE_WORKSPACE: "DeleteWorkspace",
  DELETE_REPOSITORY: "DeleteRepository",
  CLONE_REPOSITORY: "CloneRepository",
  CREATE_WORKSPACE: "CreateWorkspace",
  ADD_REPOSITORY_TO_WORKSPACE: "AddRepositoryToWorkspace",
  REMOVE_REPOSITORY_FROM_WORKSPACE: "RemoveRepositoryFromWorkspace",
  INIT: "Init",
} as const

export type OperationName = (typeof OPERATION_NAMES)[keyof typeof OPERATION_NAMES]

export const COMMAND_NAMES = {
  INIT: "init",
  CREATE: "create",
  LOAD: "load",
  OPEN: "open",
  DELETE: "delete",
  LIST: "list",
  REPOSITORY: "repository",
  WORKSPACE: "workspace",
} as const
