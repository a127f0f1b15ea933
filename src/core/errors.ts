import { EXIT_CODE } from "./constants"

export type ErrorKind =
  | "Validation"
  | "NotFound"
  | "AlreadyExists"
  | "Safety"
  | "IOError"
  | "ExternalToolError"
  | "HookError"
  | "Internal"

type ErrorDefinition = {
  readonly exitCode: number
  readonly kind: ErrorKind
}

const ERROR_DEFINITIONS = {
  INVALID_ARGUMENT: { exitCode: EXIT_CODE.INVALID_ARGUMENT, kind: "Validation" },
  INVALID_CONFIG: { exitCode: EXIT_CODE.INVALID_ARGUMENT, kind: "Validation" },
  INVALID_BRANCH_NAME: { exitCode: EXIT_CODE.INVALID_ARGUMENT, kind: "Validation" },
  INVALID_WORKSPACE_FILE: { exitCode: EXIT_CODE.INVALID_ARGUMENT, kind: "Validation" },
  UNSUPPORTED_IDE: { exitCode: EXIT_CODE.INVALID_ARGUMENT, kind: "Validation" },
  UNKNOWN_COMMAND: { exitCode: EXIT_CODE.INVALID_ARGUMENT, kind: "Validation" },
  NOT_GIT_REPOSITORY: { exitCode: EXIT_CODE.NOT_GIT_REPOSITORY, kind: "Validation" },
  NOT_INITIALIZED: { exitCode: EXIT_CODE.NOT_FOUND, kind: "NotFound" },
  REPOSITORY_NOT_FOUND: { exitCode: EXIT_CODE.NOT_FOUND, kind: "NotFound" },
  WORKTREE_NOT_FOUND: { exitCode: EXIT_CODE.NOT_FOUND, kind: "NotFound" },
  WORKSPACE_NOT_FOUND: { exitCode: EXIT_CODE.NOT_FOUND, kind: "NotFound" },
  REPOSITORY_EXISTS: { exitCode: EXIT_CODE.ALREADY_EXISTS, kind: "AlreadyExists" },
  WORKTREE_EXISTS: { exitCode: EXIT_CODE.ALREADY_EXISTS, kind: "AlreadyExists" },
  WORKSPACE_EXISTS: { exitCode: EXIT_CODE.ALREADY_EXISTS, kind: "AlreadyExists" },
  DIRECTORY_EXISTS: { exitCode: EXIT_CODE.ALREADY_EXISTS, kind: "AlreadyExists" },
  DIRTY_WORKTREE: { exitCode: EXIT_CODE.SAFETY_REJECTED, kind: "Safety" },
  DELETION_CANCELLED: { exitCode: EXIT_CODE.SAFETY_REJECTED, kind: "Safety" },
  LOCK_TIMEOUT: { exitCode: EXIT_CODE.LOCK_FAILED, kind: "IOError" },
  LOCK_STALE_RECOVERY_FAILED: { exitCode: EXIT_CODE.LOCK_FAILED, kind: "IOError" },
  STATUS_FILE_INVALID: { exitCode: EXIT_CODE.STATUS_FAILED, kind: "IOError" },
  STATUS_INCONSISTENT: { exitCode: EXIT_CODE.STATUS_FAILED, kind: "IOError" },
  IO_ERROR: { exitCode: EXIT_CODE.STATUS_FAILED, kind: "IOError" },
  GIT_COMMAND_FAILED: { exitCode: EXIT_CODE.GIT_COMMAND_FAILED, kind: "ExternalToolError" },
  DEPENDENCY_MISSING: { exitCode: EXIT_CODE.DEPENDENCY_MISSING, kind: "ExternalToolError" },
  IDE_NOT_INSTALLED: { exitCode: EXIT_CODE.DEPENDENCY_MISSING, kind: "ExternalToolError" },
  CHILD_PROCESS_FAILED: { exitCode: EXIT_CODE.CHILD_PROCESS_FAILED, kind: "ExternalToolError" },
  ISSUE_RESOLUTION_FAILED: { exitCode: EXIT_CODE.CHILD_PROCESS_FAILED, kind: "ExternalToolError" },
  WORKSPACE_PARTIAL_FAILURE: { exitCode: EXIT_CODE.PARTIAL_FAILURE, kind: "ExternalToolError" },
  HOOK_FAILED: { exitCode: EXIT_CODE.HOOK_FAILED, kind: "HookError" },
  HOOK_TIMEOUT: { exitCode: EXIT_CODE.HOOK_FAILED, kind: "HookError" },
  HOOK_NOT_EXECUTABLE: { exitCode: EXIT_CODE.HOOK_FAILED, kind: "HookError" },
  INTERNAL_ERROR: { exitCode: EXIT_CODE.INTERNAL_ERROR, kind: "Internal" },
} as const satisfies Record<string, ErrorDefinition>

export type ErrorCode = keyof typeof ERROR_DEFINITIONS

type CliErrorOptions = {
  readonly message: string
  readonly details?: Record<string, unknown>
  readonly cause?: unknown
}

export class CliError extends Error {
  readonly code: ErrorCode
  readonly exitCode: number
  readonly kind: ErrorKind
  readonly details: Record<string, unknown>

  constructor(code: ErrorCode, { message, details, cause }: CliErrorOptions) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = "CliError"
    this.code = code
    this.exitCode = ERROR_DEFINITIONS[code].exitCode
    this.kind = ERROR_DEFINITIONS[code].kind
    this.details = details ?? {}
  }
}

export const createCliError = (code: ErrorCode, options: CliErrorOptions): CliError => {
  return new CliError(code, options)
}

export const ensureCliError = (error: unknown): CliError => {
  if (error instanceof CliError) {
    return error
  }
  if (error instanceof Error) {
    return createCliError("INTERNAL_ERROR", {
      message: error.message,
      cause: error,
    })
  }
  return createCliError("INTERNAL_ERROR", {
    message: "An unexpected error occurred",
    details: { value: String(error) },
    cause: error,
  })
}

export const hasErrorCode = (error: unknown, code: ErrorCode): error is CliError => {
  return error instanceof CliError && error.code === code
}

export const toErrorMessage = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error)
}

/** Reads `code` from a Node.js system error (ENOENT, EEXIST, ...). */
export const readErrnoCode = (error: unknown): string | undefined => {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code
  }
  return undefined
}
