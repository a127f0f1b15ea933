import { describe, expect, it } from "vitest"
import { createCliError, ensureCliError, hasErrorCode, readErrnoCode, type ErrorCode } from "./errors"

describe("errors", () => {
  it("creates CliError with mapped exit code, kind and details", () => {
    const error = createCliError("HOOK_TIMEOUT", {
      message: "hook timeout",
      details: { hook: "post-create-worktree" },
    })

    expect(error.code).toBe("HOOK_TIMEOUT")
    expect(error.exitCode).toBe(10)
    expect(error.kind).toBe("HookError")
    expect(error.details).toEqual({ hook: "post-create-worktree" })
    expect(error.message).toBe("hook timeout")
  })

  it("returns the same object when ensureCliError receives CliError", () => {
    const original = createCliError("NOT_GIT_REPOSITORY", {
      message: "not git",
    })

    expect(ensureCliError(original)).toBe(original)
  })

  it("wraps regular Error as INTERNAL_ERROR", () => {
    const input = new Error("boom")
    const resolved = ensureCliError(input)

    expect(resolved.code).toBe("INTERNAL_ERROR")
    expect(resolved.exitCode).toBe(30)
    expect(resolved.message).toBe("boom")
    expect(resolved.cause).toBe(input)
  })

  it("wraps non-Error values as INTERNAL_ERROR with stringified detail", () => {
    const resolved = ensureCliError({ foo: "bar" })

    expect(resolved.code).toBe("INTERNAL_ERROR")
    expect(resolved.message).toBe("An unexpected error occurred")
    expect(resolved.details.value).toBe("[object Object]")
  })

  it("maps each error code to its taxonomy kind and exit code", () => {
    const cases: ReadonlyArray<[ErrorCode, string, number]> = [
      ["INVALID_BRANCH_NAME", "Validation", 3],
      ["WORKTREE_NOT_FOUND", "NotFound", 7],
      ["WORKTREE_EXISTS", "AlreadyExists", 8],
      ["DIRTY_WORKTREE", "Safety", 4],
      ["LOCK_TIMEOUT", "IOError", 6],
      ["STATUS_INCONSISTENT", "IOError", 9],
      ["GIT_COMMAND_FAILED", "ExternalToolError", 20],
      ["WORKSPACE_PARTIAL_FAILURE", "ExternalToolError", 22],
      ["HOOK_FAILED", "HookError", 10],
    ]

    for (const [code, kind, exitCode] of cases) {
      const error = createCliError(code, { message: code })
      expect(error.kind).toBe(kind)
      expect(error.exitCode).toBe(exitCode)
    }
  })

  it("narrows by code and reads errno codes", () => {
    const error = createCliError("WORKTREE_EXISTS", { message: "exists" })
    expect(hasErrorCode(error, "WORKTREE_EXISTS")).toBe(true)
    expect(hasErrorCode(error, "WORKTREE_NOT_FOUND")).toBe(false)
    expect(hasErrorCode(new Error("plain"), "WORKTREE_EXISTS")).toBe(false)

    const enoent = Object.assign(new Error("missing"), { code: "ENOENT" })
    expect(readErrnoCode(enoent)).toBe("ENOENT")
    expect(readErrnoCode("ENOENT")).toBeUndefined()
  })
})
