import { execa } from "execa"
import { createCliError } from "../core/errors"

export type RunGitCommandInput = {
  readonly cwd: string
  readonly args: readonly string[]
  /** When false a non-zero exit is returned instead of thrown. */
  readonly reject?: boolean
}

export type RunGitCommandOutput = {
  readonly stdout: string
  readonly stderr: string
  readonly exitCode: number
}

const readFailureField = (error: unknown, key: string): unknown => {
  return typeof error === "object" && error !== null ? Reflect.get(error, key) : undefined
}

const readFailureText = (error: unknown, key: string): string => {
  const value = readFailureField(error, key)
  return typeof value === "string" ? value : ""
}

export const runGitCommand = async ({ cwd, args, reject = true }: RunGitCommandInput): Promise<RunGitCommandOutput> => {
  try {
    const result = await execa("git", [...args], {
      cwd,
      reject,
      env: { GIT_TERMINAL_PROMPT: "0" },
    })
    return {
      stdout: result.stdout,
      stderr: result.stderr,
      exitCode: result.exitCode ?? 0,
    }
  } catch (error) {
    const exitCode = readFailureField(error, "exitCode")
    const stderr = readFailureText(error, "stderr")
    const shortMessage = readFailureText(error, "shortMessage")
    throw createCliError("GIT_COMMAND_FAILED", {
      message: stderr.trim().length > 0 ? `git ${args[0] ?? ""} failed: ${stderr.trim()}` : `git ${args[0] ?? ""} failed`,
      details: {
        command: ["git", ...args],
        cwd,
        exitCode: typeof exitCode === "number" ? exitCode : null,
        stdout: readFailureText(error, "stdout"),
        stderr,
        shortMessage: shortMessage.length > 0 ? shortMessage : error instanceof Error ? error.message : String(error),
      },
      cause: error,
    })
  }
}
