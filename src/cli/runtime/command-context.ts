/** What a command handler knows about the current invocation. */
export type CommandContext = {
  /** Directory the command acts on; the repository for worktree commands. */
  readonly cwd: string
  readonly command: string
  /** Positionals after the command name. */
  readonly commandArgs: readonly string[]
  readonly positionals: readonly string[]
  readonly parsedArgs: Record<string, unknown>
  readonly jsonEnabled: boolean
}
