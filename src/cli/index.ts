import { createRequire } from "node:module"
import { homedir } from "node:os"
import { basename, resolve } from "node:path"
import { parseArgs } from "citty"
import type { ArgsDef } from "citty"
import { loadResolvedConfig } from "../config/loader"
import type { ResolvedConfig } from "../config/types"
import { EXIT_CODE, OPERATION_NAMES, SCHEMA_VERSION, WORKSPACE_FILE_EXTENSION } from "../core/constants"
import { createCliError, ensureCliError, type CliError } from "../core/errors"
import { createHookContext, createHookManager, type HookManager } from "../core/hook-manager"
import { createOperationRunner, type OperationRunner, type OperationWarning } from "../core/operation-runner"
import { createStatusStore, type StatusStore, type WorktreeEntry } from "../core/status-store"
import { createWorkspaceOrchestrator, type WorkspaceOrchestrator } from "../core/workspace-orchestrator"
import {
  createWorktreeOrchestrator,
  type ConfirmPrompt,
  type CreateWorktreeResult,
  type DeleteWorktreeResult,
  type WorktreeOrchestrator,
} from "../core/worktree-orchestrator"
import { createGitClient, type GitClient } from "../git/client"
import { resolveIssueBranch, type GhCommandRunner, type IssueInfo } from "../integrations/gh"
import { createIdeRegistry, type IdeRegistry } from "../integrations/ide"
import { registerDefaultHooks } from "../plugins/default-hooks"
import { createFileSystem, type FileSystem } from "../utils/fs"
import { createLogger, LogLevel, type Logger } from "../utils/logger"
import {
  createRegistryCommandHandlers,
  createStatusCommandHandlers,
  createWorktreeCommandHandlers,
  dispatchCommandHandler,
} from "./commands/handler-groups"
import { dispatchInformationalCommands } from "./commands/read/dispatcher"
import { renderListTable, type ListRow } from "./list-table"
import { loadPackageVersion } from "./package-version"
import { createReadlineConfirm } from "./prompt"
import type { CommandContext } from "./runtime/command-context"

export type CLI = {
  run(args?: string[]): Promise<number>
}

type CLIOptions = {
  readonly version?: string
  readonly cwd?: string
  readonly env?: NodeJS.ProcessEnv
  readonly homeDir?: string
  readonly stdout?: (line: string) => void
  readonly stderr?: (line: string) => void
  readonly isInteractive?: () => boolean
  /** Replaces the terminal prompt; deletions ask through it. */
  readonly confirm?: ConfirmPrompt
  /** Width available to `list`; null disables truncation. */
  readonly terminalWidth?: () => number | null
  readonly runGh?: GhCommandRunner
}

type OptionValueKind = "boolean" | "value"

type OptionSpecs = {
  readonly longOptions: Map<string, OptionValueKind>
  readonly shortOptions: Map<string, OptionValueKind>
}

type Runtime = {
  readonly config: ResolvedConfig
  readonly logger: Logger
  readonly store: StatusStore
  readonly hooks: HookManager
  readonly git: GitClient
  readonly ides: IdeRegistry
  readonly fs: FileSystem
  readonly runner: OperationRunner
  readonly worktrees: WorktreeOrchestrator
  readonly workspaces: WorkspaceOrchestrator
  readonly strictPostHooks: boolean
}

type JsonSuccessStatus = "ok" | "created" | "deleted"

type JsonSuccess = {
  readonly schemaVersion: number
  readonly command: string
  readonly status: JsonSuccessStatus
  readonly [key: string]: unknown
}

type CommandHelp = {
  readonly name: string
  readonly usage: string
  readonly summary: string
  readonly details: readonly string[]
  readonly options?: readonly string[]
  readonly examples?: readonly string[]
}

const commandHelpEntries: readonly CommandHelp[] = [
  {
    name: "init",
    usage: "arbor init",
    summary: "Create the status file.",
    details: ["Safe to run again; reports whether the file already existed."],
  },
  {
    name: "create",
    usage:
      "arbor create <branch> [--remote <name>] [--ide <name>] [--force] [--from-issue <ref>] [--workspace <file|name>]",
    summary: "Create a worktree for the repository in the current directory.",
    details: [
      "The worktree lives at <basePath>/<repository>/<remote>/<branch>.",
      "A missing local branch is created from the current branch.",
      "With --workspace, creates the branch in every repository of a .code-workspace file or a registered workspace.",
      "With --from-issue, the branch name is derived from a GitHub issue.",
    ],
    options: [
      "--remote <name>",
      "--ide <cursor|vscode|vscodium|dummy>",
      "--force",
      "--from-issue <owner/repo#N|url|N>",
      "--workspace <file|name>",
    ],
    examples: ["arbor create feature/login --ide cursor", "arbor create --from-issue 42"],
  },
  {
    name: "load",
    usage: "arbor load <remote:branch> [--ide <name>] [--force]",
    summary: "Fetch a remote branch and create a worktree tracking it.",
    details: ["A bare branch name uses the default remote."],
    options: ["--ide <cursor|vscode|vscodium|dummy>", "--force"],
  },
  {
    name: "open",
    usage: "arbor open <branch> [--remote <name>] [--repository <id>] [--ide <name>]",
    summary: "Open a registered worktree in an IDE.",
    details: ["Prints the worktree path."],
    options: ["--remote <name>", "--repository <id>", "--ide <cursor|vscode|vscodium|dummy>"],
  },
  {
    name: "delete",
    usage: "arbor delete <branch> [--remote <name>] [--repository <id>] [--force] [--workspace <name>] | --all",
    summary: "Delete worktrees.",
    details: [
      "Refuses worktrees with uncommitted changes unless --force is given.",
      "Asks for confirmation on a terminal; non-interactive runs need --force.",
      "With --workspace, deletes the branch in every repository of the workspace.",
    ],
    options: ["--remote <name>", "--repository <id>", "--workspace <name>", "--all", "--force"],
  },
  {
    name: "list",
    usage: "arbor list [--repository <id>] [--json]",
    summary: "List registered worktrees.",
    details: ["Columns and path truncation follow list.table in the config file."],
    options: ["--repository <id>"],
  },
  {
    name: "repository",
    usage: "arbor repository <list|clone <url>|delete <id>> [--shallow] [--force]",
    summary: "List, clone or delete registered repositories.",
    details: [
      "Cloning checks out the default branch at <basePath>/<repository>/origin/<branch> and registers it.",
      "Deleting a repository removes all of its worktrees.",
    ],
    options: ["--shallow", "--force"],
    examples: ["arbor repository clone https://github.com/acme/app.git"],
  },
  {
    name: "workspace",
    usage:
      "arbor workspace <list|create <name> <repository...>|add <repository>|remove <repository>|delete <name>> [--workspace <name>] [--force]",
    summary: "Manage registered workspaces.",
    details: [
      "A repository is a registered id or a path to a git repository.",
      "add and remove name the workspace with --workspace.",
      "Adding a repository creates worktrees for the branches the workspace already has.",
      "Removing a repository keeps its worktrees.",
      "Deleting a workspace removes its worktrees and generated workspace files.",
    ],
    options: ["--workspace <name>", "--force"],
    examples: ["arbor workspace create platform api web", "arbor workspace add ./docs --workspace platform"],
  },
] as const

const toKebabCase = (value: string): string => {
  return value.replace(/[A-Z]/g, (match) => `-${match.toLowerCase()}`)
}

const buildOptionSpecs = (argsDef: Readonly<ArgsDef>): OptionSpecs => {
  const longOptions = new Map<string, OptionValueKind>()
  const shortOptions = new Map<string, OptionValueKind>()

  for (const [argName, arg] of Object.entries(argsDef)) {
    if (arg.type === "positional") {
      continue
    }

    const valueKind: OptionValueKind = arg.type === "boolean" ? "boolean" : "value"
    longOptions.set(argName, valueKind)
    longOptions.set(toKebabCase(argName), valueKind)

    const aliases =
      "alias" in arg ? (Array.isArray(arg.alias) ? arg.alias : typeof arg.alias === "string" ? [arg.alias] : []) : []
    for (const alias of aliases) {
      if (alias.length === 1) {
        shortOptions.set(alias, valueKind)
        continue
      }
      longOptions.set(alias, valueKind)
      longOptions.set(toKebabCase(alias), valueKind)
    }
  }

  return { longOptions, shortOptions }
}

const validateRawOptions = (args: readonly string[], optionSpecs: OptionSpecs): void => {
  for (let index = 0; index < args.length; index += 1) {
    const token = args[index]
    if (typeof token !== "string" || token === "-" || !token.startsWith("-")) {
      continue
    }
    if (token === "--") {
      break
    }

    if (token.startsWith("--")) {
      const value = token.slice(2)
      const separatorIndex = value.indexOf("=")
      const rawOptionName = separatorIndex >= 0 ? value.slice(0, separatorIndex) : value
      const optionNameForNegation = rawOptionName.startsWith("no-") ? rawOptionName.slice(3) : rawOptionName
      const kind = optionSpecs.longOptions.get(rawOptionName) ?? optionSpecs.longOptions.get(optionNameForNegation)
      if (kind === undefined) {
        throw createCliError("INVALID_ARGUMENT", { message: `Unknown option: --${rawOptionName}` })
      }

      if (kind === "value") {
        if (separatorIndex >= 0) {
          if (value.slice(separatorIndex + 1).length === 0) {
            throw createCliError("INVALID_ARGUMENT", { message: `Missing value for option: --${rawOptionName}` })
          }
        } else {
          const nextToken = args[index + 1]
          if (typeof nextToken !== "string" || nextToken.length === 0 || nextToken.startsWith("-")) {
            throw createCliError("INVALID_ARGUMENT", { message: `Missing value for option: --${rawOptionName}` })
          }
          index += 1
        }
      }
      continue
    }

    const shortFlags = token.slice(1)
    for (let flagIndex = 0; flagIndex < shortFlags.length; flagIndex += 1) {
      const option = shortFlags[flagIndex]
      if (typeof option !== "string" || option.length === 0) {
        continue
      }
      const kind = optionSpecs.shortOptions.get(option)
      if (kind === undefined) {
        throw createCliError("INVALID_ARGUMENT", { message: `Unknown option: -${option}` })
      }
      if (kind === "value") {
        const nextToken = args[index + 1]
        if (flagIndex < shortFlags.length - 1) {
          break
        }
        if (typeof nextToken !== "string" || nextToken.length === 0 || nextToken.startsWith("-")) {
          throw createCliError("INVALID_ARGUMENT", { message: `Missing value for option: -${option}` })
        }
        index += 1
        break
      }
    }
  }
}

const getPositionals = (args: { readonly _: unknown[] }): string[] => {
  return args._.filter((value): value is string => typeof value === "string")
}

const toNumberOption = ({
  value,
  optionName,
}: {
  readonly value: unknown
  readonly optionName: string
}): number | undefined => {
  if (value === undefined) {
    return undefined
  }
  if (typeof value !== "string") {
    throw createCliError("INVALID_ARGUMENT", {
      message: `${optionName} must be a number`,
    })
  }

  const parsed = Number.parseInt(value, 10)
  if (Number.isFinite(parsed) !== true || parsed <= 0) {
    throw createCliError("INVALID_ARGUMENT", {
      message: `${optionName} must be a positive integer`,
    })
  }
  return parsed
}

const ensureArgumentCount = ({
  command,
  args,
  min,
  max,
}: {
  readonly command: string
  readonly args: readonly string[]
  readonly min: number
  readonly max: number
}): void => {
  if (args.length < min || args.length > max) {
    const expected = max === Number.POSITIVE_INFINITY ? `at least ${String(min)}` : `${String(min)}-${String(max)}`
    throw createCliError("INVALID_ARGUMENT", {
      message: `${command} expects ${expected} positional argument(s), received ${String(args.length)}`,
      details: { command, args },
    })
  }
}

const readStringOption = (parsedArgs: Record<string, unknown>, key: string): string | undefined => {
  const value = parsedArgs[key]
  if (typeof value === "string") {
    return value
  }
  return undefined
}

const buildJsonSuccess = ({
  command,
  status,
  details,
}: {
  readonly command: string
  readonly status: JsonSuccessStatus
  readonly details?: Record<string, unknown>
}): JsonSuccess => {
  return {
    schemaVersion: SCHEMA_VERSION,
    command,
    status,
    ...(details ?? {}),
  }
}

const buildJsonError = ({
  command,
  error,
}: {
  readonly command: string
  readonly error: CliError
}): Record<string, unknown> => {
  return {
    schemaVersion: SCHEMA_VERSION,
    command,
    status: "error",
    code: error.code,
    message: error.message,
    details: error.details,
  }
}

const toWorktreeJson = ({ repoUrl, worktree }: { readonly repoUrl: string } & Pick<DeleteWorktreeResult, "worktree">) => {
  return {
    repoUrl,
    remote: worktree.remote,
    branch: worktree.branch,
    path: worktree.path,
    workspacePath: worktree.workspacePath ?? null,
    detached: worktree.detached === true,
  }
}

const renderGeneralHelpText = ({ version }: { readonly version: string }): string => {
  const commandList = commandHelpEntries.map((entry) => `  ${entry.name.padEnd(10)} ${entry.summary}`).join("\n")
  return [
    "arbor",
    "",
    "Usage:",
    "  arbor <command> [options]",
    "",
    `Version: ${version}`,
    "",
    "Commands:",
    commandList,
    "",
    "Global options:",
    "  --json                  Output machine-readable JSON.",
    "  --verbose               Enable verbose logs.",
    "  --quiet                 Only log errors.",
    "  --config <file>         Use this config file.",
    "  --no-hooks              Skip user hook scripts for this run.",
    "  --strict-post-hooks     Exit non-zero when a post hook fails.",
    "  --hook-timeout-ms <ms>  Override hook timeout.",
    "  --lock-timeout-ms <ms>  Override status file lock timeout.",
    "  -h, --help              Show help.",
    "  -v, --version           Show version.",
    "",
    "Help commands:",
    "  arbor help",
    "  arbor help <command>",
    "  arbor <command> --help",
  ].join("\n")
}

const renderCommandHelpText = ({ entry }: { readonly entry: CommandHelp }): string => {
  const lines = [`Command: ${entry.name}`, "", "Usage:", `  ${entry.usage}`, "", "Summary:", `  ${entry.summary}`]

  if (entry.details.length > 0) {
    lines.push("", "Details:")
    for (const detail of entry.details) {
      lines.push(`  - ${detail}`)
    }
  }

  if (entry.options !== undefined && entry.options.length > 0) {
    lines.push("", "Options:")
    for (const option of entry.options) {
      lines.push(`  - ${option}`)
    }
  }

  if (entry.examples !== undefined && entry.examples.length > 0) {
    lines.push("", "Examples:")
    for (const example of entry.examples) {
      lines.push(`  ${example}`)
    }
  }

  lines.push("", "Show all commands: arbor help")
  return lines.join("\n")
}

const resolveVersion = (): string => {
  try {
    return loadPackageVersion(createRequire(import.meta.url))
  } catch {
    return "0.0.0"
  }
}

const refuseConfirmation: ConfirmPrompt = async (message) => {
  throw createCliError("DELETION_CANCELLED", {
    message: `${message} Re-run with --force to delete without a terminal`,
    details: { prompt: message },
  })
}

export const createCli = (options: CLIOptions = {}): CLI => {
  const version = options.version ?? resolveVersion()
  const runtimeCwd = options.cwd ?? process.cwd()
  const env = options.env ?? process.env
  const homeDir = options.homeDir ?? homedir()
  const stdout = options.stdout ?? ((line: string): void => console.log(line))
  const stderr = options.stderr ?? ((line: string): void => console.error(line))
  const isInteractiveFn =
    options.isInteractive ?? ((): boolean => process.stdin.isTTY === true && process.stderr.isTTY === true)
  const terminalWidth =
    options.terminalWidth ?? ((): number | null => (process.stdout.isTTY === true ? process.stdout.columns : null))

  const rootArgsDef = {
    command: {
      type: "positional",
      description: "Command name",
      required: false,
    },
    json: {
      type: "boolean",
      description: "Output JSON on stdout",
    },
    verbose: {
      type: "boolean",
      description: "Show detailed logs",
    },
    quiet: {
      type: "boolean",
      description: "Only log errors",
    },
    config: {
      type: "string",
      valueHint: "file",
      description: "Config file path",
    },
    hooks: {
      type: "boolean",
      description: "Run user hook scripts (disable with --no-hooks)",
      default: true,
    },
    strictPostHooks: {
      type: "boolean",
      description: "Fail when post hooks fail",
    },
    hookTimeoutMs: {
      type: "string",
      valueHint: "ms",
      description: "Override hook timeout (ms)",
    },
    lockTimeoutMs: {
      type: "string",
      valueHint: "ms",
      description: "Override lock timeout (ms)",
    },
    remote: {
      type: "string",
      valueHint: "name",
      description: "Remote the worktree belongs to",
    },
    repository: {
      type: "string",
      valueHint: "id",
      description: "Repository id instead of the current directory",
    },
    ide: {
      type: "string",
      valueHint: "name",
      description: "IDE to open the result in",
    },
    force: {
      type: "boolean",
      description: "Skip safety checks and confirmation",
    },
    fromIssue: {
      type: "string",
      valueHint: "ref",
      description: "Derive the branch from a GitHub issue",
    },
    workspace: {
      type: "string",
      valueHint: "file|name",
      description: "Workspace file or registered workspace name",
    },
    all: {
      type: "boolean",
      description: "Delete every registered worktree",
    },
    shallow: {
      type: "boolean",
      description: "Clone without submodules",
    },
    help: {
      type: "boolean",
      alias: "h",
      description: "Show help",
    },
    version: {
      type: "boolean",
      alias: "v",
      description: "Show version",
    },
  } satisfies ArgsDef

  const optionSpecs = buildOptionSpecs(rootArgsDef)

  const createRuntime = async (parsedArgs: Record<string, unknown>): Promise<Runtime> => {
    const configPath = readStringOption(parsedArgs, "config")
    const { config } = await loadResolvedConfig({
      ...(configPath === undefined ? {} : { explicitPath: resolve(runtimeCwd, configPath) }),
      env,
      homeDir,
    })

    const level =
      parsedArgs.quiet === true ? LogLevel.ERROR : parsedArgs.verbose === true ? LogLevel.INFO : undefined
    const logger = createLogger({ env, ...(level === undefined ? {} : { level }) })
    const hookTimeoutMs =
      toNumberOption({ value: parsedArgs.hookTimeoutMs, optionName: "--hook-timeout-ms" }) ?? config.hooks.timeoutMs
    const lockTimeoutMs =
      toNumberOption({ value: parsedArgs.lockTimeoutMs, optionName: "--lock-timeout-ms" }) ?? config.locks.timeoutMs

    const fs = createFileSystem({ env })
    const store = createStatusStore({
      statusFile: config.paths.statusFile,
      lockTimeoutMs,
      staleLockTTLSeconds: config.locks.staleLockTTLSeconds,
      logger: logger.createChild("[status]"),
    })
    const hooks = createHookManager({ logger })
    const ides = createIdeRegistry({ fs, logger })
    const scriptsEnabled = config.hooks.enabled && parsedArgs.hooks !== false
    registerDefaultHooks({
      hookManager: hooks,
      fs,
      ides,
      logger,
      scripts: scriptsEnabled ? { hooksDir: config.paths.hooksDir, timeoutMs: hookTimeoutMs } : null,
    })

    const git = createGitClient({ logger })
    const confirm = options.confirm ?? (isInteractiveFn() ? createReadlineConfirm() : refuseConfirmation)
    const shared = {
      store,
      hooks,
      git,
      fs,
      basePath: config.paths.basePath,
      defaultRemote: config.git.defaultRemote,
      confirm,
      logger,
    }
    const worktrees = createWorktreeOrchestrator(shared)
    const workspaces = createWorkspaceOrchestrator({ ...shared, worktrees, cwd: runtimeCwd })

    return {
      config,
      logger,
      store,
      hooks,
      git,
      ides,
      fs,
      runner: createOperationRunner({ hooks, logger }),
      worktrees,
      workspaces,
      strictPostHooks: parsedArgs.strictPostHooks === true,
    }
  }

  const run = async (rawArgs: string[] = process.argv.slice(2)): Promise<number> => {
    let command = "unknown"
    let jsonEnabled = false
    let logger: Logger = createLogger({ env })

    try {
      validateRawOptions(rawArgs, optionSpecs)
      const parsedArgs: Record<string, unknown> & { readonly _: string[] } = parseArgs(rawArgs, rootArgsDef)
      const positionals = getPositionals(parsedArgs)
      command = positionals[0] ?? "unknown"
      jsonEnabled = parsedArgs.json === true

      const informationalExitCode = dispatchInformationalCommands({
        context: { command, positionals, parsedArgs },
        renderer: {
          version,
          entries: commandHelpEntries,
          nameOf: (entry) => entry.name,
          renderGeneral: renderGeneralHelpText,
          renderCommand: renderCommandHelpText,
        },
        stdout,
      })
      if (informationalExitCode !== null) {
        return informationalExitCode
      }

      const context: CommandContext = {
        cwd: runtimeCwd,
        command,
        commandArgs: positionals.slice(1),
        positionals,
        parsedArgs,
        jsonEnabled,
      }
      const runtime = await createRuntime(parsedArgs)
      logger = runtime.logger

      const handlers = createCommandHandlers({
        context,
        runtime,
        stdout,
        stderr,
        terminalWidth,
        ...(options.runGh === undefined ? {} : { runGh: options.runGh }),
      })
      for (const group of handlers) {
        const exitCode = await dispatchCommandHandler({ command, handlers: group })
        if (exitCode !== undefined) {
          return exitCode
        }
      }

      throw createCliError("UNKNOWN_COMMAND", {
        message: `Unknown command: ${command}`,
        details: { availableCommands: commandHelpEntries.map((entry) => entry.name) },
      })
    } catch (error) {
      const cliError = ensureCliError(error)
      if (jsonEnabled) {
        stdout(
          JSON.stringify(
            buildJsonError({
              command,
              error: cliError,
            }),
          ),
        )
      } else {
        stderr(`[${cliError.code}] ${cliError.message}`)
        logger.debug(JSON.stringify(cliError.details))
      }
      return cliError.exitCode
    }
  }

  return { run }
}

type HandlerDependencies = {
  readonly context: CommandContext
  readonly runtime: Runtime
  readonly stdout: (line: string) => void
  readonly stderr: (line: string) => void
  readonly terminalWidth: () => number | null
  readonly runGh?: GhCommandRunner
}

const createCommandHandlers = ({
  context,
  runtime,
  stdout,
  stderr,
  terminalWidth,
  runGh,
}: HandlerDependencies) => {
  const { cwd, command, commandArgs, parsedArgs, jsonEnabled } = context
  const { config, fs, git, ides, store, worktrees, workspaces } = runtime
  const force = parsedArgs.force === true

  const printJson = (status: JsonSuccessStatus, details: Record<string, unknown>): void => {
    stdout(JSON.stringify(buildJsonSuccess({ command, status, details })))
  }

  // Warnings never change the outcome unless --strict-post-hooks asks them to.
  const reportWarnings = (warnings: readonly OperationWarning[]): number => {
    for (const warning of warnings) {
      stderr(`warning: [${warning.code}] ${warning.message}`)
    }
    return runtime.strictPostHooks && warnings.length > 0 ? EXIT_CODE.HOOK_FAILED : EXIT_CODE.OK
  }

  const resolveIde = (): string | null => {
    const ide = readStringOption(parsedArgs, "ide") ?? config.ide.default
    if (ide !== null) {
      ides.get(ide)
    }
    return ide
  }

  const currentRepository = async (): Promise<{ readonly repoUrl: string; readonly repoPath: string }> => {
    const repoPath = await git.getRepositoryRoot(cwd)
    return { repoUrl: await git.getRepositoryName(repoPath), repoPath }
  }

  const resolveRepoUrl = async (): Promise<string> => {
    return readStringOption(parsedArgs, "repository") ?? (await currentRepository()).repoUrl
  }

  // An existing file wins over a registered workspace of the same name.
  const resolveWorkspaceFile = async (): Promise<string | null> => {
    const value = readStringOption(parsedArgs, "workspace")
    if (value === undefined) {
      return null
    }
    const file = resolve(cwd, value)
    if (await fs.exists(file)) {
      return file
    }
    const registered = (await workspaces.listWorkspaces()).find((entry) => entry.name === value)
    return registered === undefined ? file : registered.workspace.path
  }

  const remoteOption = (): { readonly remote?: string } => {
    const remote = readStringOption(parsedArgs, "remote")
    return remote === undefined ? {} : { remote }
  }

  const printCreated = (result: CreateWorktreeResult, issue: IssueInfo | null): number => {
    if (jsonEnabled) {
      printJson("created", {
        ...toWorktreeJson(result),
        state: result.state,
        openedIde: result.openedIde,
        warnings: result.warnings,
        ...(issue === null ? {} : { issue }),
      })
    } else {
      stdout(result.path)
    }
    return reportWarnings(result.warnings)
  }

  const printDeleted = (deleted: readonly DeleteWorktreeResult[], details: Record<string, unknown>): void => {
    if (jsonEnabled) {
      printJson("deleted", { ...details, deleted: deleted.map(toWorktreeJson) })
      return
    }
    for (const entry of deleted) {
      stdout(`deleted: ${entry.worktree.path}`)
    }
  }

  const initHandler = async (): Promise<number> => {
    ensureArgumentCount({ command, args: commandArgs, min: 0, max: 0 })
    const ctx = createHookContext({ operation: OPERATION_NAMES.INIT, parameters: { kind: "bulk", force: false } })
    const warnings: OperationWarning[] = []
    const result = await runtime.runner.run(ctx, async () => {
      const initialized = await store.initialize()
      ctx.results.targetPath = store.statusFile
      return initialized
    })
    await runtime.runner.runTolerated({
      phase: "post",
      run: () => runtime.hooks.executePostHooks(ctx.operation, ctx),
      warnings,
    })

    if (jsonEnabled) {
      printJson("ok", {
        statusFile: store.statusFile,
        alreadyInitialized: result.alreadyInitialized,
        warnings,
      })
    } else {
      stdout(`${result.alreadyInitialized ? "already initialized" : "initialized"}: ${store.statusFile}`)
    }
    return reportWarnings(warnings)
  }

  const workspaceNameOf = (entry: WorktreeEntry, names: readonly string[]): string | null => {
    const workspacePath = entry.worktree.workspacePath
    if (workspacePath === undefined) {
      return null
    }
    const owner = names.find((name) => workspaces.generatedFilePath(name, entry.worktree.branch) === workspacePath)
    return owner ?? basename(workspacePath, WORKSPACE_FILE_EXTENSION)
  }

  const listHandler = async (): Promise<number> => {
    ensureArgumentCount({ command, args: commandArgs, min: 0, max: 0 })
    const repoUrl = readStringOption(parsedArgs, "repository")
    const entries = await worktrees.list(repoUrl === undefined ? {} : { repoUrl })
    const workspaceNames = (await workspaces.listWorkspaces()).map((workspace) => workspace.name)

    if (jsonEnabled) {
      printJson("ok", {
        worktrees: entries.map((entry) => ({
          ...toWorktreeJson({ repoUrl: entry.repoUrl, worktree: entry.worktree }),
          workspace: workspaceNameOf(entry, workspaceNames),
        })),
      })
      return EXIT_CODE.OK
    }

    const rows: ListRow[] = entries.map((entry) => ({
      repository: entry.repoUrl,
      branch: entry.worktree.branch,
      remote: entry.worktree.remote,
      workspace: workspaceNameOf(entry, workspaceNames),
      path: entry.worktree.path,
    }))
    const { table } = config.list
    stdout(
      renderListTable({
        rows,
        columns: table.columns,
        truncate: table.path.truncate,
        minWidth: table.path.minWidth,
        maxWidth: terminalWidth(),
      }),
    )
    return EXIT_CODE.OK
  }

  const createHandler = async (): Promise<number> => {
    const issueReference = readStringOption(parsedArgs, "fromIssue")
    ensureArgumentCount({
      command,
      args: commandArgs,
      min: issueReference === undefined ? 1 : 0,
      max: issueReference === undefined ? 1 : 0,
    })
    const ide = resolveIde()

    let branch = commandArgs[0] ?? ""
    let issue: IssueInfo | null = null
    if (issueReference !== undefined) {
      const resolved = await resolveIssueBranch({
        cwd,
        reference: issueReference,
        originUrl: await git.getRemoteURL(cwd, "origin"),
        ...(runGh === undefined ? {} : { runGh }),
      })
      branch = resolved.branch
      issue = resolved.issue
    }

    const workspaceFile = await resolveWorkspaceFile()
    if (workspaceFile !== null) {
      const result = await workspaces.createWorktreesForWorkspace({
        workspaceFile,
        branch,
        force,
        ide,
      })
      if (jsonEnabled) {
        printJson("created", {
          workspace: result.name,
          branch,
          generatedFile: result.generatedFile,
          worktrees: result.worktrees.map(toWorktreeJson),
          state: result.state,
          openedIde: result.openedIde,
          warnings: result.warnings,
        })
      } else {
        stdout(result.generatedFile)
      }
      return reportWarnings(result.warnings)
    }

    const result = await worktrees.create({
      ...(await currentRepository()),
      branch,
      force,
      ide,
      ...remoteOption(),
    })
    return printCreated(result, issue)
  }

  const loadHandler = async (): Promise<number> => {
    ensureArgumentCount({ command, args: commandArgs, min: 1, max: 1 })
    const ide = resolveIde()
    const result = await worktrees.load({
      ...(await currentRepository()),
      remoteSource: commandArgs[0] ?? "",
      force,
      ide,
    })
    return printCreated(result, null)
  }

  const openHandler = async (): Promise<number> => {
    ensureArgumentCount({ command, args: commandArgs, min: 1, max: 1 })
    const ide = resolveIde()
    const result = await worktrees.open({
      repoUrl: await resolveRepoUrl(),
      branch: commandArgs[0] ?? "",
      ide,
      ...remoteOption(),
    })
    if (jsonEnabled) {
      printJson("ok", { ...toWorktreeJson(result), openedIde: result.openedIde })
    } else {
      stdout(result.worktree.path)
    }
    return EXIT_CODE.OK
  }

  const deleteHandler = async (): Promise<number> => {
    if (parsedArgs.all === true) {
      ensureArgumentCount({ command, args: commandArgs, min: 0, max: 0 })
      const result = await worktrees.deleteAll({ force })
      printDeleted(result.deleted, { warnings: result.warnings })
      return reportWarnings(result.warnings)
    }

    ensureArgumentCount({ command, args: commandArgs, min: 1, max: 1 })
    const branch = commandArgs[0] ?? ""
    const workspace = readStringOption(parsedArgs, "workspace")
    if (workspace !== undefined) {
      const result = await workspaces.deleteWorktreesForWorkspace({ name: workspace, branch, force })
      printDeleted(result.deleted, { workspace, branch, removedFiles: result.removedFiles, warnings: result.warnings })
      return reportWarnings(result.warnings)
    }

    const result = await worktrees.delete({
      repoUrl: await resolveRepoUrl(),
      branch,
      force,
      ...remoteOption(),
    })
    printDeleted([result], { warnings: result.warnings })
    return reportWarnings(result.warnings)
  }

  const expectSubcommand = (
    arities: ReadonlyMap<string, readonly [min: number, max: number]>,
  ): { readonly action: string; readonly targets: readonly string[] } => {
    const action = commandArgs[0]
    const arity = action === undefined ? undefined : arities.get(action)
    if (action === undefined || arity === undefined) {
      throw createCliError("UNKNOWN_COMMAND", {
        message: `Unknown ${command} subcommand: ${action ?? "<none>"}`,
        details: { command, availableSubcommands: [...arities.keys()] },
      })
    }
    const targets = commandArgs.slice(1)
    ensureArgumentCount({ command: `${command} ${action}`, args: targets, min: arity[0], max: arity[1] })
    return { action, targets }
  }

  const requireWorkspaceOption = (action: string): string => {
    const name = readStringOption(parsedArgs, "workspace")
    if (name === undefined) {
      throw createCliError("INVALID_ARGUMENT", {
        message: `${command} ${action} requires --workspace <name>`,
        details: { command, action },
      })
    }
    return name
  }

  const listRepositories = async (): Promise<number> => {
    const repositories = await store.listRepositories()
    if (jsonEnabled) {
      printJson("ok", {
        repositories: repositories.map(({ repoUrl, repository }) => ({
          repoUrl,
          path: repository.path,
          remotes: repository.remotes,
          worktrees: Object.keys(repository.worktrees).length,
        })),
      })
      return EXIT_CODE.OK
    }
    for (const { repoUrl, repository } of repositories) {
      stdout(`${repoUrl}\t${repository.path}`)
    }
    return EXIT_CODE.OK
  }

  const cloneRepository = async (url: string): Promise<number> => {
    const result = await worktrees.clone({ url, recursive: parsedArgs.shallow !== true })
    if (jsonEnabled) {
      printJson("created", {
        repoUrl: result.repoUrl,
        path: result.path,
        defaultBranch: result.defaultBranch,
        warnings: result.warnings,
      })
    } else {
      stdout(result.path)
    }
    return reportWarnings(result.warnings)
  }

  const deleteRepository = async (repoUrl: string): Promise<number> => {
    const result = await worktrees.deleteRepository({ repoUrl, force })
    if (jsonEnabled) {
      printJson("deleted", {
        repoUrl: result.repoUrl,
        removedWorktrees: result.removedWorktrees.map((worktree) => worktree.path),
        warnings: result.warnings,
      })
    } else {
      for (const worktree of result.removedWorktrees) {
        stdout(`deleted: ${worktree.path}`)
      }
      stdout(`deleted repository: ${result.repoUrl}`)
    }
    return reportWarnings(result.warnings)
  }

  const repositorySubcommands = new Map<string, readonly [number, number]>([
    ["list", [0, 0]],
    ["clone", [1, 1]],
    ["delete", [1, 1]],
  ])

  const repositoryHandler = async (): Promise<number> => {
    const { action, targets } = expectSubcommand(repositorySubcommands)
    const target = targets[0] ?? ""
    switch (action) {
      case "clone":
        return cloneRepository(target)
      case "delete":
        return deleteRepository(target)
      default:
        return listRepositories()
    }
  }

  const listWorkspaces = async (): Promise<number> => {
    const entries = await workspaces.listWorkspaces()
    if (jsonEnabled) {
      printJson("ok", {
        workspaces: entries.map(({ name, workspace }) => ({
          name,
          path: workspace.path,
          repositories: workspace.repositories,
        })),
      })
      return EXIT_CODE.OK
    }
    for (const { name, workspace } of entries) {
      stdout(`${name}\t${workspace.path}`)
    }
    return EXIT_CODE.OK
  }

  const createWorkspace = async (name: string, repositories: readonly string[]): Promise<number> => {
    const result = await workspaces.createWorkspace({ name, repositories })
    if (jsonEnabled) {
      printJson("created", {
        workspace: result.name,
        file: result.file,
        repositories: result.repositories,
        warnings: result.warnings,
      })
    } else {
      stdout(result.file)
    }
    return reportWarnings(result.warnings)
  }

  const addWorkspaceRepository = async (repository: string): Promise<number> => {
    const result = await workspaces.addRepository({ name: requireWorkspaceOption("add"), repository })
    if (jsonEnabled) {
      printJson("ok", {
        workspace: result.name,
        repoUrl: result.repoUrl,
        worktrees: result.worktrees.map(toWorktreeJson),
        warnings: result.warnings,
      })
    } else {
      stdout(`added: ${result.repoUrl}`)
      for (const worktree of result.worktrees) {
        stdout(`created: ${worktree.path}`)
      }
    }
    return reportWarnings(result.warnings)
  }

  const removeWorkspaceRepository = async (repository: string): Promise<number> => {
    const result = await workspaces.removeRepository({ name: requireWorkspaceOption("remove"), repository })
    if (jsonEnabled) {
      printJson("ok", {
        workspace: result.name,
        repoUrl: result.repoUrl,
        releasedWorktrees: result.releasedWorktrees,
        warnings: result.warnings,
      })
    } else {
      stdout(`removed: ${result.repoUrl}`)
    }
    return reportWarnings(result.warnings)
  }

  const deleteWorkspace = async (name: string): Promise<number> => {
    const result = await workspaces.deleteWorkspace({ name, force })
    printDeleted(result.deleted, { workspace: result.name, removedFiles: result.removedFiles, warnings: result.warnings })
    if (!jsonEnabled) {
      for (const file of result.removedFiles) {
        stdout(`removed: ${file}`)
      }
    }
    return reportWarnings(result.warnings)
  }

  const workspaceSubcommands = new Map<string, readonly [number, number]>([
    ["list", [0, 0]],
    ["create", [2, Number.POSITIVE_INFINITY]],
    ["add", [1, 1]],
    ["remove", [1, 1]],
    ["delete", [1, 1]],
  ])

  const workspaceHandler = async (): Promise<number> => {
    const { action, targets } = expectSubcommand(workspaceSubcommands)
    const [target = "", ...rest] = targets
    switch (action) {
      case "create":
        return createWorkspace(target, rest)
      case "add":
        return addWorkspaceRepository(target)
      case "remove":
        return removeWorkspaceRepository(target)
      case "delete":
        return deleteWorkspace(target)
      default:
        return listWorkspaces()
    }
  }

  return [
    createStatusCommandHandlers({ initHandler, listHandler }),
    createWorktreeCommandHandlers({ createHandler, loadHandler, openHandler, deleteHandler }),
    createRegistryCommandHandlers({ repositoryHandler, workspaceHandler }),
  ] as const
}
