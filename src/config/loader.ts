import { readFile } from "node:fs/promises"
import { homedir } from "node:os"
import { dirname, isAbsolute, join, resolve } from "node:path"
import { parse } from "yaml"
import { createCliError, readErrnoCode } from "../core/errors"
import {
  createDefaultConfig,
  LIST_PATH_TRUNCATE_VALUES,
  LIST_TABLE_COLUMNS,
  SUPPORTED_IDE_NAMES,
  type IdeName,
  type ListPathTruncate,
  type ListTableColumn,
  type PartialConfig,
  type ResolvedConfig,
} from "./types"

const CONFIG_FILE_BASENAME = "config.yml"
const GLOBAL_CONFIG_PATH_SEGMENTS = ["arbor", CONFIG_FILE_BASENAME] as const

type ValidationContext = {
  readonly file: string
}

export type LoadResolvedConfigInput = {
  /** `--config`; wins over the environment and the XDG location. */
  readonly explicitPath?: string
  readonly env?: NodeJS.ProcessEnv
  readonly homeDir?: string
}

export type LoadResolvedConfigResult = {
  readonly config: ResolvedConfig
  readonly loadedFile: string | null
}

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return value !== null && typeof value === "object" && Array.isArray(value) !== true
}

const toKeyPath = (segments: readonly string[]): string => {
  if (segments.length === 0) {
    return "<root>"
  }
  return segments.join(".")
}

const throwInvalidConfig = ({
  file,
  keyPath,
  reason,
}: {
  readonly file: string
  readonly keyPath: string
  readonly reason: string
}): never => {
  throw createCliError("INVALID_CONFIG", {
    message: `Invalid config: ${file} (${keyPath}: ${reason})`,
    details: {
      file,
      keyPath,
      reason,
    },
  })
}

type FieldInput = {
  readonly value: unknown
  readonly ctx: ValidationContext
  readonly keyPath: readonly string[]
}

const expectRecord = ({ value, ctx, keyPath }: FieldInput): Record<string, unknown> => {
  if (isRecord(value)) {
    return value
  }
  return throwInvalidConfig({
    file: ctx.file,
    keyPath: toKeyPath(keyPath),
    reason: "must be an object",
  })
}

const ensureNoUnknownKeys = ({
  record,
  allowedKeys,
  ctx,
  keyPath,
}: {
  readonly record: Record<string, unknown>
  readonly allowedKeys: ReadonlyArray<string>
  readonly ctx: ValidationContext
  readonly keyPath: readonly string[]
}): void => {
  const allowed = new Set(allowedKeys)
  for (const key of Object.keys(record)) {
    if (allowed.has(key)) {
      continue
    }
    throwInvalidConfig({
      file: ctx.file,
      keyPath: toKeyPath([...keyPath, key]),
      reason: "unknown key",
    })
  }
}

const expectSection = ({
  value,
  ctx,
  keyPath,
  allowedKeys,
}: FieldInput & { readonly allowedKeys: ReadonlyArray<string> }): Record<string, unknown> => {
  const record = expectRecord({ value, ctx, keyPath })
  ensureNoUnknownKeys({ record, allowedKeys, ctx, keyPath })
  return record
}

const parseBoolean = ({ value, ctx, keyPath }: FieldInput): boolean => {
  if (typeof value === "boolean") {
    return value
  }
  return throwInvalidConfig({
    file: ctx.file,
    keyPath: toKeyPath(keyPath),
    reason: "must be boolean",
  })
}

const parseNonEmptyString = ({ value, ctx, keyPath }: FieldInput): string => {
  if (typeof value === "string" && value.trim().length > 0) {
    return value
  }
  return throwInvalidConfig({
    file: ctx.file,
    keyPath: toKeyPath(keyPath),
    reason: "must be a non-empty string",
  })
}

const parsePositiveInteger = ({ value, ctx, keyPath }: FieldInput): number => {
  if (typeof value === "number" && Number.isInteger(value) && value > 0) {
    return value
  }
  return throwInvalidConfig({
    file: ctx.file,
    keyPath: toKeyPath(keyPath),
    reason: "must be a positive integer",
  })
}

const isOneOf = <T extends string>(allowed: ReadonlyArray<T>, value: unknown): value is T => {
  return typeof value === "string" && allowed.some((candidate) => candidate === value)
}

const parseColumns = ({ value, ctx, keyPath }: FieldInput): ReadonlyArray<ListTableColumn> => {
  if (!Array.isArray(value)) {
    return throwInvalidConfig({
      file: ctx.file,
      keyPath: toKeyPath(keyPath),
      reason: "must be an array",
    })
  }
  if (value.length === 0) {
    return throwInvalidConfig({
      file: ctx.file,
      keyPath: toKeyPath(keyPath),
      reason: "must not be empty",
    })
  }

  const parsed: ListTableColumn[] = []
  for (const [index, item] of value.entries()) {
    const itemKeyPath = toKeyPath([...keyPath, String(index)])
    if (!isOneOf(LIST_TABLE_COLUMNS, item)) {
      return throwInvalidConfig({
        file: ctx.file,
        keyPath: itemKeyPath,
        reason: `unsupported column: ${String(item)}`,
      })
    }
    if (parsed.includes(item)) {
      return throwInvalidConfig({
        file: ctx.file,
        keyPath: itemKeyPath,
        reason: `duplicate column: ${item}`,
      })
    }
    parsed.push(item)
  }
  return parsed
}

const parseListPathTruncate = ({ value, ctx, keyPath }: FieldInput): ListPathTruncate => {
  if (isOneOf(LIST_PATH_TRUNCATE_VALUES, value)) {
    return value
  }
  return throwInvalidConfig({
    file: ctx.file,
    keyPath: toKeyPath(keyPath),
    reason: `must be one of: ${LIST_PATH_TRUNCATE_VALUES.join(", ")}`,
  })
}

const parseIdeName = ({ value, ctx, keyPath }: FieldInput): IdeName | null => {
  if (value === null) {
    return null
  }
  if (isOneOf(SUPPORTED_IDE_NAMES, value)) {
    return value
  }
  return throwInvalidConfig({
    file: ctx.file,
    keyPath: toKeyPath(keyPath),
    reason: `must be null or one of: ${SUPPORTED_IDE_NAMES.join(", ")}`,
  })
}

const validatePartialConfig = ({
  rawConfig,
  ctx,
}: {
  readonly rawConfig: unknown
  readonly ctx: ValidationContext
}): PartialConfig => {
  if (rawConfig === null || rawConfig === undefined) {
    return {}
  }
  const root = expectSection({
    value: rawConfig,
    ctx,
    keyPath: [],
    allowedKeys: ["paths", "git", "hooks", "locks", "ide", "list"],
  })

  const partial: PartialConfig = {}

  if (root.paths !== undefined) {
    const paths = expectSection({
      value: root.paths,
      ctx,
      keyPath: ["paths"],
      allowedKeys: ["basePath", "statusFile", "hooksDir"],
    })
    partial.paths = {}
    if (paths.basePath !== undefined) {
      partial.paths.basePath = parseNonEmptyString({ value: paths.basePath, ctx, keyPath: ["paths", "basePath"] })
    }
    if (paths.statusFile !== undefined) {
      partial.paths.statusFile = parseNonEmptyString({ value: paths.statusFile, ctx, keyPath: ["paths", "statusFile"] })
    }
    if (paths.hooksDir !== undefined) {
      partial.paths.hooksDir = parseNonEmptyString({ value: paths.hooksDir, ctx, keyPath: ["paths", "hooksDir"] })
    }
  }

  if (root.git !== undefined) {
    const git = expectSection({ value: root.git, ctx, keyPath: ["git"], allowedKeys: ["defaultRemote"] })
    partial.git = {}
    if (git.defaultRemote !== undefined) {
      partial.git.defaultRemote = parseNonEmptyString({
        value: git.defaultRemote,
        ctx,
        keyPath: ["git", "defaultRemote"],
      })
    }
  }

  if (root.hooks !== undefined) {
    const hooks = expectSection({ value: root.hooks, ctx, keyPath: ["hooks"], allowedKeys: ["enabled", "timeoutMs"] })
    partial.hooks = {}
    if (hooks.enabled !== undefined) {
      partial.hooks.enabled = parseBoolean({ value: hooks.enabled, ctx, keyPath: ["hooks", "enabled"] })
    }
    if (hooks.timeoutMs !== undefined) {
      partial.hooks.timeoutMs = parsePositiveInteger({ value: hooks.timeoutMs, ctx, keyPath: ["hooks", "timeoutMs"] })
    }
  }

  if (root.locks !== undefined) {
    const locks = expectSection({
      value: root.locks,
      ctx,
      keyPath: ["locks"],
      allowedKeys: ["timeoutMs", "staleLockTTLSeconds"],
    })
    partial.locks = {}
    if (locks.timeoutMs !== undefined) {
      partial.locks.timeoutMs = parsePositiveInteger({ value: locks.timeoutMs, ctx, keyPath: ["locks", "timeoutMs"] })
    }
    if (locks.staleLockTTLSeconds !== undefined) {
      partial.locks.staleLockTTLSeconds = parsePositiveInteger({
        value: locks.staleLockTTLSeconds,
        ctx,
        keyPath: ["locks", "staleLockTTLSeconds"],
      })
    }
  }

  if (root.ide !== undefined) {
    const ide = expectSection({ value: root.ide, ctx, keyPath: ["ide"], allowedKeys: ["default"] })
    partial.ide = {}
    if (ide.default !== undefined) {
      partial.ide.default = parseIdeName({ value: ide.default, ctx, keyPath: ["ide", "default"] })
    }
  }

  if (root.list !== undefined) {
    const list = expectSection({ value: root.list, ctx, keyPath: ["list"], allowedKeys: ["table"] })
    partial.list = {}
    if (list.table !== undefined) {
      const table = expectSection({
        value: list.table,
        ctx,
        keyPath: ["list", "table"],
        allowedKeys: ["columns", "path"],
      })
      partial.list.table = {}
      if (table.columns !== undefined) {
        partial.list.table.columns = parseColumns({ value: table.columns, ctx, keyPath: ["list", "table", "columns"] })
      }
      if (table.path !== undefined) {
        const pathConfig = expectSection({
          value: table.path,
          ctx,
          keyPath: ["list", "table", "path"],
          allowedKeys: ["truncate", "minWidth"],
        })
        partial.list.table.path = {}
        if (pathConfig.truncate !== undefined) {
          partial.list.table.path.truncate = parseListPathTruncate({
            value: pathConfig.truncate,
            ctx,
            keyPath: ["list", "table", "path", "truncate"],
          })
        }
        if (pathConfig.minWidth !== undefined) {
          const minWidth = parsePositiveInteger({
            value: pathConfig.minWidth,
            ctx,
            keyPath: ["list", "table", "path", "minWidth"],
          })
          if (minWidth < 8 || minWidth > 200) {
            throwInvalidConfig({
              file: ctx.file,
              keyPath: toKeyPath(["list", "table", "path", "minWidth"]),
              reason: "must be in range 8..200",
            })
          }
          partial.list.table.path.minWidth = minWidth
        }
      }
    }
  }

  return partial
}

/** Expands `~` and resolves relative paths against the directory of the config file. */
export const expandConfigPath = ({
  value,
  homeDir,
  baseDir,
}: {
  readonly value: string
  readonly homeDir: string
  readonly baseDir: string
}): string => {
  if (value === "~") {
    return homeDir
  }
  if (value.startsWith("~/")) {
    return join(homeDir, value.slice(2))
  }
  return isAbsolute(value) ? resolve(value) : resolve(baseDir, value)
}

const mergeConfig = ({
  base,
  partial,
  expandPath,
}: {
  readonly base: ResolvedConfig
  readonly partial: PartialConfig
  readonly expandPath: (value: string) => string
}): ResolvedConfig => {
  const pathOr = (value: string | undefined, fallback: string): string => {
    return value === undefined ? fallback : expandPath(value)
  }
  return {
    paths: {
      basePath: pathOr(partial.paths?.basePath, base.paths.basePath),
      statusFile: pathOr(partial.paths?.statusFile, base.paths.statusFile),
      hooksDir: pathOr(partial.paths?.hooksDir, base.paths.hooksDir),
    },
    git: {
      defaultRemote: partial.git?.defaultRemote ?? base.git.defaultRemote,
    },
    hooks: {
      enabled: partial.hooks?.enabled ?? base.hooks.enabled,
      timeoutMs: partial.hooks?.timeoutMs ?? base.hooks.timeoutMs,
    },
    locks: {
      timeoutMs: partial.locks?.timeoutMs ?? base.locks.timeoutMs,
      staleLockTTLSeconds: partial.locks?.staleLockTTLSeconds ?? base.locks.staleLockTTLSeconds,
    },
    ide: {
      default: partial.ide?.default === undefined ? base.ide.default : partial.ide.default,
    },
    list: {
      table: {
        columns: partial.list?.table?.columns ? [...partial.list.table.columns] : [...base.list.table.columns],
        path: {
          truncate: partial.list?.table?.path?.truncate ?? base.list.table.path.truncate,
          minWidth: partial.list?.table?.path?.minWidth ?? base.list.table.path.minWidth,
        },
      },
    },
  }
}

export const resolveGlobalConfigPath = ({
  env,
  homeDir,
}: {
  readonly env: NodeJS.ProcessEnv
  readonly homeDir: string
}): string => {
  const xdgConfigHome = env.XDG_CONFIG_HOME
  if (typeof xdgConfigHome === "string" && xdgConfigHome.length > 0) {
    return join(resolve(xdgConfigHome), ...GLOBAL_CONFIG_PATH_SEGMENTS)
  }
  return join(homeDir, ".config", ...GLOBAL_CONFIG_PATH_SEGMENTS)
}

const readConfigFile = async ({
  file,
  required,
}: {
  readonly file: string
  readonly required: boolean
}): Promise<string | null> => {
  try {
    return await readFile(file, "utf8")
  } catch (error) {
    if (readErrnoCode(error) === "ENOENT" && required !== true) {
      return null
    }
    return throwInvalidConfig({
      file,
      keyPath: "<root>",
      reason: readErrnoCode(error) === "ENOENT" ? "file not found" : "file is not readable",
    })
  }
}

const parseConfigContent = ({ file, content }: { readonly file: string; readonly content: string }): PartialConfig => {
  let parsed: unknown
  try {
    parsed = parse(content)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throwInvalidConfig({
      file,
      keyPath: "<root>",
      reason: message,
    })
  }
  return validatePartialConfig({
    rawConfig: parsed,
    ctx: { file },
  })
}

export const loadResolvedConfig = async ({
  explicitPath,
  env = process.env,
  homeDir = homedir(),
}: LoadResolvedConfigInput = {}): Promise<LoadResolvedConfigResult> => {
  const defaults = createDefaultConfig(homeDir)
  const envPath = env.ARBOR_CONFIG
  const requestedPath = explicitPath ?? (typeof envPath === "string" && envPath.length > 0 ? envPath : undefined)
  const file =
    requestedPath === undefined
      ? resolveGlobalConfigPath({ env, homeDir })
      : expandConfigPath({ value: requestedPath, homeDir, baseDir: process.cwd() })

  const content = await readConfigFile({ file, required: requestedPath !== undefined })
  if (content === null) {
    return { config: defaults, loadedFile: null }
  }

  const partial = parseConfigContent({ file, content })
  const baseDir = dirname(file)
  return {
    config: mergeConfig({
      base: defaults,
      partial,
      expandPath: (value) => expandConfigPath({ value, homeDir, baseDir }),
    }),
    loadedFile: file,
  }
}
