import { join } from "node:path"
import {
  DEFAULT_HOOK_TIMEOUT_MS,
  DEFAULT_LOCK_TIMEOUT_MS,
  DEFAULT_REMOTE,
  DEFAULT_STALE_LOCK_TTL_SECONDS,
} from "../core/constants"

export const LIST_TABLE_COLUMNS = ["repository", "branch", "remote", "workspace", "path"] as const

export const LIST_PATH_TRUNCATE_VALUES = ["auto", "never"] as const
export const SUPPORTED_IDE_NAMES = ["cursor", "vscode", "vscodium", "dummy"] as const

export type ListTableColumn = (typeof LIST_TABLE_COLUMNS)[number]
export type ListPathTruncate = (typeof LIST_PATH_TRUNCATE_VALUES)[number]
export type IdeName = (typeof SUPPORTED_IDE_NAMES)[number]

export type ResolvedConfig = {
  readonly paths: {
    readonly basePath: string
    readonly statusFile: string
    readonly hooksDir: string
  }
  readonly git: {
    readonly defaultRemote: string
  }
  readonly hooks: {
    readonly enabled: boolean
    readonly timeoutMs: number
  }
  readonly locks: {
    readonly timeoutMs: number
    readonly staleLockTTLSeconds: number
  }
  readonly ide: {
    readonly default: IdeName | null
  }
  readonly list: {
    readonly table: {
      readonly columns: ReadonlyArray<ListTableColumn>
      readonly path: {
        readonly truncate: ListPathTruncate
        readonly minWidth: number
      }
    }
  }
}

export type DeepPartial<T> = {
  -readonly [K in keyof T]?: T[K] extends ReadonlyArray<infer U>
    ? ReadonlyArray<U>
    : T[K] extends object
      ? DeepPartial<T[K]>
      : T[K]
}

export type PartialConfig = DeepPartial<ResolvedConfig>

export const createDefaultConfig = (homeDir: string): ResolvedConfig => {
  return {
    paths: {
      basePath: join(homeDir, "Code"),
      statusFile: join(homeDir, ".arbor", "status.yaml"),
      hooksDir: join(homeDir, ".arbor", "hooks"),
    },
    git: {
      defaultRemote: DEFAULT_REMOTE,
    },
    hooks: {
      enabled: true,
      timeoutMs: DEFAULT_HOOK_TIMEOUT_MS,
    },
    locks: {
      timeoutMs: DEFAULT_LOCK_TIMEOUT_MS,
      staleLockTTLSeconds: DEFAULT_STALE_LOCK_TTL_SECONDS,
    },
    ide: {
      default: null,
    },
    list: {
      table: {
        columns: [...LIST_TABLE_COLUMNS],
        path: {
          truncate: "auto",
          minWidth: 12,
        },
      },
    },
  }
}
