import { resolve } from "node:path"
import { SUPPORTED_IDE_NAMES, type IdeName } from "../config/types"
import { createCliError } from "../core/errors"
import type { FileSystem } from "../utils/fs"
import type { Logger } from "../utils/logger"

export type IdeLauncher = {
  readonly name: IdeName
  isInstalled: () => Promise<boolean>
  openRepository: (path: string) => Promise<void>
}

export type IdeRegistry = {
  get: (name: string) => IdeLauncher
  open: (name: string, path: string) => Promise<void>
}

const isIdeName = (name: string): name is IdeName => {
  return SUPPORTED_IDE_NAMES.some((candidate) => candidate === name)
}

// A trailing slash makes the editor open a new window for a directory.
const toOpenTarget = (path: string): string => {
  const absolute = resolve(path)
  return absolute.endsWith(".code-workspace") || absolute.endsWith("/") ? absolute : `${absolute}/`
}

const createCommandLauncher = ({
  name,
  command,
  fs,
}: {
  readonly name: IdeName
  readonly command: string
  readonly fs: FileSystem
}): IdeLauncher => {
  return {
    name,
    isInstalled: async () => (await fs.which(command)) !== null,
    openRepository: async (path) => {
      await fs.executeCommand({ command, args: [toOpenTarget(path)] })
    },
  }
}

export const createIdeRegistry = ({
  fs,
  logger,
}: {
  readonly fs: FileSystem
  readonly logger?: Logger
}): IdeRegistry => {
  const launchers: Readonly<Record<IdeName, IdeLauncher>> = {
    cursor: createCommandLauncher({ name: "cursor", command: "cursor", fs }),
    vscode: createCommandLauncher({ name: "vscode", command: "code", fs }),
    vscodium: createCommandLauncher({ name: "vscodium", command: "codium", fs }),
    dummy: {
      name: "dummy",
      isInstalled: async () => true,
      openRepository: async (path) => {
        logger?.info(`dummy IDE path: ${toOpenTarget(path)}`)
      },
    },
  }

  const get = (name: string): IdeLauncher => {
    if (!isIdeName(name)) {
      throw createCliError("UNSUPPORTED_IDE", {
        message: `Unsupported IDE: ${name}`,
        details: { ide: name, supported: [...SUPPORTED_IDE_NAMES] },
      })
    }
    return launchers[name]
  }

  return {
    get,
    open: async (name, path) => {
      const launcher = get(name)
      if ((await launcher.isInstalled()) !== true) {
        throw createCliError("IDE_NOT_INSTALLED", {
          message: `IDE is not installed: ${name}`,
          details: { ide: name },
        })
      }
      logger?.debug(`opening ${toOpenTarget(path)} with ${name}`)
      await launcher.openRepository(path)
    },
  }
}
