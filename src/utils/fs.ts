import { constants as fsConstants } from "node:fs"
import { access, copyFile, mkdir, readFile, rm, stat } from "node:fs/promises"
import { delimiter, isAbsolute, join } from "node:path"
import { execa } from "execa"
import { writeFileAtomically } from "../core/atomic-file"
import { createCliError, readErrnoCode } from "../core/errors"

export type ExecuteCommandInput = {
  readonly command: string
  readonly args: readonly string[]
  readonly cwd?: string
}

export type FileSystem = {
  exists: (path: string) => Promise<boolean>
  isDirectory: (path: string) => Promise<boolean>
  readFile: (path: string) => Promise<string>
  writeFileAtomic: (path: string, content: string) => Promise<void>
  mkdirAll: (path: string) => Promise<void>
  copyFile: (source: string, target: string) => Promise<void>
  removeAll: (path: string) => Promise<void>
  which: (command: string) => Promise<string | null>
  executeCommand: (input: ExecuteCommandInput) => Promise<void>
}

const isExecutableFile = async (path: string): Promise<boolean> => {
  try {
    const info = await stat(path)
    if (info.isFile() !== true) {
      return false
    }
    await access(path, fsConstants.X_OK)
    return true
  } catch {
    return false
  }
}

export const createFileSystem = ({ env = process.env }: { readonly env?: NodeJS.ProcessEnv } = {}): FileSystem => {
  return {
    exists: async (path) => {
      try {
        await access(path, fsConstants.F_OK)
        return true
      } catch {
        return false
      }
    },
    isDirectory: async (path) => {
      try {
        return (await stat(path)).isDirectory()
      } catch (error) {
        if (readErrnoCode(error) === "ENOENT" || readErrnoCode(error) === "ENOTDIR") {
          return false
        }
        throw error
      }
    },
    readFile: async (path) => readFile(path, "utf8"),
    writeFileAtomic: async (path, content) => {
      await writeFileAtomically({ filePath: path, content, mode: 0o644, ensureDir: true })
    },
    mkdirAll: async (path) => {
      await mkdir(path, { recursive: true })
    },
    copyFile: async (source, target) => {
      await copyFile(source, target)
    },
    removeAll: async (path) => {
      await rm(path, { recursive: true, force: true })
    },
    which: async (command) => {
      if (command.includes("/")) {
        return isAbsolute(command) && (await isExecutableFile(command)) ? command : null
      }
      const directories = (env.PATH ?? "").split(delimiter).filter((directory) => directory.length > 0)
      for (const directory of directories) {
        const candidate = join(directory, command)
        if (await isExecutableFile(candidate)) {
          return candidate
        }
      }
      return null
    },
    executeCommand: async ({ command, args, cwd }) => {
      try {
        await execa(command, [...args], { cwd, stdin: "ignore" })
      } catch (error) {
        throw createCliError("CHILD_PROCESS_FAILED", {
          message: `Failed to run ${command}`,
          details: { command, args: [...args], cwd: cwd ?? null },
          cause: error,
        })
      }
    },
  }
}
