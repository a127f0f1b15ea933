import { link, mkdir, open, readFile, rename, rm } from "node:fs/promises"
import { dirname } from "node:path"
import { readErrnoCode } from "./errors"

const DEFAULT_FILE_MODE = 0o600

let atomicWriteSequence = 0

const nextAtomicWriteSuffix = (): string => {
  atomicWriteSequence += 1
  return `${String(process.pid)}-${process.hrtime.bigint().toString(36)}-${String(atomicWriteSequence)}`
}

export const readTextFileIfExists = async (path: string): Promise<string | null> => {
  try {
    return await readFile(path, "utf8")
  } catch (error) {
    if (readErrnoCode(error) === "ENOENT") {
      return null
    }
    throw error
  }
}

/**
 * Writes `content` next to `filePath` and renames it into place, so readers observe either the
 * previous file or the complete new one. The temp file is flushed before the rename and removed
 * when any step fails.
 */
export const writeFileAtomically = async ({
  filePath,
  content,
  mode = DEFAULT_FILE_MODE,
  ensureDir = false,
}: {
  readonly filePath: string
  readonly content: string
  readonly mode?: number
  readonly ensureDir?: boolean
}): Promise<void> => {
  if (ensureDir) {
    await mkdir(dirname(filePath), { recursive: true })
  }
  const tmpPath = `${filePath}.tmp-${nextAtomicWriteSuffix()}`
  try {
    const handle = await open(tmpPath, "wx", mode)
    try {
      await handle.writeFile(content, "utf8")
      await handle.sync()
      await handle.chmod(mode)
    } finally {
      await handle.close()
    }
    await rename(tmpPath, filePath)
  } catch (error) {
    try {
      await rm(tmpPath, { force: true })
    } catch {
      // the original write error is the one worth reporting
    }
    throw error
  }
}

/**
 * Creates `path` with its full content or not at all: the bytes go to a temp file first, which is
 * then hard-linked to `path`. Returns false when `path` already exists.
 */
export const writeFileExclusively = async ({
  path,
  content,
}: {
  readonly path: string
  readonly content: string
}): Promise<boolean> => {
  const tmpPath = `${path}.tmp-${nextAtomicWriteSuffix()}`
  try {
    const handle = await open(tmpPath, "wx", DEFAULT_FILE_MODE)
    try {
      await handle.writeFile(content, "utf8")
      await handle.sync()
    } finally {
      await handle.close()
    }
    await link(tmpPath, path)
    return true
  } catch (error) {
    if (readErrnoCode(error) === "EEXIST") {
      return false
    }
    throw error
  } finally {
    await rm(tmpPath, { force: true })
  }
}
