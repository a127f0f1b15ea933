import { readFile, rm, stat } from "node:fs/promises"
import { hostname } from "node:os"
import { writeFileExclusively } from "./atomic-file"
import { DEFAULT_LOCK_TIMEOUT_MS, DEFAULT_STALE_LOCK_TTL_SECONDS } from "./constants"
import { createCliError, readErrnoCode } from "./errors"

const LOCK_OWNER = "arbor"
const LOCK_POLL_INTERVAL_MS = 50

type LockFileSchema = {
  readonly schemaVersion: 1
  readonly owner: string
  readonly operation: string
  readonly pid: number
  readonly host: string
  readonly startedAt: string
}

export type AcquireFileLockOptions = {
  /** File being guarded; the lock lives at `<targetPath>.lock`. */
  readonly targetPath: string
  readonly operation: string
  readonly timeoutMs?: number
  readonly staleLockTTLSeconds?: number
}

export type ScopedLock = {
  readonly path: string
  release: () => Promise<void>
}

const sleep = async (ms: number): Promise<void> => {
  await new Promise<void>((resolve) => {
    setTimeout(resolve, ms)
  })
}

export const lockPathFor = (targetPath: string): string => {
  return `${targetPath}.lock`
}

const isProcessAlive = (pid: number): boolean => {
  if (pid <= 0 || Number.isFinite(pid) !== true) {
    return false
  }

  try {
    process.kill(pid, 0)
    return true
  } catch (error) {
    return readErrnoCode(error) !== "ESRCH"
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return value !== null && typeof value === "object" && Array.isArray(value) !== true
}

const safeParseLockFile = (content: string): LockFileSchema | null => {
  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch {
    return null
  }
  if (!isRecord(parsed) || parsed.schemaVersion !== 1) {
    return null
  }
  const { owner, operation, pid, host, startedAt } = parsed
  if (typeof owner !== "string" || typeof operation !== "string") {
    return null
  }
  if (typeof pid !== "number" || typeof host !== "string" || typeof startedAt !== "string") {
    return null
  }
  return { schemaVersion: 1, owner, operation, pid, host, startedAt }
}

const buildLockPayload = (operation: string): LockFileSchema => {
  return {
    schemaVersion: 1,
    owner: LOCK_OWNER,
    operation,
    pid: process.pid,
    host: hostname(),
    startedAt: new Date().toISOString(),
  }
}

const isPastTTL = (startedAtMs: number, staleLockTTLSeconds: number): boolean => {
  return startedAtMs + staleLockTTLSeconds * 1000 <= Date.now()
}

// Unreadable metadata falls back to the file's mtime, so a lock is never taken over before its TTL.
const canRecoverStaleLock = ({
  lock,
  modifiedAtMs,
  staleLockTTLSeconds,
}: {
  readonly lock: LockFileSchema | null
  readonly modifiedAtMs: number
  readonly staleLockTTLSeconds: number
}): boolean => {
  const startedAtMs = lock === null ? Number.NaN : Date.parse(lock.startedAt)
  if (lock === null || Number.isFinite(startedAtMs) !== true) {
    return isPastTTL(modifiedAtMs, staleLockTTLSeconds)
  }

  if (isPastTTL(startedAtMs, staleLockTTLSeconds) !== true) {
    return false
  }

  return (lock.host === hostname() && isProcessAlive(lock.pid)) !== true
}

/**
 * Exclusive advisory lock on a sibling `.lock` file, which only ever appears with its metadata
 * written. Acquisition polls until `timeoutMs`; a lock whose TTL expired and whose owning process
 * is gone is removed and retried.
 */
export const acquireFileLock = async ({
  targetPath,
  operation,
  timeoutMs = DEFAULT_LOCK_TIMEOUT_MS,
  staleLockTTLSeconds = DEFAULT_STALE_LOCK_TTL_SECONDS,
}: AcquireFileLockOptions): Promise<ScopedLock> => {
  const path = lockPathFor(targetPath)
  const startAt = Date.now()
  const content = `${JSON.stringify(buildLockPayload(operation))}\n`

  while (Date.now() - startAt <= timeoutMs) {
    if (await writeFileExclusively({ path, content })) {
      let released = false
      return {
        path,
        release: async (): Promise<void> => {
          if (released) {
            return
          }
          released = true
          await rm(path, { force: true })
        },
      }
    }

    let lockContent: string
    let modifiedAtMs: number
    try {
      lockContent = await readFile(path, "utf8")
      modifiedAtMs = (await stat(path)).mtimeMs
    } catch {
      // released (or unreadable) between our create attempt and this read
      await sleep(LOCK_POLL_INTERVAL_MS)
      continue
    }

    if (canRecoverStaleLock({ lock: safeParseLockFile(lockContent), modifiedAtMs, staleLockTTLSeconds })) {
      try {
        await rm(path, { force: true })
      } catch (error) {
        throw createCliError("LOCK_STALE_RECOVERY_FAILED", {
          message: "Failed to recover stale status lock",
          details: { path },
          cause: error,
        })
      }
      continue
    }

    await sleep(LOCK_POLL_INTERVAL_MS)
  }

  throw createCliError("LOCK_TIMEOUT", {
    message: `Timed out while acquiring lock: ${path}`,
    details: { path, timeoutMs },
  })
}

export const withFileLock = async <T>(options: AcquireFileLockOptions, task: () => Promise<T>): Promise<T> => {
  const lock = await acquireFileLock(options)
  try {
    return await task()
  } finally {
    await lock.release()
  }
}
