import { constants as fsConstants } from "node:fs"
import { access, mkdtemp, readFile, rm, symlink, utimes, writeFile } from "node:fs/promises"
import { hostname, tmpdir } from "node:os"
import { join } from "node:path"
import { afterEach, describe, expect, it } from "vitest"
import { acquireFileLock, lockPathFor, withFileLock } from "./file-lock"

const tempDirs = new Set<string>()

const createTargetPath = async (): Promise<string> => {
  const dir = await mkdtemp(join(tmpdir(), "arbor-file-lock-"))
  tempDirs.add(dir)
  return join(dir, "status.yaml")
}

const exists = async (path: string): Promise<boolean> => {
  try {
    await access(path, fsConstants.F_OK)
    return true
  } catch {
    return false
  }
}

const writeLockPayload = async ({
  targetPath,
  pid,
  startedAt,
}: {
  readonly targetPath: string
  readonly pid: number
  readonly startedAt: string
}): Promise<void> => {
  await writeFile(
    lockPathFor(targetPath),
    `${JSON.stringify({
      schemaVersion: 1,
      owner: "arbor",
      operation: "held-elsewhere",
      pid,
      host: hostname(),
      startedAt,
    })}\n`,
    "utf8",
  )
}

afterEach(async () => {
  await Promise.all(
    [...tempDirs].map(async (dir) => {
      await rm(dir, { recursive: true, force: true })
    }),
  )
  tempDirs.clear()
})

describe("acquireFileLock", () => {
  it("creates the sibling lock file and removes it on release", async () => {
    const targetPath = await createTargetPath()
    const lockPath = `${targetPath}.lock`

    const lock = await acquireFileLock({ targetPath, operation: "addWorktree", timeoutMs: 200 })

    expect(lock.path).toBe(lockPath)
    expect(await readFile(lockPath, "utf8")).toContain('"operation":"addWorktree"')

    await lock.release()
    expect(await exists(lockPath)).toBe(false)
  })

  it("recovers a stale lock left by a dead process", async () => {
    const targetPath = await createTargetPath()
    await writeLockPayload({
      targetPath,
      pid: 999_999,
      startedAt: new Date(Date.now() - 60_000).toISOString(),
    })

    const lock = await acquireFileLock({
      targetPath,
      operation: "removeWorktree",
      timeoutMs: 300,
      staleLockTTLSeconds: 1,
    })

    expect(await readFile(lock.path, "utf8")).toContain('"operation":"removeWorktree"')
    await lock.release()
  })

  it("recovers unparsable lock metadata once the file is older than the ttl", async () => {
    const targetPath = await createTargetPath()
    await writeFile(lockPathFor(targetPath), "not-json", "utf8")
    const anHourAgo = new Date(Date.now() - 3_600_000)
    await utimes(lockPathFor(targetPath), anHourAgo, anHourAgo)

    const lock = await acquireFileLock({ targetPath, operation: "repair", timeoutMs: 300, staleLockTTLSeconds: 60 })

    expect(await readFile(lock.path, "utf8")).toContain('"operation":"repair"')
    await lock.release()
  })

  it("leaves a fresh empty lock file to its writer", async () => {
    const targetPath = await createTargetPath()
    await writeFile(lockPathFor(targetPath), "", "utf8")

    await expect(acquireFileLock({ targetPath, operation: "blocked", timeoutMs: 300 })).rejects.toMatchObject({
      code: "LOCK_TIMEOUT",
    })
    expect(await readFile(lockPathFor(targetPath), "utf8")).toBe("")
  })

  it("times out while a live process holds the lock", async () => {
    const targetPath = await createTargetPath()
    await writeLockPayload({
      targetPath,
      pid: process.pid,
      startedAt: new Date().toISOString(),
    })

    await expect(
      acquireFileLock({ targetPath, operation: "blocked", timeoutMs: 150, staleLockTTLSeconds: 0 }),
    ).rejects.toMatchObject({
      code: "LOCK_TIMEOUT",
    })
  })

  it("does not recover a lock before its ttl expires", async () => {
    const targetPath = await createTargetPath()
    await writeLockPayload({
      targetPath,
      pid: 999_999,
      startedAt: new Date().toISOString(),
    })

    await expect(
      acquireFileLock({ targetPath, operation: "blocked", timeoutMs: 150, staleLockTTLSeconds: 3_600 }),
    ).rejects.toMatchObject({
      code: "LOCK_TIMEOUT",
    })
  })

  it("keeps polling when the lock path cannot be read", async () => {
    const targetPath = await createTargetPath()
    await symlink("/path/that/does/not/exist", lockPathFor(targetPath))

    await expect(acquireFileLock({ targetPath, operation: "blocked", timeoutMs: 120 })).rejects.toMatchObject({
      code: "LOCK_TIMEOUT",
    })
  })
})

describe("withFileLock", () => {
  it("releases the lock when the task throws", async () => {
    const targetPath = await createTargetPath()

    await expect(
      withFileLock({ targetPath, operation: "failing", timeoutMs: 200 }, async () => {
        throw new Error("task failed")
      }),
    ).rejects.toThrow("task failed")

    expect(await exists(lockPathFor(targetPath))).toBe(false)
  })

  it("serializes concurrent tasks on the same target", async () => {
    const targetPath = await createTargetPath()
    const events: string[] = []

    const runTask = async (name: string): Promise<void> => {
      await withFileLock({ targetPath, operation: name, timeoutMs: 2_000 }, async () => {
        events.push(`${name}:start`)
        await new Promise<void>((resolve) => {
          setTimeout(resolve, 30)
        })
        events.push(`${name}:end`)
      })
    }

    await Promise.all([runTask("a"), runTask("b")])

    expect(events).toHaveLength(4)
    expect(events[0]?.endsWith(":start")).toBe(true)
    expect(events[1]).toBe(events[0]?.replace(":start", ":end"))
  })
})
