import { chmod, mkdir, readFile, stat, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { afterEach, describe, expect, it } from "vitest"
import { cleanupRepoFixtures, createTempRoot } from "../test-utils/repo-fixture"
import { createFileSystem } from "./fs"

afterEach(async () => {
  await cleanupRepoFixtures()
})

describe("createFileSystem", () => {
  it("reports existence and directories", async () => {
    const root = await createTempRoot()
    const fs = createFileSystem()
    await writeFile(join(root, "file.txt"), "x", "utf8")

    await expect(fs.exists(join(root, "file.txt"))).resolves.toBe(true)
    await expect(fs.exists(join(root, "missing"))).resolves.toBe(false)
    await expect(fs.isDirectory(root)).resolves.toBe(true)
    await expect(fs.isDirectory(join(root, "file.txt"))).resolves.toBe(false)
    await expect(fs.isDirectory(join(root, "file.txt", "child"))).resolves.toBe(false)
  })

  it("writes files atomically into missing directories", async () => {
    const root = await createTempRoot()
    const fs = createFileSystem()
    const target = join(root, "generated", "team-main.code-workspace")

    await fs.writeFileAtomic(target, '{\n  "folders": []\n}\n')

    expect(await readFile(target, "utf8")).toBe('{\n  "folders": []\n}\n')
    expect((await stat(target)).mode & 0o777).toBe(0o644)
  })

  it("creates and removes directory trees", async () => {
    const root = await createTempRoot()
    const fs = createFileSystem()
    const nested = join(root, "a", "b", "c")

    await fs.mkdirAll(nested)
    await expect(fs.isDirectory(nested)).resolves.toBe(true)
    await fs.removeAll(join(root, "a"))
    await expect(fs.exists(join(root, "a"))).resolves.toBe(false)
    await expect(fs.removeAll(join(root, "a"))).resolves.toBeUndefined()
  })

  it("copies a file byte for byte", async () => {
    const root = await createTempRoot()
    const fs = createFileSystem()
    await writeFile(join(root, "key"), "test-secret", "utf8")

    await fs.copyFile(join(root, "key"), join(root, "copy"))

    expect(await readFile(join(root, "copy"), "utf8")).toBe("test-secret")
  })

  it("finds executables on PATH only", async () => {
    const root = await createTempRoot()
    const binDir = join(root, "bin")
    await mkdir(binDir, { recursive: true })
    await writeFile(join(binDir, "fake-ide"), "#!/bin/sh\nexit 0\n", "utf8")
    await chmod(join(binDir, "fake-ide"), 0o755)
    await writeFile(join(binDir, "plain-file"), "data", "utf8")
    const fs = createFileSystem({ env: { PATH: `/nonexistent-dir:${binDir}` } })

    await expect(fs.which("fake-ide")).resolves.toBe(join(binDir, "fake-ide"))
    await expect(fs.which("plain-file")).resolves.toBeNull()
    await expect(fs.which("missing-tool")).resolves.toBeNull()
    await expect(fs.which(join(binDir, "fake-ide"))).resolves.toBe(join(binDir, "fake-ide"))
  })

  it("wraps failing commands as CHILD_PROCESS_FAILED", async () => {
    const root = await createTempRoot()
    const fs = createFileSystem()
    const script = join(root, "fail.sh")
    await writeFile(script, "#!/bin/sh\nexit 3\n", "utf8")
    await chmod(script, 0o755)

    await expect(fs.executeCommand({ command: script, args: [], cwd: root })).rejects.toMatchObject({
      code: "CHILD_PROCESS_FAILED",
      details: { command: script, cwd: root },
    })
  })
})
