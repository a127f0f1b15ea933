import { link, mkdtemp, readdir, readFile, rename, rm, stat, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { afterEach, describe, expect, it, vi } from "vitest"
import { readTextFileIfExists, writeFileAtomically, writeFileExclusively } from "./atomic-file"

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>()
  return {
    ...actual,
    rename: vi.fn(actual.rename),
    link: vi.fn(actual.link),
  }
})

const tempDirs = new Set<string>()

const createTempDir = async (): Promise<string> => {
  const dir = await mkdtemp(join(tmpdir(), "arbor-atomic-file-"))
  tempDirs.add(dir)
  return dir
}

afterEach(async () => {
  await Promise.all(
    [...tempDirs].map(async (dir) => {
      await rm(dir, { recursive: true, force: true })
    }),
  )
  tempDirs.clear()
})

describe("writeFileAtomically", () => {
  it("replaces the target and leaves no temp file behind", async () => {
    const dir = await createTempDir()
    const filePath = join(dir, "status.yaml")
    await writeFile(filePath, "old\n", "utf8")

    await writeFileAtomically({ filePath, content: "new\n" })

    expect(await readFile(filePath, "utf8")).toBe("new\n")
    expect(await readdir(dir)).toEqual(["status.yaml"])
    expect((await stat(filePath)).mode & 0o777).toBe(0o600)
  })

  it("creates missing parent directories when ensureDir is set", async () => {
    const dir = await createTempDir()
    const filePath = join(dir, "nested", "deeper", "file.json")

    await writeFileAtomically({ filePath, content: "{}\n", ensureDir: true })

    expect(await readFile(filePath, "utf8")).toBe("{}\n")
  })

  it("keeps the original bytes when the process fails before rename", async () => {
    const dir = await createTempDir()
    const filePath = join(dir, "status.yaml")
    await writeFileAtomically({ filePath, content: "repositories: {}\n" })
    vi.mocked(rename).mockRejectedValueOnce(new Error("simulated crash"))

    await expect(writeFileAtomically({ filePath, content: "workspaces: {}\n" })).rejects.toThrow("simulated crash")

    expect(await readFile(filePath, "utf8")).toBe("repositories: {}\n")
    expect(await readdir(dir)).toEqual(["status.yaml"])
  })
})

describe("readTextFileIfExists", () => {
  it("returns null for a missing file", async () => {
    const dir = await createTempDir()
    expect(await readTextFileIfExists(join(dir, "missing.yaml"))).toBeNull()
  })
})

describe("writeFileExclusively", () => {
  it("creates a file once and reports false when it already exists", async () => {
    const dir = await createTempDir()
    const path = join(dir, "status.yaml.lock")

    expect(await writeFileExclusively({ path, content: "first" })).toBe(true)
    expect(await writeFileExclusively({ path, content: "second" })).toBe(false)
    expect(await readFile(path, "utf8")).toBe("first")
    expect(await readdir(dir)).toEqual(["status.yaml.lock"])
  })

  it("never leaves an empty file at the path", async () => {
    const dir = await createTempDir()
    const path = join(dir, "status.yaml.lock")
    vi.mocked(link).mockRejectedValueOnce(Object.assign(new Error("disk full"), { code: "ENOSPC" }))

    await expect(writeFileExclusively({ path, content: "first" })).rejects.toThrow("disk full")

    expect(await readdir(dir)).toEqual([])
  })
})
