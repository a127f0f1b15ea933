import { describe, expect, it, vi } from "vitest"
import type { FileSystem } from "../utils/fs"
import { createIdeRegistry } from "./ide"

const createFakeFileSystem = (installed: ReadonlyArray<string>): FileSystem => {
  return {
    exists: vi.fn(async () => false),
    isDirectory: vi.fn(async () => false),
    readFile: vi.fn(async () => ""),
    writeFileAtomic: vi.fn(async () => undefined),
    mkdirAll: vi.fn(async () => undefined),
    copyFile: vi.fn(async () => undefined),
    removeAll: vi.fn(async () => undefined),
    which: vi.fn(async (command: string) => (installed.includes(command) ? `/usr/bin/${command}` : null)),
    executeCommand: vi.fn(async () => undefined),
  }
}

describe("createIdeRegistry", () => {
  it("opens vscode through the code binary with a trailing slash", async () => {
    const fs = createFakeFileSystem(["code"])
    const registry = createIdeRegistry({ fs })

    await registry.open("vscode", "/code/app/origin/feature-x")

    expect(fs.executeCommand).toHaveBeenCalledWith({ command: "code", args: ["/code/app/origin/feature-x/"] })
  })

  it("opens vscodium through the codium binary", async () => {
    const fs = createFakeFileSystem(["codium"])
    const registry = createIdeRegistry({ fs })

    await expect(registry.get("vscodium").isInstalled()).resolves.toBe(true)
    await registry.open("vscodium", "/code/app/origin/main")

    expect(fs.executeCommand).toHaveBeenCalledWith({ command: "codium", args: ["/code/app/origin/main/"] })
  })

  it("passes workspace files through unchanged", async () => {
    const fs = createFakeFileSystem(["cursor"])
    const registry = createIdeRegistry({ fs })

    await registry.open("cursor", "/home/me/.arbor/workspaces/team-main.code-workspace")

    expect(fs.executeCommand).toHaveBeenCalledWith({
      command: "cursor",
      args: ["/home/me/.arbor/workspaces/team-main.code-workspace"],
    })
  })

  it("rejects unknown IDE names", async () => {
    const registry = createIdeRegistry({ fs: createFakeFileSystem([]) })

    expect(() => registry.get("emacs")).toThrowError("Unsupported IDE: emacs")
    await expect(registry.open("emacs", "/tmp")).rejects.toMatchObject({ code: "UNSUPPORTED_IDE" })
  })

  it("fails when the binary is not on PATH", async () => {
    const fs = createFakeFileSystem([])
    const registry = createIdeRegistry({ fs })

    await expect(registry.open("cursor", "/tmp/wt")).rejects.toMatchObject({
      code: "IDE_NOT_INSTALLED",
      details: { ide: "cursor" },
    })
    expect(fs.executeCommand).not.toHaveBeenCalled()
  })

  it("treats the dummy IDE as always installed and runs nothing", async () => {
    const fs = createFakeFileSystem([])
    const registry = createIdeRegistry({ fs })

    await expect(registry.get("dummy").isInstalled()).resolves.toBe(true)
    await registry.open("dummy", "/tmp/wt")

    expect(fs.executeCommand).not.toHaveBeenCalled()
    expect(fs.which).not.toHaveBeenCalled()
  })
})
