import { mkdtemp, mkdir, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { afterEach, describe, expect, it } from "vitest"
import { expandConfigPath, loadResolvedConfig } from "./loader"

const tempDirs = new Set<string>()

const createTempDir = async (prefix: string): Promise<string> => {
  const dir = await mkdtemp(join(tmpdir(), prefix))
  tempDirs.add(dir)
  return dir
}

const writeXdgConfig = async (xdgRoot: string, content: string): Promise<string> => {
  const file = join(xdgRoot, "arbor", "config.yml")
  await mkdir(join(xdgRoot, "arbor"), { recursive: true })
  await writeFile(file, content, "utf8")
  return file
}

afterEach(async () => {
  await Promise.all(
    [...tempDirs].map(async (dir) => {
      await rm(dir, { recursive: true, force: true })
    }),
  )
  tempDirs.clear()
})

describe("loadResolvedConfig", () => {
  it("returns defaults under the home directory when no config file exists", async () => {
    const home = await createTempDir("arbor-config-home-")

    const result = await loadResolvedConfig({ env: {}, homeDir: home })

    expect(result.loadedFile).toBeNull()
    expect(result.config.paths).toEqual({
      basePath: join(home, "Code"),
      statusFile: join(home, ".arbor", "status.yaml"),
      hooksDir: join(home, ".arbor", "hooks"),
    })
    expect(result.config.git.defaultRemote).toBe("origin")
    expect(result.config.ide.default).toBeNull()
    expect(result.config.list.table.columns).toEqual(["repository", "branch", "remote", "workspace", "path"])
    expect(result.config.locks).toEqual({ timeoutMs: 15_000, staleLockTTLSeconds: 1_800 })
  })

  it("reads $XDG_CONFIG_HOME/arbor/config.yml and expands paths", async () => {
    const home = await createTempDir("arbor-config-home-")
    const xdgRoot = await createTempDir("arbor-config-xdg-")
    const file = await writeXdgConfig(
      xdgRoot,
      [
        "paths:",
        "  basePath: ~/src",
        "  statusFile: state/status.yaml",
        "git:",
        "  defaultRemote: upstream",
        "ide:",
        "  default: cursor",
        "list:",
        "  table:",
        "    columns: [branch, path]",
        "",
      ].join("\n"),
    )

    const result = await loadResolvedConfig({ env: { XDG_CONFIG_HOME: xdgRoot }, homeDir: home })

    expect(result.loadedFile).toBe(file)
    expect(result.config.paths.basePath).toBe(join(home, "src"))
    expect(result.config.paths.statusFile).toBe(join(xdgRoot, "arbor", "state", "status.yaml"))
    expect(result.config.paths.hooksDir).toBe(join(home, ".arbor", "hooks"))
    expect(result.config.git.defaultRemote).toBe("upstream")
    expect(result.config.ide.default).toBe("cursor")
    expect(result.config.list.table.columns).toEqual(["branch", "path"])
  })

  it("prefers an explicit path over ARBOR_CONFIG", async () => {
    const home = await createTempDir("arbor-config-home-")
    const envFile = join(home, "env.yml")
    const explicitFile = join(home, "explicit.yml")
    await writeFile(envFile, "hooks:\n  timeoutMs: 1000\n", "utf8")
    await writeFile(explicitFile, "hooks:\n  timeoutMs: 2000\n", "utf8")

    const fromEnv = await loadResolvedConfig({ env: { ARBOR_CONFIG: envFile }, homeDir: home })
    const fromFlag = await loadResolvedConfig({ explicitPath: explicitFile, env: { ARBOR_CONFIG: envFile }, homeDir: home })

    expect(fromEnv.config.hooks.timeoutMs).toBe(1000)
    expect(fromFlag.config.hooks.timeoutMs).toBe(2000)
    expect(fromFlag.loadedFile).toBe(explicitFile)
  })

  it("fails when an explicitly requested file is missing", async () => {
    const home = await createTempDir("arbor-config-home-")

    await expect(
      loadResolvedConfig({ explicitPath: join(home, "missing.yml"), env: {}, homeDir: home }),
    ).rejects.toMatchObject({
      code: "INVALID_CONFIG",
      details: { file: join(home, "missing.yml"), reason: "file not found" },
    })
  })

  it("treats an empty file as defaults", async () => {
    const home = await createTempDir("arbor-config-home-")
    const xdgRoot = await createTempDir("arbor-config-xdg-")
    await writeXdgConfig(xdgRoot, "")

    const result = await loadResolvedConfig({ env: { XDG_CONFIG_HOME: xdgRoot }, homeDir: home })

    expect(result.config.hooks).toEqual({ enabled: true, timeoutMs: 30_000 })
  })

  it.each([
    ["unknown: true\n", "unknown", "unknown key"],
    ["paths:\n  worktreeRoot: x\n", "paths.worktreeRoot", "unknown key"],
    ["hooks:\n  enabled: yes-please\n", "hooks.enabled", "must be boolean"],
    ["locks:\n  timeoutMs: 0\n", "locks.timeoutMs", "must be a positive integer"],
    ["ide:\n  default: emacs\n", "ide.default", "must be null or one of: cursor, vscode, vscodium, dummy"],
    ["list:\n  table:\n    columns: []\n", "list.table.columns", "must not be empty"],
    ["list:\n  table:\n    columns: [branch, branch]\n", "list.table.columns.1", "duplicate column: branch"],
    ["list:\n  table:\n    columns: [dirty]\n", "list.table.columns.0", "unsupported column: dirty"],
    ["list:\n  table:\n    path:\n      minWidth: 4\n", "list.table.path.minWidth", "must be in range 8..200"],
    ["- a\n- b\n", "<root>", "must be an object"],
  ])("rejects %j", async (content, keyPath, reason) => {
    const home = await createTempDir("arbor-config-home-")
    const xdgRoot = await createTempDir("arbor-config-xdg-")
    const file = await writeXdgConfig(xdgRoot, content)

    await expect(loadResolvedConfig({ env: { XDG_CONFIG_HOME: xdgRoot }, homeDir: home })).rejects.toMatchObject({
      code: "INVALID_CONFIG",
      message: `Invalid config: ${file} (${keyPath}: ${reason})`,
    })
  })
})

describe("expandConfigPath", () => {
  it("expands the home directory and resolves relative paths", () => {
    expect(expandConfigPath({ value: "~", homeDir: "/home/me", baseDir: "/etc/arbor" })).toBe("/home/me")
    expect(expandConfigPath({ value: "~/Code", homeDir: "/home/me", baseDir: "/etc/arbor" })).toBe("/home/me/Code")
    expect(expandConfigPath({ value: "hooks", homeDir: "/home/me", baseDir: "/etc/arbor" })).toBe("/etc/arbor/hooks")
    expect(expandConfigPath({ value: "/abs/./path", homeDir: "/home/me", baseDir: "/etc/arbor" })).toBe("/abs/path")
  })
})
