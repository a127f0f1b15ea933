import { describe, expect, it } from "vitest"
import { dispatchInformationalCommands, resolveInformationalRequest } from "./dispatcher"

const request = (positionals: readonly string[], parsedArgs: Record<string, unknown> = {}) => {
  return resolveInformationalRequest({ command: positionals[0] ?? "unknown", positionals, parsedArgs })
}

describe("resolveInformationalRequest", () => {
  it("classifies help and version runs", () => {
    expect(request([])).toEqual({ kind: "general-help" })
    expect(request([], { version: true })).toEqual({ kind: "version" })
    expect(request(["help"])).toEqual({ kind: "general-help" })
    expect(request(["help", "create"])).toEqual({ kind: "command-help", name: "create", strict: true })
    expect(request(["create"], { help: true })).toEqual({ kind: "command-help", name: "create", strict: false })
    expect(request(["help"], { help: true })).toEqual({ kind: "general-help" })
  })

  it("leaves regular commands alone", () => {
    expect(request(["create", "feature-x"])).toBeNull()
  })
})

describe("dispatchInformationalCommands", () => {
  const renderer = {
    version: "9.9.9",
    entries: [{ name: "list" }],
    nameOf: (entry: { readonly name: string }) => entry.name,
    renderGeneral: ({ version }: { readonly version: string }) => `general ${version}`,
    renderCommand: ({ entry }: { readonly entry: { readonly name: string } }) => `command ${entry.name}`,
  }

  it("falls back to the general help for an unknown command given --help", () => {
    const lines: string[] = []
    const exitCode = dispatchInformationalCommands({
      context: { command: "nope", positionals: ["nope"], parsedArgs: { help: true } },
      renderer,
      stdout: (line) => lines.push(line),
    })

    expect(exitCode).toBe(0)
    expect(lines).toEqual(["general 9.9.9\n"])
  })

  it("prints help for a known command", () => {
    const lines: string[] = []
    dispatchInformationalCommands({
      context: { command: "help", positionals: ["help", "list"], parsedArgs: {} },
      renderer,
      stdout: (line) => lines.push(line),
    })

    expect(lines).toEqual(["command list\n"])
  })

  it("returns null for regular commands", () => {
    expect(
      dispatchInformationalCommands({
        context: { command: "list", positionals: ["list"], parsedArgs: {} },
        renderer,
        stdout: () => undefined,
      }),
    ).toBeNull()
  })
})
