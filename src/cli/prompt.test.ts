import { PassThrough } from "node:stream"
import { describe, expect, it } from "vitest"
import { createReadlineConfirm, isAffirmative } from "./prompt"

describe("isAffirmative", () => {
  it.each([
    ["y", true],
    ["YES", true],
    [" yes ", true],
    ["", false],
    ["n", false],
    ["yep", false],
  ])("treats %j as %s", (answer, expected) => {
    expect(isAffirmative(answer)).toBe(expected)
  })
})

describe("createReadlineConfirm", () => {
  it("asks with a default of no and reads one line", async () => {
    const input = new PassThrough()
    const output = new PassThrough()
    const written: string[] = []
    output.on("data", (chunk: Buffer) => {
      written.push(chunk.toString("utf8"))
    })
    const confirm = createReadlineConfirm({ input, output })

    const answer = confirm("Delete worktree /tmp/a?")
    input.write("y\n")

    await expect(answer).resolves.toBe(true)
    expect(written.join("")).toBe("Delete worktree /tmp/a? [y/N] ")
  })
})
