import { describe, expect, it } from "vitest"
import { parseWorktreePorcelain } from "./worktree"

describe("parseWorktreePorcelain", () => {
  it("parses branch, detached and prunable records", () => {
    const raw = [
      "worktree /src/app",
      "HEAD 1111111111111111111111111111111111111111",
      "branch refs/heads/main",
      "",
      "worktree /code/app/origin/feature/login",
      "HEAD 2222222222222222222222222222222222222222",
      "branch refs/heads/feature/login",
      "",
      "worktree /code/app/origin/pinned",
      "HEAD 3333333333333333333333333333333333333333",
      "detached",
      "",
      "worktree /code/app/origin/gone",
      "HEAD 4444444444444444444444444444444444444444",
      "branch refs/heads/gone",
      "prunable gitdir file points to non-existent location",
      "",
      "",
    ].join("\0")

    expect(parseWorktreePorcelain(raw)).toEqual([
      {
        path: "/src/app",
        head: "1111111111111111111111111111111111111111",
        branch: "main",
        detached: false,
        bare: false,
        prunable: false,
      },
      {
        path: "/code/app/origin/feature/login",
        head: "2222222222222222222222222222222222222222",
        branch: "feature/login",
        detached: false,
        bare: false,
        prunable: false,
      },
      {
        path: "/code/app/origin/pinned",
        head: "3333333333333333333333333333333333333333",
        branch: null,
        detached: true,
        bare: false,
        prunable: false,
      },
      {
        path: "/code/app/origin/gone",
        head: "4444444444444444444444444444444444444444",
        branch: "gone",
        detached: false,
        bare: false,
        prunable: true,
      },
    ])
  })

  it("keeps paths that contain spaces", () => {
    const raw = ["worktree /tmp/my repo", "bare", "", ""].join("\0")

    expect(parseWorktreePorcelain(raw)).toEqual([
      { path: "/tmp/my repo", head: null, branch: null, detached: false, bare: true, prunable: false },
    ])
  })

  it("returns nothing for empty output", () => {
    expect(parseWorktreePorcelain("")).toEqual([])
  })
})
