export type GitWorktreeEntry = {
  readonly path: string
  readonly head: string | null
  readonly branch: string | null
  readonly detached: boolean
  readonly bare: boolean
  readonly prunable: boolean
}

type MutableEntry = {
  path: string
  head: string | null
  branch: string | null
  detached: boolean
  bare: boolean
  prunable: boolean
}

const HEADS_PREFIX = "refs/heads/"

const toBranchName = (ref: string): string | null => {
  if (ref.length === 0) {
    return null
  }
  return ref.startsWith(HEADS_PREFIX) ? ref.slice(HEADS_PREFIX.length) : ref
}

/**
 * Parses `git worktree list --porcelain -z`. Records are NUL-separated attribute lines and an
 * empty attribute ends a record.
 */
export const parseWorktreePorcelain = (raw: string): GitWorktreeEntry[] => {
  const entries: GitWorktreeEntry[] = []
  let current: MutableEntry | null = null

  const flush = (): void => {
    if (current !== null) {
      entries.push({ ...current })
      current = null
    }
  }

  for (const attribute of raw.split("\0")) {
    if (attribute.length === 0) {
      flush()
      continue
    }

    const separator = attribute.indexOf(" ")
    const label = separator === -1 ? attribute : attribute.slice(0, separator)
    const value = separator === -1 ? "" : attribute.slice(separator + 1)

    if (label === "worktree") {
      flush()
      current = { path: value, head: null, branch: null, detached: false, bare: false, prunable: false }
      continue
    }
    if (current === null) {
      continue
    }

    switch (label) {
      case "HEAD":
        current.head = value
        break
      case "branch":
        current.branch = toBranchName(value)
        break
      case "detached":
        current.detached = true
        current.branch = null
        break
      case "bare":
        current.bare = true
        break
      case "prunable":
        current.prunable = true
        break
      default:
        break
    }
  }

  flush()
  return entries
}
