import { execa } from "execa"
import { createCliError, readErrnoCode } from "../core/errors"

type GhCommandRunnerInput = {
  readonly cwd: string
  readonly args: readonly string[]
}

type GhCommandRunnerOutput = {
  readonly exitCode: number
  readonly stdout: string
  readonly stderr: string
}

export type GhCommandRunner = (input: GhCommandRunnerInput) => Promise<GhCommandRunnerOutput>

export type IssueReference = {
  readonly owner: string
  readonly repository: string
  readonly number: number
}

export type IssueInfo = IssueReference & {
  readonly title: string
  readonly state: string
  readonly url: string | null
}

const MAX_TITLE_LENGTH = 80

const defaultRunGh: GhCommandRunner = async ({ cwd, args }) => {
  try {
    const result = await execa("gh", [...args], {
      cwd,
      reject: false,
    })
    return {
      exitCode: result.exitCode ?? 0,
      stdout: result.stdout,
      stderr: result.stderr,
    }
  } catch (error) {
    if (readErrnoCode(error) === "ENOENT") {
      throw createCliError("DEPENDENCY_MISSING", {
        message: "gh command not found",
        details: { command: "gh" },
        cause: error,
      })
    }
    throw error
  }
}

const invalidReference = (reference: string, reason: string): never => {
  throw createCliError("INVALID_ARGUMENT", {
    message: `Invalid issue reference "${reference}": ${reason}`,
    details: { reference, reason },
  })
}

const ISSUE_URL_PATTERN = /github\.com\/([^/\s]+)\/([^/\s]+)\/issues\/(\d+)(?:[/?#].*)?$/
const OWNER_REPO_PATTERN = /^([^/\s#]+)\/([^/\s#]+)#(\d+)$/
const ORIGIN_PATTERN = /github\.com[/:]([^/]+)\/([^/]+?)(?:\.git)?\/?$/

/**
 * Accepts `owner/repo#N`, `https://github.com/owner/repo/issues/N`, or a bare `N` resolved
 * against the GitHub origin URL.
 */
export const parseIssueReference = ({
  reference,
  originUrl,
}: {
  readonly reference: string
  readonly originUrl: string | null
}): IssueReference => {
  const trimmed = reference.trim()
  const url = ISSUE_URL_PATTERN.exec(trimmed)
  if (url?.[1] !== undefined && url[2] !== undefined && url[3] !== undefined) {
    return { owner: url[1], repository: url[2], number: Number(url[3]) }
  }
  const ownerRepo = OWNER_REPO_PATTERN.exec(trimmed)
  if (ownerRepo?.[1] !== undefined && ownerRepo[2] !== undefined && ownerRepo[3] !== undefined) {
    return { owner: ownerRepo[1], repository: ownerRepo[2], number: Number(ownerRepo[3]) }
  }
  if (/^\d+$/.test(trimmed)) {
    if (originUrl === null) {
      return invalidReference(reference, "an issue number needs a GitHub origin remote")
    }
    const origin = ORIGIN_PATTERN.exec(originUrl.trim())
    if (origin?.[1] === undefined || origin[2] === undefined) {
      return invalidReference(reference, `origin is not a GitHub repository: ${originUrl}`)
    }
    return { owner: origin[1], repository: origin[2], number: Number(trimmed) }
  }
  return invalidReference(reference, "expected owner/repo#N, an issue URL or an issue number")
}

export const branchNameFromIssue = ({ number, title }: { readonly number: number; readonly title: string }): string => {
  const sanitized = title
    .toLowerCase()
    .replace(/[^a-z0-9-]/g, "-")
    .replace(/-+/g, "-")
    .slice(0, MAX_TITLE_LENGTH)
    .replace(/^-+|-+$/g, "")
  return sanitized.length === 0 ? String(number) : `${String(number)}-${sanitized}`
}

const parseIssueView = (raw: string): { readonly title: string; readonly state: string; readonly url: string | null } | null => {
  try {
    const parsed: unknown = JSON.parse(raw)
    if (typeof parsed !== "object" || parsed === null) {
      return null
    }
    const title: unknown = Reflect.get(parsed, "title")
    const state: unknown = Reflect.get(parsed, "state")
    const url: unknown = Reflect.get(parsed, "url")
    if (typeof title !== "string") {
      return null
    }
    return {
      title,
      state: typeof state === "string" ? state.toUpperCase() : "UNKNOWN",
      url: typeof url === "string" ? url : null,
    }
  } catch {
    return null
  }
}

export const fetchIssue = async ({
  cwd,
  reference,
  runGh = defaultRunGh,
}: {
  readonly cwd: string
  readonly reference: IssueReference
  readonly runGh?: GhCommandRunner
}): Promise<IssueInfo> => {
  const repo = `${reference.owner}/${reference.repository}`
  const result = await runGh({
    cwd,
    args: ["issue", "view", String(reference.number), "--repo", repo, "--json", "number,title,state,url"],
  })
  if (result.exitCode !== 0) {
    throw createCliError("ISSUE_RESOLUTION_FAILED", {
      message: `Failed to fetch issue ${repo}#${String(reference.number)}`,
      details: { repo, number: reference.number, exitCode: result.exitCode, stderr: result.stderr },
    })
  }
  const view = parseIssueView(result.stdout)
  if (view === null) {
    throw createCliError("ISSUE_RESOLUTION_FAILED", {
      message: `Unexpected gh output for ${repo}#${String(reference.number)}`,
      details: { repo, number: reference.number, stdout: result.stdout },
    })
  }
  if (view.state !== "OPEN") {
    throw createCliError("ISSUE_RESOLUTION_FAILED", {
      message: `Issue ${repo}#${String(reference.number)} is not open`,
      details: { repo, number: reference.number, state: view.state },
    })
  }
  return { ...reference, ...view }
}

export const resolveIssueBranch = async ({
  cwd,
  reference,
  originUrl,
  runGh,
}: {
  readonly cwd: string
  readonly reference: string
  readonly originUrl: string | null
  readonly runGh?: GhCommandRunner
}): Promise<{ readonly branch: string; readonly issue: IssueInfo }> => {
  const parsed = parseIssueReference({ reference, originUrl })
  const issue = await fetchIssue({ cwd, reference: parsed, ...(runGh === undefined ? {} : { runGh }) })
  return { branch: branchNameFromIssue(issue), issue }
}
