import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { execa } from "execa"

const fixtureRoots = new Set<string>()

export const createTempRoot = async ({ prefix = "arbor-test-" }: { readonly prefix?: string } = {}): Promise<string> => {
  const root = await mkdtemp(join(tmpdir(), prefix))
  fixtureRoots.add(root)
  return root
}

export const runGit = async (cwd: string, args: readonly string[]): Promise<string> => {
  const result = await execa("git", [...args], { cwd })
  return result.stdout
}

/** Creates a repository with one commit on `main` and a local identity. */
export const initGitRepo = async (repoPath: string): Promise<string> => {
  await mkdir(repoPath, { recursive: true })
  await runGit(repoPath, ["init", "-b", "main"])
  await runGit(repoPath, ["config", "user.name", "Arbor Test"])
  await runGit(repoPath, ["config", "user.email", "arbor@example.com"])
  await runGit(repoPath, ["config", "commit.gpgsign", "false"])
  await writeFile(join(repoPath, "README.md"), "# fixture\n", "utf8")
  await runGit(repoPath, ["add", "README.md"])
  await runGit(repoPath, ["commit", "-m", "initial commit"])
  return repoPath
}

export const cleanupRepoFixtures = async (): Promise<void> => {
  const roots = [...fixtureRoots]
  try {
    const results = await Promise.allSettled(
      roots.map(async (root) => {
        await rm(root, { recursive: true, force: true })
      }),
    )
    const errors = results
      .filter((result): result is PromiseRejectedResult => result.status === "rejected")
      .map((result) => result.reason)
    if (errors.length > 0) {
      throw new AggregateError(errors, "Failed to clean up some repo fixtures")
    }
  } finally {
    fixtureRoots.clear()
  }
}
