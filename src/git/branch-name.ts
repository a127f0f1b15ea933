import { createCliError } from "../core/errors"

const FORBIDDEN_CHARACTERS = /[\u0000-\u001f\u007f ~^:?*[\\]/

const describeInvalidBranch = (branch: string): string | null => {
  if (branch.trim().length === 0) {
    return "must not be empty"
  }
  if (branch === "@") {
    return 'must not be "@"'
  }
  if (branch.startsWith("-")) {
    return 'must not start with "-"'
  }
  if (branch.startsWith("/") || branch.endsWith("/") || branch.includes("//")) {
    return "must not contain empty path components"
  }
  if (branch.endsWith(".")) {
    return 'must not end with "."'
  }
  if (branch.includes("..")) {
    return 'must not contain ".."'
  }
  if (branch.includes("@{")) {
    return 'must not contain "@{"'
  }
  if (FORBIDDEN_CHARACTERS.test(branch)) {
    return "must not contain spaces, control characters or any of ~^:?*[\\"
  }
  for (const component of branch.split("/")) {
    if (component.startsWith(".")) {
      return 'path components must not start with "."'
    }
    if (component.endsWith(".lock")) {
      return 'path components must not end with ".lock"'
    }
  }
  return null
}

export const assertValidBranchName = (branch: string): void => {
  const reason = describeInvalidBranch(branch)
  if (reason !== null) {
    throw createCliError("INVALID_BRANCH_NAME", {
      message: `Invalid branch name "${branch}": ${reason}`,
      details: { branch, reason },
    })
  }
}

/** File-name-safe form of a branch, used for generated workspace files. */
export const sanitizeBranchForFileName = (branch: string): string => {
  return branch.replaceAll("/", "-")
}
