import { readErrnoCode } from "../core/errors"

/** `require` from `node:module`'s createRequire, or any loader with the same contract. */
type ModuleLoader = (id: string) => unknown

// Bundled output sits one level below package.json; sources sit two.
const CANDIDATE_PATHS = ["../package.json", "../../package.json"] as const

const readVersion = (manifest: unknown, path: string): string => {
  if (typeof manifest === "object" && manifest !== null && "version" in manifest) {
    const { version } = manifest
    if (typeof version === "string") {
      return version
    }
  }
  throw new Error(`package.json has no version: ${path}`)
}

export const loadPackageVersion = (load: ModuleLoader): string => {
  let lastNotFound: unknown

  for (const candidatePath of CANDIDATE_PATHS) {
    try {
      return readVersion(load(candidatePath), candidatePath)
    } catch (error) {
      if (readErrnoCode(error) === "MODULE_NOT_FOUND") {
        lastNotFound = error
        continue
      }

      throw error
    }
  }

  throw lastNotFound ?? new Error(`Unable to resolve package version from candidates: ${CANDIDATE_PATHS.join(", ")}`)
}
