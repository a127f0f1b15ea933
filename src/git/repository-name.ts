const stripGitSuffix = (value: string): string => {
  const trimmed = value.replace(/\/+$/, "")
  return trimmed.endsWith(".git") ? trimmed.slice(0, -".git".length) : trimmed
}

const fromHttpUrl = (url: string): string | null => {
  const segments = url.split("/")
  const host = segments[2]
  if (host === undefined || host.length === 0) {
    return null
  }
  return [host, segments[3], segments[4]]
    .filter((segment): segment is string => segment !== undefined && segment.length > 0)
    .join("/")
}

/**
 * Normalizes a remote URL to `host/owner/repo`. Handles `git@host:owner/repo(.git)` and
 * `http(s)://host/owner/repo(.git)`; anything else yields null.
 */
export const repositoryNameFromUrl = (rawUrl: string): string | null => {
  const url = stripGitSuffix(rawUrl.trim())
  if (url.length === 0) {
    return null
  }
  if (url.startsWith("http")) {
    return fromHttpUrl(url)
  }
  if (url.includes("@") && url.includes(":")) {
    const [userHost, path, ...rest] = url.split(":")
    const host = userHost?.split("@")[1]
    if (rest.length === 0 && host !== undefined && host.length > 0 && path !== undefined && path.length > 0) {
      return `${host}/${path}`
    }
  }
  return null
}
