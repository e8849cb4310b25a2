import { posix } from 'node:path'

const REPO_HOST = 'github.com'

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:/i

/**
 * Resolves a GitHub repository link to its owner and name.
 * Accepts `https://github.com/owner/repo`, a trailing slash, a `.git`
 * suffix and deeper paths such as `/owner/repo/issues`.
 */
export function parseRepoUrl(url: string): { owner: string; name: string } | null {
  let parsed: URL
  try {
    parsed = new URL(url)
  } catch {
    return null
  }

  if (parsed.hostname !== REPO_HOST) {
    return null
  }

  const [owner, repo] = parsed.pathname.split('/').filter((part) => part.length > 0)
  if (!owner || !repo) {
    return null
  }

  const name = repo.replace(/\.git$/, '')
  return name ? { owner, name } : null
}

/**
 * True for link targets that depend on the document's directory: no scheme,
 * not root-relative, not a fragment.
 */
export function isRelativeLink(url: string): boolean {
  const trimmed = url.trim()
  if (!trimmed) {
    return false
  }
  return !SCHEME_PATTERN.test(trimmed) && !trimmed.startsWith('/') && !trimmed.startsWith('#')
}

export function prefixRelativeLink(url: string, prefix: string): string {
  return posix.join(prefix.replace(/\\/g, '/'), url.replace(/\\/g, '/'))
}
