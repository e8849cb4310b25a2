import { z } from 'zod'
import { describeError } from './errors'
import { defaultLogger, type Logger } from './logger'
import type { RepoMetadata, RepoReference } from './types'

export const GITHUB_API_URL = 'https://api.github.com'
export const MAX_RETRIES = 3
export const MAX_WAIT_SECONDS = 300 // 5 minutes
export const CONCURRENCY_LIMIT = 10

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>

export interface FetcherOptions {
  token?: string
  apiBaseUrl?: string
  concurrency?: number
  maxRetries?: number
  maxWaitSeconds?: number
  fetch?: FetchLike
  sleep?: (ms: number) => Promise<void>
  now?: () => number
  logger?: Logger
}

const repoPayloadSchema = z.object({
  stargazers_count: z.number().int().nonnegative(),
  open_issues_count: z.number().int().nonnegative(),
  language: z.string().nullish(),
  archived: z.boolean(),
  pushed_at: z.string().nullish(),
})

function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

function buildHeaders(token: string): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: 'application/vnd.github+json',
    'X-GitHub-Api-Version': '2022-11-28',
  }
  if (token) {
    headers.Authorization = `Bearer ${token}`
  }
  return headers
}

function parseRetryAfter(value: string | null, nowMs: number): number | null {
  if (value === null) {
    return null
  }
  const trimmed = value.trim()
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed)
  }
  // HTTP-date form
  const retryAt = Date.parse(trimmed)
  if (Number.isNaN(retryAt)) {
    return null
  }
  return Math.max(0, Math.ceil((retryAt - nowMs) / 1000))
}

/**
 * Seconds to wait before retrying a failed response, or `null` when the
 * response is not a rate-limit signal and must not be retried.
 */
export function computeRateLimitWait(
  status: number,
  headers: Headers,
  nowMs: number,
): number | null {
  const retryAfter = parseRetryAfter(headers.get('retry-after'), nowMs)
  if (retryAfter !== null) {
    return retryAfter
  }

  const remaining = headers.get('x-ratelimit-remaining')
  const resetHeader = headers.get('x-ratelimit-reset')
  const reset = resetHeader ? Number(resetHeader) : Number.NaN
  if ((status === 403 || status === 429) && remaining === '0' && Number.isFinite(reset)) {
    const currentTime = Math.floor(nowMs / 1000)
    return Math.max(0, reset - currentTime) + 1
  }

  return null
}

async function readRepoMetadata(
  response: Response,
  label: string,
  logger: Logger,
): Promise<RepoMetadata | null> {
  let payload: unknown
  try {
    payload = await response.json()
  } catch (error) {
    logger.error(`Repository info for ${label} is not valid JSON: ${describeError(error)}`)
    return null
  }

  const parsed = repoPayloadSchema.safeParse(payload)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    logger.error(`Unexpected repository payload for ${label}: ${issues}`)
    return null
  }

  const data = parsed.data
  return {
    stars: data.stargazers_count,
    openIssues: data.open_issues_count,
    language: data.language ?? null,
    archived: data.archived,
    lastPushed: data.pushed_at ?? null,
  }
}

async function readErrorBody(response: Response): Promise<string> {
  try {
    return await response.text()
  } catch (error) {
    return `<unreadable body: ${describeError(error)}>`
  }
}

/**
 * Fetches one repository's metadata, retrying on rate limits.
 * Returns `null` on any failure; never throws.
 */
export async function fetchRepoMetadata(
  reference: RepoReference,
  options: FetcherOptions = {},
): Promise<RepoMetadata | null> {
  const {
    token = '',
    apiBaseUrl = GITHUB_API_URL,
    maxRetries = MAX_RETRIES,
    maxWaitSeconds = MAX_WAIT_SECONDS,
    fetch: fetchImpl = fetch,
    sleep = wait,
    now = () => Date.now(),
    logger = defaultLogger,
  } = options

  const label = `${reference.owner}/${reference.name}`
  const repoUrl = `${apiBaseUrl}/repos/${encodeURIComponent(reference.owner)}/${encodeURIComponent(reference.name)}`

  for (let attempt = 1; attempt <= maxRetries; attempt += 1) {
    logger.debug(`Fetching repository info for ${label} (attempt ${attempt}/${maxRetries})`)

    let response: Response
    try {
      response = await fetchImpl(repoUrl, { headers: buildHeaders(token) })
    } catch (error) {
      logger.error(`Network error fetching repo info for ${label}: ${describeError(error)}`)
      return null
    }

    if (response.ok) {
      return readRepoMetadata(response, label, logger)
    }

    const waitSeconds = computeRateLimitWait(response.status, response.headers, now())
    if (waitSeconds === null) {
      logger.error(`Failed to fetch repo info for ${label} (Status: ${response.status})`)
      logger.debug(`Response Data: ${await readErrorBody(response)}`)
      return null
    }

    // The throttled body is never read; release the connection
    await response.body?.cancel()

    if (attempt === maxRetries) {
      break
    }

    if (waitSeconds > maxWaitSeconds) {
      logger.error(
        `Rate limit wait for ${label} (${waitSeconds}s) exceeds the maximum wait time of ${maxWaitSeconds}s. Aborting retries for this URL.`,
      )
      return null
    }

    logger.warn(
      `Request for ${label} was throttled (Status: ${response.status}). Waiting ${waitSeconds} seconds.`,
    )
    await sleep(waitSeconds * 1000)
  }

  logger.error(`Failed to fetch repo info for ${label} after ${maxRetries} attempts.`)
  return null
}

/**
 * Resolves every reference through a fixed pool of workers sharing one
 * queue. The result only holds URLs whose fetch succeeded.
 */
export async function fetchAllRepoMetadata(
  references: Map<string, RepoReference>,
  options: FetcherOptions = {},
): Promise<Map<string, RepoMetadata>> {
  const { concurrency = CONCURRENCY_LIMIT, logger = defaultLogger } = options
  const metadataMap = new Map<string, RepoMetadata>()
  const queue = Array.from(references.keys())
  const poolSize = Math.min(Math.max(1, concurrency), queue.length)

  const worker = async () => {
    while (queue.length > 0) {
      const url = queue.shift()
      if (url === undefined) {
        break
      }
      const reference = references.get(url)
      if (!reference) {
        continue
      }

      try {
        const metadata = await fetchRepoMetadata(reference, options)
        if (metadata) {
          metadataMap.set(url, metadata)
        }
      } catch (error) {
        // Keep the worker alive for the rest of the queue
        logger.error(`Failed to process URL ${url}: ${describeError(error)}`)
      }
    }
  }

  await Promise.all(Array.from({ length: poolSize }, () => worker()))

  logger.debug(
    `Fetched info for ${metadataMap.size}/${references.size} repositories using a concurrency of ${poolSize}.`,
  )
  return metadataMap
}
