import { z } from 'zod'
import { EnhanceError } from './utils/errors'
import { CONCURRENCY_LIMIT, MAX_RETRIES, MAX_WAIT_SECONDS } from './utils/metadataFetcher'

export interface RuntimeOverrides {
  token?: string
  sortBy?: string
  minLinks?: string
  relativeLinkPrefix?: string
  maxRetries?: string
  maxWaitSeconds?: string
  concurrency?: string
  sourceRepository?: string
}

const runtimeConfigSchema = z.object({
  token: z.string().default(''),
  sortBy: z.enum(['stars', 'last_commit', '']).default(''),
  minLinks: z.coerce.number().int().min(0).default(2),
  relativeLinkPrefix: z.string().default(''),
  maxRetries: z.coerce.number().int().min(1).default(MAX_RETRIES),
  maxWaitSeconds: z.coerce.number().min(0).default(MAX_WAIT_SECONDS),
  concurrency: z.coerce.number().int().min(1).default(CONCURRENCY_LIMIT),
  sourceRepository: z
    .string()
    .regex(/^[^/\s]+\/[^/\s]+$/, 'expected owner/name')
    .optional(),
})

export type RuntimeConfig = z.infer<typeof runtimeConfigSchema>

function normalize(value?: string) {
  if (!value) {
    return undefined
  }

  const trimmed = value.trim()
  return trimmed.length > 0 ? trimmed : undefined
}

/**
 * Merges CLI flags over environment variables over defaults.
 */
export function resolveRuntimeConfig(
  overrides: RuntimeOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): RuntimeConfig {
  const raw = {
    token:
      normalize(overrides.token) ?? normalize(env.GITHUB_TOKEN) ?? normalize(env.INPUT_GITHUB_TOKEN),
    sortBy: normalize(overrides.sortBy) ?? normalize(env.ENHANCE_SORT_BY),
    minLinks: normalize(overrides.minLinks) ?? normalize(env.ENHANCE_MIN_LINKS),
    relativeLinkPrefix:
      normalize(overrides.relativeLinkPrefix) ?? normalize(env.ENHANCE_RELATIVE_LINK_PREFIX),
    maxRetries: normalize(overrides.maxRetries) ?? normalize(env.ENHANCE_MAX_RETRIES),
    maxWaitSeconds: normalize(overrides.maxWaitSeconds) ?? normalize(env.ENHANCE_MAX_WAIT_SECONDS),
    concurrency: normalize(overrides.concurrency) ?? normalize(env.ENHANCE_CONCURRENCY),
    sourceRepository: normalize(overrides.sourceRepository) ?? normalize(env.GITHUB_REPOSITORY),
  }

  const parsed = runtimeConfigSchema.safeParse(raw)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new EnhanceError('INVALID_CONFIG', `Invalid configuration: ${issues.join('; ')}`, 2, {
      issues,
    })
  }
  return parsed.data
}
