/**
 * Runtime configuration from flags and environment
 */

import { resolveRuntimeConfig } from '../enhancer/src/config'
import { EnhanceError } from '../enhancer/src/utils/errors'

function configError(run: () => unknown): EnhanceError {
  try {
    run()
  } catch (error) {
    if (error instanceof EnhanceError) {
      return error
    }
    throw error
  }
  throw new Error('expected resolveRuntimeConfig to throw')
}

describe('resolveRuntimeConfig', () => {
  it('falls back to defaults', () => {
    expect(resolveRuntimeConfig({}, {})).toEqual({
      token: '',
      sortBy: '',
      minLinks: 2,
      relativeLinkPrefix: '',
      maxRetries: 3,
      maxWaitSeconds: 300,
      concurrency: 10,
    })
  })

  it('reads environment variables', () => {
    const config = resolveRuntimeConfig(
      {},
      {
        GITHUB_TOKEN: 'test-token',
        ENHANCE_SORT_BY: 'last_commit',
        ENHANCE_MIN_LINKS: '5',
        ENHANCE_RELATIVE_LINK_PREFIX: 'lists/go',
        ENHANCE_CONCURRENCY: '4',
        GITHUB_REPOSITORY: 'acme/awesome-go',
      },
    )

    expect(config).toMatchObject({
      token: 'test-token',
      sortBy: 'last_commit',
      minLinks: 5,
      relativeLinkPrefix: 'lists/go',
      concurrency: 4,
      sourceRepository: 'acme/awesome-go',
    })
  })

  it('uses the action input token when GITHUB_TOKEN is blank', () => {
    const config = resolveRuntimeConfig({}, { GITHUB_TOKEN: '  ', INPUT_GITHUB_TOKEN: 'test-input-token' })

    expect(config.token).toBe('test-input-token')
  })

  it('lets flags override the environment', () => {
    const config = resolveRuntimeConfig(
      { token: 'test-flag-token', sortBy: 'stars', minLinks: '0' },
      { GITHUB_TOKEN: 'test-token', ENHANCE_SORT_BY: 'last_commit', ENHANCE_MIN_LINKS: '5' },
    )

    expect(config).toMatchObject({ token: 'test-flag-token', sortBy: 'stars', minLinks: 0 })
  })

  it('rejects an unknown sort key', () => {
    const error = configError(() => resolveRuntimeConfig({ sortBy: 'forks' }, {}))

    expect(error.code).toBe('INVALID_CONFIG')
    expect(error.exitCode).toBe(2)
    expect(error.message).toMatch(/^Invalid configuration: sortBy: /)
  })

  it('rejects a negative or non-numeric threshold', () => {
    expect(configError(() => resolveRuntimeConfig({ minLinks: '-1' }, {})).message).toMatch(/minLinks: /)
    expect(configError(() => resolveRuntimeConfig({ minLinks: 'many' }, {})).message).toMatch(/minLinks: /)
  })

  it('rejects a malformed source repository', () => {
    const error = configError(() => resolveRuntimeConfig({ sourceRepository: 'not a repo' }, {}))

    expect(error.message).toBe('Invalid configuration: sourceRepository: expected owner/name')
  })
})
