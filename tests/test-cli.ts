/**
 * Command-line runs over several files
 */

import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { buildProgram, formatSummary, runEnhance } from '../enhancer/src/cli'
import { createLogger } from '../enhancer/src/utils/logger'
import { createFakeGitHub } from './support/fakeGitHub'

describe('runEnhance', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'enhance-cli-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('keeps going after a failing file and reports each one', async () => {
    const good = join(dir, 'README.md')
    const missing = join(dir, 'missing.md')
    await writeFile(good, '- [a](https://github.com/o/a) - First.\n- [b](https://github.com/o/b) - Second.\n', 'utf-8')
    const github = createFakeGitHub({ 'o/a': { stars: 10 }, 'o/b': { stars: 20 } })
    const logger = createLogger({ silent: true })

    const summaries = await runEnhance(
      [missing, good],
      { sortBy: 'stars', token: 'test-token' },
      { env: {}, logger, fetcher: { fetch: github.fetch } },
    )

    expect(summaries.map((summary) => summary.status)).toEqual(['failed', 'updated'])
    expect(summaries[0].message).toMatch(/^Could not read /)
    expect(await readFile(good, 'utf-8')).toBe(
      '- [b](https://github.com/o/b) ⭐ 20 | 🐛 0 - Second.\n- [a](https://github.com/o/a) ⭐ 10 | 🐛 0 - First.\n',
    )
    expect(github.requests[0].headers.authorization).toBe('Bearer test-token')
    expect(logger.entries().some((entry) => entry.includes(`[ERROR] Failed to process ${missing}`))).toBe(true)
  })

  it('warns when running without a token', async () => {
    const logger = createLogger({ silent: true })

    await runEnhance([], {}, { env: {}, logger })

    expect(logger.entries()).toHaveLength(1)
    expect(logger.entries()[0]).toMatch(/\[WARN\] No GitHub token provided/)
  })

  it('rejects invalid options before touching any file', async () => {
    await expect(
      runEnhance([join(dir, 'README.md')], { minLinks: 'lots' }, { env: {}, logger: createLogger({ silent: true }) }),
    ).rejects.toMatchObject({ code: 'INVALID_CONFIG' })
  })
})

describe('formatSummary', () => {
  it('prints one line per file', () => {
    expect(
      formatSummary([
        { filePath: 'README.md', status: 'updated', warnings: 1, errors: 2 },
        { filePath: 'docs/list.md', status: 'unchanged', warnings: 0, errors: 0 },
        { filePath: 'gone.md', status: 'failed', warnings: 0, errors: 0, message: 'Could not read gone.md' },
      ]),
    ).toBe(
      [
        'README.md: updated, 1 warning(s), 2 error(s)',
        'docs/list.md: unchanged, 0 warning(s), 0 error(s)',
        'gone.md: failed (Could not read gone.md)',
      ].join('\n'),
    )
  })
})

describe('buildProgram', () => {
  it('defaults to README.md and maps flags to options', () => {
    const program = buildProgram()
    program.action(() => undefined)

    program.parse(['node', 'enhance-readme', '--sort-by', 'stars', '--disable-branding', '--min-links', '3'])

    expect(program.processedArgs).toEqual([['README.md']])
    expect(program.opts()).toEqual({ sortBy: 'stars', disableBranding: true, minLinks: '3' })
  })
})
