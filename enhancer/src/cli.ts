import { Command } from 'commander'
import { resolveRuntimeConfig } from './config'
import { enhanceFile, type EnhanceFileResult } from './enhance'
import { describeError } from './utils/errors'
import { createLogger, type Logger } from './utils/logger'
import type { FetcherOptions } from './utils/metadataFetcher'

export interface CliOptions {
  token?: string
  findReplace?: string
  regexFindReplace?: string
  sortBy?: string
  minLinks?: string
  relativeLinkPrefix?: string
  disableBranding?: boolean
  jsonDir?: string
  sourceRepository?: string
  verbose?: boolean
}

export interface FileSummary {
  filePath: string
  status: 'updated' | 'unchanged' | 'failed'
  warnings: number
  errors: number
  message?: string
}

export interface RunDependencies {
  env?: NodeJS.ProcessEnv
  logger?: Logger
  fetcher?: Pick<FetcherOptions, 'fetch' | 'sleep' | 'now'>
}

function summarize(result: EnhanceFileResult): FileSummary {
  return {
    filePath: result.filePath,
    status: result.isChanged ? 'updated' : 'unchanged',
    warnings: result.diagnostics.warnings.length,
    errors: result.diagnostics.errors.length,
  }
}

export function formatSummary(summaries: FileSummary[]): string {
  return summaries
    .map((summary) => {
      const counts = `${summary.warnings} warning(s), ${summary.errors} error(s)`
      return summary.status === 'failed'
        ? `${summary.filePath}: failed (${summary.message ?? 'unknown error'})`
        : `${summary.filePath}: ${summary.status}, ${counts}`
    })
    .join('\n')
}

/**
 * Enhances each file in turn. A failing file is logged and skipped; the
 * returned summaries say which ones failed.
 */
export async function runEnhance(
  files: string[],
  options: CliOptions,
  dependencies: RunDependencies = {},
): Promise<FileSummary[]> {
  const logger = dependencies.logger ?? createLogger({ verbose: options.verbose })
  const config = resolveRuntimeConfig(
    {
      token: options.token,
      sortBy: options.sortBy,
      minLinks: options.minLinks,
      relativeLinkPrefix: options.relativeLinkPrefix,
      sourceRepository: options.sourceRepository,
    },
    dependencies.env,
  )

  if (!config.token) {
    logger.warn('No GitHub token provided; requests are subject to the anonymous rate limit.')
  }

  const summaries: FileSummary[] = []
  for (const filePath of files) {
    try {
      const result = await enhanceFile(filePath, {
        token: config.token,
        disableBranding: options.disableBranding,
        findAndReplaceRaw: options.findReplace,
        regexFindAndReplaceRaw: options.regexFindReplace,
        relativeLinkPrefix: config.relativeLinkPrefix,
        sortBy: config.sortBy,
        minLinks: config.minLinks,
        sourceRepository: config.sourceRepository,
        jsonDir: options.jsonDir,
        fetcher: {
          ...dependencies.fetcher,
          concurrency: config.concurrency,
          maxRetries: config.maxRetries,
          maxWaitSeconds: config.maxWaitSeconds,
        },
        logger,
      })
      summaries.push(summarize(result))
    } catch (error) {
      const message = describeError(error)
      logger.error(`Failed to process ${filePath}: ${message}`)
      summaries.push({ filePath, status: 'failed', warnings: 0, errors: 0, message })
    }
  }
  return summaries
}

export function buildProgram(): Command {
  const program = new Command()

  program
    .name('enhance-readme')
    .description('Add repository badges to awesome lists and optionally sort and export them')
    .version(process.env.npm_package_version ?? '0.1.0')
    .argument('[files...]', 'Markdown files to enhance', ['README.md'])
    .option('--token <token>', 'GitHub token (defaults to GITHUB_TOKEN)')
    .option('--find-replace <rules>', 'Literal find:::replace rules, one per line')
    .option('--regex-find-replace <rules>', 'Regex find:::replace rules, one per line')
    .option('--sort-by <field>', 'Sort qualifying lists (stars|last_commit)')
    .option('--min-links <n>', 'Repository links a list needs before it is sorted or exported')
    .option('--relative-link-prefix <path>', 'Prefix for relative link targets')
    .option('--disable-branding', 'Do not append "with stars" to the title')
    .option('--json-dir <dir>', 'Write the structured export to this directory')
    .option('--source-repository <owner/name>', 'Repository recorded in the export metadata')
    .option('--verbose', 'Print debug logs')
    .action(async (files: string[], options: CliOptions) => {
      const summaries = await runEnhance(files, options)
      console.log(formatSummary(summaries))
      if (summaries.some((summary) => summary.status === 'failed')) {
        process.exitCode = 1
      }
    })

  return program
}
