import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { basename, extname, join } from 'node:path'
import { EnhanceError, describeError } from './utils/errors'
import { defaultLogger, type Logger } from './utils/logger'
import type { FetcherOptions } from './utils/metadataFetcher'
import { processMarkdown } from './utils/markdownProcessor'
import { parseReplacementRules } from './utils/textReplacements'
import type { ProcessedMarkdown, SortBy } from './utils/types'

export interface EnhanceOptions {
  content: string
  token?: string
  disableBranding?: boolean
  findAndReplaceRaw?: string
  regexFindAndReplaceRaw?: string
  relativeLinkPrefix?: string
  sortBy?: SortBy
  minLinks?: number
  sourceRepository?: string
  fetcher?: Omit<FetcherOptions, 'token' | 'logger'>
  logger?: Logger
  now?: () => Date
}

export type EnhanceResult = ProcessedMarkdown

export async function enhance(options: EnhanceOptions): Promise<EnhanceResult> {
  const {
    content,
    token = '',
    disableBranding = false,
    findAndReplaceRaw = '',
    regexFindAndReplaceRaw = '',
    relativeLinkPrefix = '',
    sortBy = '',
    minLinks = 2,
    sourceRepository,
    fetcher,
    logger = defaultLogger,
    now,
  } = options

  const rules = parseReplacementRules(findAndReplaceRaw, regexFindAndReplaceRaw)
  if (!disableBranding) {
    rules.unshift({ type: 'branding' })
  }

  return processMarkdown(content, {
    token,
    rules,
    sortOptions: { by: sortBy, minLinks },
    relativeLinkPrefix,
    sourceRepository,
    fetcher,
    logger,
    now,
  })
}

export interface EnhanceFileOptions extends Omit<EnhanceOptions, 'content'> {
  jsonDir?: string
}

export interface EnhanceFileResult extends EnhanceResult {
  filePath: string
  jsonPath?: string
}

export function jsonPathFor(filePath: string, jsonDir: string): string {
  return join(jsonDir, `${basename(filePath, extname(filePath))}.json`)
}

/**
 * Enhances one Markdown file in place. The file is only rewritten when its
 * content changed; the JSON export is written whenever `jsonDir` is set.
 */
export async function enhanceFile(
  filePath: string,
  options: EnhanceFileOptions = {},
): Promise<EnhanceFileResult> {
  const { jsonDir, ...enhanceOptions } = options
  const logger = options.logger ?? defaultLogger
  logger.info(`Processing file: ${filePath}`)

  let content: string
  try {
    content = await readFile(filePath, 'utf-8')
  } catch (error) {
    throw new EnhanceError('READ_FAILED', `Could not read ${filePath}: ${describeError(error)}`, 1, {
      filePath,
    })
  }

  const result = await enhance({ ...enhanceOptions, content })

  let jsonPath: string | undefined
  try {
    if (result.isChanged) {
      await writeFile(filePath, result.finalContent, 'utf-8')
      logger.info(`Successfully updated ${filePath}.`)
    } else {
      logger.info(`No changes needed for ${filePath}.`)
    }

    if (jsonDir) {
      jsonPath = jsonPathFor(filePath, jsonDir)
      await mkdir(jsonDir, { recursive: true })
      await writeFile(jsonPath, `${JSON.stringify(result.jsonData, null, 2)}\n`, 'utf-8')
      logger.info(`Wrote JSON export to ${jsonPath}.`)
    }
  } catch (error) {
    throw new EnhanceError('WRITE_FAILED', `Could not write output for ${filePath}: ${describeError(error)}`, 1, {
      filePath,
    })
  }

  return { ...result, filePath, jsonPath }
}
