import { unified } from 'unified'
import remarkParse from 'remark-parse'
import remarkStringify from 'remark-stringify'
import remarkGfm from 'remark-gfm'
import remarkFrontmatter from 'remark-frontmatter'
import { visit } from 'unist-util-visit'
import type { Root } from 'mdast'
import { addInfoBadges } from './badges'
import { sortLists } from './listSorter'
import { defaultLogger, type Logger } from './logger'
import { fetchAllRepoMetadata, type FetcherOptions } from './metadataFetcher'
import { collectRepoReferences } from './references'
import { buildJsonOutput } from './sectionExtractor'
import { applyTextReplacements } from './textReplacements'
import { isRelativeLink, prefixRelativeLink } from './urlUtils'
import type {
  ProcessedMarkdown,
  ProcessingDiagnostics,
  ReplacementRule,
  SortOptions,
} from './types'

const processor = unified().use(remarkParse).use(remarkGfm).use(remarkFrontmatter)

const stringifier = unified()
  .use(remarkStringify, {
    bullet: '-',
    fences: true,
    listItemIndent: 'one',
  })
  .use(remarkGfm)
  .use(remarkFrontmatter)

export const DEFAULT_SORT_OPTIONS: SortOptions = { by: '', minLinks: 2 }

export interface ProcessMarkdownOptions {
  token?: string
  rules?: ReplacementRule[]
  sortOptions?: SortOptions
  relativeLinkPrefix?: string
  sourceRepository?: string
  fetcher?: Omit<FetcherOptions, 'token' | 'logger'>
  logger?: Logger
  now?: () => Date
}

export function parseMarkdown(content: string): Root {
  return processor.parse(content)
}

/**
 * Prefixes every relative `link`, `image` and `definition` target.
 *
 * @returns the number of rewritten targets
 */
export function fixRelativeLinks(tree: Root, relativeLinkPrefix: string): number {
  if (!relativeLinkPrefix) {
    return 0
  }

  let rewritten = 0
  visit(tree, (node) => {
    if (node.type !== 'link' && node.type !== 'image' && node.type !== 'definition') {
      return
    }
    if (isRelativeLink(node.url)) {
      node.url = prefixRelativeLink(node.url, relativeLinkPrefix)
      rewritten += 1
    }
  })
  return rewritten
}

/**
 * Stringifies the tree, matching the original text's trailing newline so
 * version control sees no whitespace-only change at the end of the file.
 */
export function serializeTree(tree: Root, originalContent: string): string {
  let finalContent = stringifier.stringify(tree)

  const originalHadNewline = originalContent.endsWith('\n') || originalContent === ''
  if (finalContent.endsWith('\n') && !originalHadNewline) {
    finalContent = finalContent.slice(0, -1)
  } else if (!finalContent.endsWith('\n') && originalHadNewline) {
    finalContent += '\n'
  }
  return finalContent
}

export async function processMarkdown(
  originalContent: string,
  options: ProcessMarkdownOptions = {},
): Promise<ProcessedMarkdown> {
  const {
    token = '',
    rules = [],
    sortOptions = DEFAULT_SORT_OPTIONS,
    relativeLinkPrefix = '',
    sourceRepository,
    fetcher = {},
    logger = defaultLogger,
    now,
  } = options
  const diagnostics: ProcessingDiagnostics = { warnings: [], errors: [] }

  const contentAfterReplacements = applyTextReplacements(originalContent, rules, {
    logger,
    diagnostics,
  })
  const tree = parseMarkdown(contentAfterReplacements)

  // 1. Collect all unique repository links from the plain document.
  const references = collectRepoReferences(tree)
  logger.info(`Found ${references.size} repository links.`)

  // 2. Fetch everything before touching the tree.
  const metadataMap = await fetchAllRepoMetadata(references, { ...fetcher, token, logger })
  for (const url of references.keys()) {
    if (!metadataMap.has(url)) {
      diagnostics.errors.push(`No repository info for ${url}`)
    }
  }

  // 3. JSON export reflects source order, so it is built before sorting.
  const jsonData = buildJsonOutput(tree, metadataMap, {
    minLinks: sortOptions.minLinks,
    sourceRepository,
    now,
    logger,
  })

  // 4. Rewrite the tree.
  const reordered = sortLists(tree, metadataMap, sortOptions)
  const badgeCount = addInfoBadges(tree, metadataMap)
  const rewrittenLinks = fixRelativeLinks(tree, relativeLinkPrefix)
  logger.debug(
    `Reordered lists: ${reordered}, badges added: ${badgeCount}, relative links rewritten: ${rewrittenLinks}`,
  )

  const treeModified = reordered || badgeCount > 0 || rewrittenLinks > 0
  if (!treeModified && contentAfterReplacements === originalContent) {
    return { finalContent: originalContent, isChanged: false, jsonData, diagnostics }
  }

  // 5. Convert the modified tree back to a string.
  const finalContent = serializeTree(tree, originalContent)
  return {
    finalContent,
    isChanged: finalContent !== originalContent,
    jsonData,
    diagnostics,
  }
}
