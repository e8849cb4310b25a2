import yaml from 'js-yaml'
import { EXIT, visit } from 'unist-util-visit'
import { toString } from 'mdast-util-to-string'
import type { Link, List, ListItem, Paragraph, PhrasingContent, Root } from 'mdast'
import { stripBadge } from './badges'
import { describeError } from './errors'
import { countRepoItems } from './listSorter'
import { defaultLogger, type Logger } from './logger'
import { findFirstRepoLink } from './references'
import { parseRepoUrl } from './urlUtils'
import type { JsonItem, JsonOutput, JsonRepoInfo, JsonSection, RepoMetadata } from './types'

export interface JsonBuildOptions {
  minLinks: number
  sourceRepository?: string
  now?: () => Date
  logger?: Logger
}

const BACK_TO_TOP_PATTERN = /back to top/i

function readFrontmatterTitle(tree: Root, logger: Logger): string {
  for (const node of tree.children) {
    if (node.type !== 'yaml') {
      continue
    }
    try {
      const data: unknown = yaml.load(node.value)
      if (typeof data === 'object' && data !== null && 'title' in data && typeof data.title === 'string') {
        return data.title.trim()
      }
    } catch (error) {
      logger.warn(`Failed to parse YAML frontmatter: ${describeError(error)}`)
    }
  }
  return ''
}

/**
 * Document title: the first level-1 heading, else the frontmatter `title`.
 */
export function extractTitle(tree: Root, logger: Logger = defaultLogger): string {
  for (const node of tree.children) {
    if (node.type === 'heading' && node.depth === 1) {
      return toString(node).trim()
    }
  }
  return readFrontmatterTitle(tree, logger)
}

function findFirstLink(paragraph: Paragraph): Link | undefined {
  let found: Link | undefined
  visit(paragraph, 'link', (node) => {
    found = node
    return EXIT
  })
  return found
}

/**
 * Inline text of `nodes` without the title link. Badges written after links
 * on an earlier run are dropped, so re-running on enhanced output exports the
 * same descriptions.
 */
function inlineText(nodes: PhrasingContent[], titleLink: Link): string {
  return nodes
    .map((node, index) => {
      if (node === titleLink) {
        return ''
      }
      if (node.type === 'text') {
        return index > 0 && nodes[index - 1].type === 'link' ? stripBadge(node.value) : node.value
      }
      if ('children' in node) {
        return inlineText(node.children, titleLink)
      }
      return toString(node)
    })
    .join('')
}

function cleanDescription(value: string): string {
  return value.trim().replace(/^[-–—:]\s*/, '').trim()
}

function buildRepoInfo(
  url: string | undefined,
  metadataMap: Map<string, RepoMetadata>,
): JsonRepoInfo | undefined {
  if (!url) {
    return undefined
  }
  const metadata = metadataMap.get(url)
  const identity = parseRepoUrl(url)
  if (!metadata || !identity) {
    return undefined
  }
  return {
    owner: identity.owner,
    name: identity.name,
    stars: metadata.stars,
    language: metadata.language,
    archived: metadata.archived,
    lastPushed: metadata.lastPushed,
  }
}

function buildJsonItem(item: ListItem, metadataMap: Map<string, RepoMetadata>): JsonItem {
  const paragraph = item.children.find((child): child is Paragraph => child.type === 'paragraph')
  const children = item.children
    .filter((child): child is List => child.type === 'list')
    .flatMap((list) => list.children.map((child) => buildJsonItem(child, metadataMap)))

  let title = ''
  let description = ''
  if (paragraph) {
    const link = findFirstLink(paragraph)
    if (link) {
      title = toString(link).trim()
      description = cleanDescription(inlineText(paragraph.children, link))
    } else {
      title = toString(paragraph).trim()
    }
  }

  const jsonItem: JsonItem = { title, description, children }
  const repoInfo = buildRepoInfo(paragraph ? findFirstRepoLink(paragraph) : undefined, metadataMap)
  if (repoInfo) {
    jsonItem.repoInfo = repoInfo
  }
  return jsonItem
}

/**
 * Builds the structured export from the top-level blocks in source order.
 * Each heading below level 1 opens a section; its first list becomes the
 * section items when it holds at least `minLinks` repository items.
 */
export function buildJsonOutput(
  tree: Root,
  metadataMap: Map<string, RepoMetadata>,
  options: JsonBuildOptions,
): JsonOutput {
  const { minLinks, sourceRepository, now = () => new Date(), logger = defaultLogger } = options
  const sections: JsonSection[] = []

  let current: { title: string; descriptions: string[]; listSeen: boolean } | null = null

  for (const node of tree.children) {
    if (node.type === 'heading') {
      current =
        node.depth === 1
          ? null
          : { title: toString(node).trim(), descriptions: [], listSeen: false }
      continue
    }

    if (!current || current.listSeen) {
      continue
    }

    if (node.type === 'paragraph') {
      const text = toString(node).trim()
      if (text && !BACK_TO_TOP_PATTERN.test(text)) {
        current.descriptions.push(text)
      }
      continue
    }

    if (node.type === 'list') {
      current.listSeen = true
      if (countRepoItems(node) < minLinks) {
        logger.debug(`Section "${current.title}" has fewer than ${minLinks} repository links; not exported.`)
        continue
      }
      sections.push({
        title: current.title,
        description: current.descriptions.join('\n\n'),
        items: node.children.map((item) => buildJsonItem(item, metadataMap)),
      })
    }
  }

  const metadata: JsonOutput['metadata'] = {
    title: extractTitle(tree, logger),
    generatedAt: now().toISOString(),
  }
  if (sourceRepository) {
    metadata.sourceRepository = sourceRepository
  }

  return { metadata, items: sections }
}
