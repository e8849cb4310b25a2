import { format } from 'date-fns'
import { UTCDate } from '@date-fns/utc'
import { visit } from 'unist-util-visit'
import type { Parents, PhrasingContent, Root, Text } from 'mdast'
import type { RepoMetadata } from './types'

export const ARCHIVED_MARKER = '⚠️ Archived'
export const METRICS_MARKER = '⭐'

type PhrasingParent = Extract<Parents, { children: PhrasingContent[] }>

const phrasingParentTypes = new Set([
  'paragraph',
  'heading',
  'emphasis',
  'strong',
  'delete',
  'link',
  'linkReference',
  'tableCell',
])

function isPhrasingParent(node: Parents): node is PhrasingParent {
  return phrasingParentTypes.has(node.type)
}

export function formatPushedDate(isoString: string | null): string {
  if (!isoString) {
    return ''
  }
  const date = new UTCDate(isoString)
  if (Number.isNaN(date.getTime())) {
    return ''
  }
  return format(date, 'yyyy-MM-dd')
}

export function formatBadge(metadata: RepoMetadata): string {
  if (metadata.archived) {
    return ` ${ARCHIVED_MARKER}`
  }

  const parts: string[] = [
    `${METRICS_MARKER} ${metadata.stars.toLocaleString('en-US')}`,
    `🐛 ${metadata.openIssues.toLocaleString('en-US')}`,
  ]
  if (metadata.language) {
    parts.push(`🌐 ${metadata.language}`)
  }
  const pushed = formatPushedDate(metadata.lastPushed)
  if (pushed) {
    parts.push(`📅 ${pushed}`)
  }
  return ` ${parts.join(' | ')}`
}

// A badge as written by `formatBadge`. The language may contain spaces, so it
// ends at the date field, a description separator or the end of the text.
const BADGE_PREFIX =
  /^\s*(?:⚠️ Archived|⭐ [\d,]+ \| 🐛 [\d,]+(?: \| 🌐 (?:[^|]*?(?= \| 📅)|[^|]*?(?=\s+[-–—:]\s|\s*$)))?(?: \| 📅 \d{4}-\d{2}-\d{2})?)/u

export function startsWithBadge(value: string): boolean {
  const trimmed = value.trimStart()
  return trimmed.startsWith(METRICS_MARKER) || trimmed.startsWith(ARCHIVED_MARKER)
}

/**
 * Removes a leading badge from text that follows a link, leaving the rest.
 */
export function stripBadge(value: string): string {
  return startsWithBadge(value) ? value.replace(BADGE_PREFIX, '') : value
}

function hasExistingBadge(parent: PhrasingParent, index: number): boolean {
  const next = parent.children[index + 1]
  return next?.type === 'text' && startsWithBadge(next.value)
}

/**
 * Inserts a badge text node right after every link that has metadata.
 * Insertions are planned during the walk and applied afterwards, last index
 * first, so sibling indexes stay valid.
 */
export function addInfoBadges(tree: Root, metadataMap: Map<string, RepoMetadata>): number {
  const modifications = new Map<PhrasingParent, Array<{ node: Text; index: number }>>()

  visit(tree, 'link', (node, index, parent) => {
    if (index === undefined || !parent || !isPhrasingParent(parent)) {
      return
    }

    const metadata = metadataMap.get(node.url)
    if (!metadata || hasExistingBadge(parent, index)) {
      return
    }

    const planned = modifications.get(parent) ?? []
    planned.push({ node: { type: 'text', value: formatBadge(metadata) }, index: index + 1 })
    modifications.set(parent, planned)
  })

  let inserted = 0
  for (const [parent, changes] of modifications) {
    changes.sort((a, b) => b.index - a.index)
    for (const { node, index } of changes) {
      parent.children.splice(index, 0, node)
      inserted += 1
    }
  }
  return inserted
}
