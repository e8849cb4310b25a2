import { visit } from 'unist-util-visit'
import type { List, ListItem, Root } from 'mdast'
import { findFirstRepoLink } from './references'
import type { RepoMetadata, SortBy, SortOptions } from './types'

interface EnrichedListItem {
  node: ListItem
  metadata: RepoMetadata | null
}

export function countRepoItems(list: List): number {
  return list.children.filter((item) => findFirstRepoLink(item) !== undefined).length
}

function metricOf(metadata: RepoMetadata, by: Exclude<SortBy, ''>): number {
  if (by === 'stars') {
    return metadata.stars
  }
  const pushed = metadata.lastPushed ? Date.parse(metadata.lastPushed) : 0
  return Number.isNaN(pushed) ? 0 : pushed
}

function compareItems(a: EnrichedListItem, b: EnrichedListItem, by: Exclude<SortBy, ''>): number {
  if (!a.metadata || !b.metadata) {
    // Items without metadata sink, keeping their relative order
    return Number(!a.metadata) - Number(!b.metadata)
  }
  return metricOf(b.metadata, by) - metricOf(a.metadata, by)
}

/**
 * Reorders the items of every list that holds at least `minLinks` repository
 * items, most popular (or most recently pushed) first. Nested lists are sorted
 * on their own and move along with their parent item.
 *
 * @returns whether any list changed order
 */
export function sortLists(
  tree: Root,
  metadataMap: Map<string, RepoMetadata>,
  options: SortOptions,
): boolean {
  const { by, minLinks } = options
  if (!by) {
    return false
  }

  let changed = false

  visit(tree, 'list', (list) => {
    if (countRepoItems(list) < minLinks) {
      return
    }

    const enrichedItems: EnrichedListItem[] = list.children.map((node) => {
      const url = findFirstRepoLink(node)
      return { node, metadata: url ? metadataMap.get(url) ?? null : null }
    })

    // Array.prototype.sort is stable, so ties keep source order
    enrichedItems.sort((a, b) => compareItems(a, b, by))

    const sorted = enrichedItems.map((item) => item.node)
    if (sorted.some((node, index) => node !== list.children[index])) {
      list.children = sorted
      changed = true
    }
  })

  return changed
}
