import { CONTINUE, EXIT, visit } from 'unist-util-visit'
import type { ListItem, Paragraph, Root } from 'mdast'
import { parseRepoUrl } from './urlUtils'
import type { RepoReference } from './types'

/**
 * Collects every repository link in the tree, keyed by its literal URL.
 * Code spans and fenced code never yield link nodes, so their contents are
 * left alone.
 */
export function collectRepoReferences(tree: Root): Map<string, RepoReference> {
  const references = new Map<string, RepoReference>()

  visit(tree, 'link', (node) => {
    if (references.has(node.url)) {
      return
    }
    const parsed = parseRepoUrl(node.url)
    if (parsed) {
      references.set(node.url, { url: node.url, ...parsed })
    }
  })

  return references
}

/**
 * URL of the first repository link under `node`, in document order.
 */
export function findFirstRepoLink(node: ListItem | Paragraph): string | undefined {
  let linkUrl: string | undefined

  visit(node, 'link', (link) => {
    if (parseRepoUrl(link.url)) {
      linkUrl = link.url
      return EXIT
    }
    return CONTINUE
  })

  return linkUrl
}
