/**
 * Sorting list items by stars or last push
 */

import type { List, Paragraph, Root } from 'mdast'
import { sortLists } from '../enhancer/src/utils/listSorter'
import { parseMarkdown } from '../enhancer/src/utils/markdownProcessor'
import { findFirstRepoLink } from '../enhancer/src/utils/references'
import type { RepoMetadata } from '../enhancer/src/utils/types'

function repo(stars: number, lastPushed: string | null = null): RepoMetadata {
  return { stars, openIssues: 0, language: null, archived: false, lastPushed }
}

function metadataFor(entries: Record<string, RepoMetadata>) {
  return new Map(
    Object.entries(entries).map(([name, metadata]): [string, RepoMetadata] => [
      `https://github.com/o/${name}`,
      metadata,
    ]),
  )
}

function topList(tree: Root): List {
  const list = tree.children.find((node): node is List => node.type === 'list')
  if (!list) {
    throw new Error('no list in document')
  }
  return list
}

// Repository name of each item's own link, ignoring nested lists
function names(list: List): string[] {
  return list.children.map((item) => {
    const paragraph = item.children.find((child): child is Paragraph => child.type === 'paragraph')
    const url = paragraph ? findFirstRepoLink(paragraph) : undefined
    return url ? url.replace('https://github.com/o/', '') : '-'
  })
}

const threeRepos = [
  '- [a](https://github.com/o/a)',
  '- [b](https://github.com/o/b)',
  '- [c](https://github.com/o/c)',
].join('\n')

describe('sortLists', () => {
  it('orders items by stars, highest first', () => {
    const tree = parseMarkdown(threeRepos)
    const metadata = metadataFor({ a: repo(300), b: repo(100), c: repo(200) })

    const changed = sortLists(tree, metadata, { by: 'stars', minLinks: 2 })

    expect(changed).toBe(true)
    expect(names(topList(tree))).toEqual(['a', 'c', 'b'])
  })

  it('orders items by last push, most recent first', () => {
    const tree = parseMarkdown(threeRepos)
    const metadata = metadataFor({
      a: repo(1, '2024-01-01T00:00:00Z'),
      b: repo(1, '2025-01-01T00:00:00Z'),
      c: repo(1),
    })

    sortLists(tree, metadata, { by: 'last_commit', minLinks: 2 })

    expect(names(topList(tree))).toEqual(['b', 'a', 'c'])
  })

  it('moves items without metadata to the end in their original order', () => {
    const tree = parseMarkdown(
      [
        '- [x](https://github.com/o/x)',
        '- [a](https://github.com/o/a)',
        '- plain entry',
        '- [b](https://github.com/o/b)',
      ].join('\n'),
    )
    const metadata = metadataFor({ a: repo(100), b: repo(200) })

    sortLists(tree, metadata, { by: 'stars', minLinks: 2 })

    expect(names(topList(tree))).toEqual(['b', 'a', 'x', '-'])
  })

  it('keeps tied items in source order', () => {
    const tree = parseMarkdown(threeRepos)
    const metadata = metadataFor({ a: repo(5), b: repo(9), c: repo(5) })

    sortLists(tree, metadata, { by: 'stars', minLinks: 2 })

    expect(names(topList(tree))).toEqual(['b', 'a', 'c'])
  })

  it('sorts nested lists on their own and keeps them under their parent', () => {
    const tree = parseMarkdown(
      [
        '- [a](https://github.com/o/a)',
        '  - [n1](https://github.com/o/n1)',
        '  - [n2](https://github.com/o/n2)',
        '- [b](https://github.com/o/b)',
      ].join('\n'),
    )
    const metadata = metadataFor({ a: repo(10), b: repo(20), n1: repo(1), n2: repo(2) })

    sortLists(tree, metadata, { by: 'stars', minLinks: 2 })

    const outer = topList(tree)
    expect(names(outer)).toEqual(['b', 'a'])
    const inner = outer.children[1].children.find((node): node is List => node.type === 'list')
    expect(inner && names(inner)).toEqual(['n2', 'n1'])
  })

  it('leaves lists below the threshold untouched', () => {
    const tree = parseMarkdown(['- [a](https://github.com/o/a)', '- just text'].join('\n'))
    const metadata = metadataFor({ a: repo(1) })

    const changed = sortLists(tree, metadata, { by: 'stars', minLinks: 2 })

    expect(changed).toBe(false)
    expect(names(topList(tree))).toEqual(['a', '-'])
  })

  it('does nothing without a sort key', () => {
    const tree = parseMarkdown(threeRepos)
    const metadata = metadataFor({ a: repo(1), b: repo(2), c: repo(3) })

    expect(sortLists(tree, metadata, { by: '', minLinks: 0 })).toBe(false)
    expect(names(topList(tree))).toEqual(['a', 'b', 'c'])
  })

  it('reports no change when the list is already in order', () => {
    const tree = parseMarkdown(threeRepos)
    const metadata = metadataFor({ a: repo(3), b: repo(2), c: repo(1) })

    expect(sortLists(tree, metadata, { by: 'stars', minLinks: 2 })).toBe(false)
  })
})
