export interface RepoReference {
  url: string
  owner: string
  name: string
}

export interface RepoMetadata {
  stars: number
  openIssues: number
  language: string | null
  archived: boolean
  lastPushed: string | null
}

export type ReplacementRule =
  | {
      type: 'literal' | 'regex'
      find: string
      replace: string
    }
  | { type: 'branding' }

export type SortBy = 'stars' | 'last_commit' | ''

export interface SortOptions {
  by: SortBy
  minLinks: number
}

export interface JsonRepoInfo {
  owner: string
  name: string
  stars: number
  language: string | null
  archived: boolean
  lastPushed: string | null
}

export interface JsonItem {
  title: string
  description: string
  children: JsonItem[]
  repoInfo?: JsonRepoInfo
}

export interface JsonSection {
  title: string
  description: string
  items: JsonItem[]
}

export interface JsonOutput {
  metadata: {
    title: string
    generatedAt: string
    sourceRepository?: string
  }
  items: JsonSection[]
}

export interface ProcessingDiagnostics {
  warnings: string[]
  errors: string[]
}

export interface ProcessedMarkdown {
  finalContent: string
  isChanged: boolean
  jsonData: JsonOutput
  diagnostics: ProcessingDiagnostics
}
