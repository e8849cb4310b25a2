import { describeError } from './errors'
import { defaultLogger, type Logger } from './logger'
import type { ProcessingDiagnostics, ReplacementRule } from './types'

const RULE_SEPARATOR = ':::'
const BRANDING_SUFFIX = 'with stars'

// `# Awesome Go`, `# Awesome-Go`
const BRANDING_PATTERN = /^# (Awesome[ -][^\r\n]+?)(\r?)$/gm

function parseRuleLines(raw: string, type: 'literal' | 'regex'): ReplacementRule[] {
  return raw
    .split('\n')
    .filter((line) => line.trim() && line.includes(RULE_SEPARATOR))
    .map((line) => {
      const [find, ...rest] = line.split(RULE_SEPARATOR)
      return { type, find, replace: rest.join(RULE_SEPARATOR) }
    })
}

/**
 * Parses newline-separated `find:::replace` pairs. Literal rules come first,
 * then regex rules, each in the order given.
 */
export function parseReplacementRules(
  findAndReplaceRaw = '',
  regexFindAndReplaceRaw = '',
): ReplacementRule[] {
  return [
    ...parseRuleLines(findAndReplaceRaw, 'literal'),
    ...parseRuleLines(regexFindAndReplaceRaw, 'regex'),
  ]
}

function applyBranding(content: string): string {
  return content.replace(BRANDING_PATTERN, (line: string, title: string, lineEnd: string) =>
    title.trimEnd().endsWith(BRANDING_SUFFIX) ? line : `# ${title} ${BRANDING_SUFFIX}${lineEnd}`,
  )
}

export interface ReplacementOptions {
  logger?: Logger
  diagnostics?: ProcessingDiagnostics
}

export function applyTextReplacements(
  content: string,
  rules: ReplacementRule[],
  options: ReplacementOptions = {},
): string {
  const { logger = defaultLogger, diagnostics } = options
  const warn = (message: string) => {
    logger.warn(message)
    diagnostics?.warnings.push(message)
  }
  let processedContent = content

  for (const rule of rules) {
    if (rule.type === 'branding') {
      logger.debug('Applying default branding replacement for title.')
      processedContent = applyBranding(processedContent)
      continue
    }

    if (!rule.find) {
      warn(`Skipping ${rule.type} replacement with an empty pattern.`)
      continue
    }

    if (rule.type === 'literal') {
      logger.debug(`Applying literal replacement: '${rule.find}' -> '${rule.replace}'`)
      processedContent = processedContent.replaceAll(rule.find, rule.replace)
      continue
    }

    let regex: RegExp
    try {
      regex = new RegExp(rule.find, 'gm')
    } catch (error) {
      warn(`Skipping invalid regex pattern '${rule.find}': ${describeError(error)}`)
      continue
    }
    logger.debug(`Applying regex replacement: /${rule.find}/gm -> '${rule.replace}'`)
    processedContent = processedContent.replace(regex, rule.replace)
  }

  return processedContent
}
