import type { FormatDirective } from './reminder-types'
import { ConfigurationError, DirectiveEvaluationError } from './reminder-errors'

const DIRECTIVE_MARKER = '%'
const DIRECTIVE_PATTERN = /%([\s\S])/g

export type DirectiveTable = ReadonlyMap<string, () => unknown>

/**
 * Build a lookup keyed by trigger character. Later entries replace earlier
 * ones with the same character.
 */
export function createDirectiveTable(directives: readonly FormatDirective[]): DirectiveTable {
  const table = new Map<string, () => unknown>()
  for (const directive of directives) {
    if (directive.char.length !== 1) {
      throw new ConfigurationError(
        'directives',
        `Trigger must be a single character, got "${directive.char}"`,
      )
    }
    table.set(directive.char, directive.evaluate)
  }
  return table
}

/**
 * Substitute `%<char>` sequences in `template` with the values of the matching
 * directives. Only directives referenced by the template are evaluated, each
 * at most once. Unknown sequences are left as they are.
 *
 * @throws DirectiveEvaluationError when a referenced directive throws
 */
export function renderTemplate(
  template: string,
  directives: readonly FormatDirective[] | DirectiveTable,
): string {
  if (!template.includes(DIRECTIVE_MARKER)) {
    return template
  }

  const table = isDirectiveTable(directives) ? directives : createDirectiveTable(directives)
  const values = new Map<string, string>()

  for (const [, char] of template.matchAll(DIRECTIVE_PATTERN)) {
    const evaluate = table.get(char)
    if (evaluate === undefined || values.has(char)) {
      continue
    }
    try {
      values.set(char, String(evaluate()))
    } catch (err) {
      throw new DirectiveEvaluationError(char, err)
    }
  }

  return template.replace(DIRECTIVE_PATTERN, (match: string, char: string) => {
    return values.get(char) ?? match
  })
}

function isDirectiveTable(
  directives: readonly FormatDirective[] | DirectiveTable,
): directives is DirectiveTable {
  return directives instanceof Map
}
