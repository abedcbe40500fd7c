import { z } from 'zod'

/**
 * Formats a Zod issue path as a human-readable dot/bracket string.
 *
 * Examples:
 *   []                           → "(root)"
 *   ["structural", "passConfluence"] → "structural.passConfluence"
 *   ["reaches", 3, "id"]         → "reaches[3].id"
 */
export function formatZodPath(path: readonly (string | number)[]): string {
  if (path.length === 0) return '(root)'
  return path
    .map((seg, i) => (typeof seg === 'number' ? `[${seg}]` : i === 0 ? seg : `.${seg}`))
    .join('')
}

/**
 * Formats a list of Zod issues into a multi-line indented string, one line
 * per issue with its field path and message.
 */
export function formatZodErrors(errors: readonly z.ZodIssue[]): string {
  return errors
    .map((issue) => `  ${formatZodPath(issue.path)}: ${issue.message}`)
    .join('\n')
}

/** Extracts a printable reason from any thrown value. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message
  if (typeof err === 'string') return err
  return String(err)
}
