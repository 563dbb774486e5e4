import { isIntegrityViolation, PersistenceError } from "../errors.js"

/**
 * Escape LIKE wildcards so a search term matches literally.
 * Use with `ILIKE $n ESCAPE '\'`.
 */
export function escapeLikePattern(term: string): string {
  return term.replace(/[\\%_]/g, (char) => `\\${char}`)
}

export function containsPattern(term: string): string {
  return `%${escapeLikePattern(term)}%`
}

/**
 * Translate integrity constraint violations raised by `work` into
 * PersistenceError; other errors propagate unchanged.
 */
export async function translateIntegrityErrors<T>(
  entity: string,
  input: Record<string, unknown>,
  work: () => Promise<T>
): Promise<T> {
  try {
    return await work()
  } catch (err) {
    if (isIntegrityViolation(err)) {
      const detail = err instanceof Error ? err.message : String(err)
      throw new PersistenceError(`Failed to create ${entity}: ${detail}`, { entity, input }, { cause: err })
    }
    throw err
  }
}
