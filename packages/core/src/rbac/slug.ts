/**
 * Permission slug parsing and matching.
 *
 * Slugs come in two spellings, `books.create` and `books_create`. They name
 * the same permission for access checks but are stored exactly as seeded.
 *
 * @packageDocumentation
 */

export type SlugSeparator = "." | "_"

export interface ParsedSlug {
  resource: string
  action: string
  separator: SlugSeparator
}

/**
 * Split at the first separator, so `books_bulk_update` is
 * resource `books`, action `bulk_update`.
 */
export function parsePermissionSlug(slug: string): ParsedSlug | undefined {
  const dot = slug.indexOf(".")
  const underscore = slug.indexOf("_")
  const positions = [dot, underscore].filter((i) => i > 0)
  if (positions.length === 0) return undefined

  const index = Math.min(...positions)
  const action = slug.slice(index + 1)
  if (action === "") return undefined

  return {
    resource: slug.slice(0, index),
    action,
    separator: index === dot ? "." : "_",
  }
}

/**
 * The slug followed by its spelling under the other separator
 */
export function slugAliases(slug: string): string[] {
  const parsed = parsePermissionSlug(slug)
  if (!parsed) return [slug]
  const other = parsed.separator === "." ? "_" : "."
  return [slug, `${parsed.resource}${other}${parsed.action}`]
}

/**
 * Does a granted slug satisfy a required one?
 *
 * Exact match under either separator, or a wildcard grant. `*` and `*.*`
 * cover everything, `books.*` covers every books action and `*.read` covers
 * read on every resource.
 */
export function slugMatches(granted: string, required: string): boolean {
  if (granted === "*" || granted === required) return true

  const g = parsePermissionSlug(granted)
  const r = parsePermissionSlug(required)
  if (!g || !r) return false

  const resource = g.resource === "*" || g.resource === r.resource
  const action = g.action === "*" || g.action === r.action
  return resource && action
}

export function hasMatchingSlug(granted: Iterable<string>, required: string): boolean {
  for (const slug of granted) {
    if (slugMatches(slug, required)) return true
  }
  return false
}
