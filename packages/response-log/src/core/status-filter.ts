export type StatusFilter = (statusCode: number) => boolean

const allowAll: StatusFilter = () => true

/**
 * Builds a predicate over response statuses. An empty allow-list accepts
 * every status.
 */
export function createStatusFilter(allowed: Iterable<number>): StatusFilter {
  const codes = new Set(allowed)
  if (codes.size === 0) return allowAll

  return (statusCode) => codes.has(statusCode)
}
