import type { RoutingRule } from './types.js'

/**
 * Listener rule priorities
 *
 * A load balancer evaluates listener rules in priority order (lowest first),
 * and no two rules may share a priority. Rules are ranked by path specificity
 * so a catch-all never shadows a narrower path:
 * 1. Exact paths (no wildcards)
 * 2. More path segments
 * 3. Wildcard paths last
 * 4. Longer patterns
 * Remaining ties fall back to the path, then the application name, so every
 * workspace member computes the same numbering.
 */

const MAX_PRIORITY = 50000

function isExact(path: string): boolean {
  return !path.includes('*') && !path.includes('?')
}

function segmentCount(path: string): number {
  return path.split('/').filter(Boolean).length
}

function compareBySpecificity(a: RoutingRule, b: RoutingRule): number {
  const isExactA = isExact(a.path)
  const isExactB = isExact(b.path)
  if (isExactA && !isExactB) return -1
  if (!isExactA && isExactB) return 1

  // More segments = more specific
  const segmentsA = segmentCount(a.path)
  const segmentsB = segmentCount(b.path)
  if (segmentsA !== segmentsB) return segmentsB - segmentsA

  const hasWildcardA = a.path.includes('*')
  const hasWildcardB = b.path.includes('*')
  if (hasWildcardA && !hasWildcardB) return 1
  if (!hasWildcardA && hasWildcardB) return -1

  if (a.path.length !== b.path.length) return b.path.length - a.path.length

  if (a.path !== b.path) return a.path < b.path ? -1 : 1
  if (a.app !== b.app) return a.app < b.app ? -1 : 1
  return 0
}

/**
 * Assign a unique priority, starting at 1, to every application's rule.
 */
export function allocateRulePriorities(rules: RoutingRule[]): Map<string, number> {
  const unique = new Map<string, RoutingRule>()
  for (const rule of rules) {
    unique.set(rule.app, rule)
  }

  const ordered = [...unique.values()].sort(compareBySpecificity)
  if (ordered.length > MAX_PRIORITY) {
    throw new RangeError(`Cannot allocate more than ${MAX_PRIORITY} listener rule priorities`)
  }
  return new Map(ordered.map((rule, index) => [rule.app, index + 1]))
}

/**
 * Priority of `own` among its sibling rules. `own` replaces any sibling entry
 * for the same application.
 */
export function rulePriorityFor(own: RoutingRule, siblings: RoutingRule[] = []): number {
  const others = siblings.filter(rule => rule.app !== own.app)
  const priorities = allocateRulePriorities([...others, own])
  return priorities.get(own.app) ?? 1
}
