/**
 * Canonical keys for sets of states.
 * @packageDocumentation
 */

import type { StateLabel } from '../types'

/**
 * Assigns every label of an automaton its position in insertion order, so
 * that sets of labels of any type can be keyed by sorted integers.
 */
export class StateOrdinals<L extends StateLabel> {
  private readonly ordinals = new Map<L, number>()

  constructor(labels: Iterable<L>) {
    for (const label of labels) {
      this.ordinals.set(label, this.ordinals.size)
    }
  }

  /** Ordinal of a label, or -1 for a label that is not known. */
  ordinal(label: L): number {
    return this.ordinals.get(label) ?? -1
  }

  /**
   * Serialize a state set to a string key for map lookup.
   * Equal sets produce equal keys regardless of iteration order.
   */
  key(stateSet: Iterable<L>): string {
    return [...stateSet]
      .map((label) => this.ordinal(label))
      .sort((a, b) => a - b)
      .join(',')
  }
}

/**
 * Check whether two sets share at least one member.
 */
export function intersects<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): boolean {
  const [small, large] = a.size <= b.size ? [a, b] : [b, a]
  for (const item of small) {
    if (large.has(item)) return true
  }
  return false
}
