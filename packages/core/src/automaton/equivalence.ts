/**
 * Language equivalence.
 * @packageDocumentation
 */

import type { FiniteAutomaton } from '../model'
import type { StateLabel } from '../types'
import { complement } from './complement'
import { isEmpty } from './emptiness'
import { intersect } from './intersect'
import type { DeterminizeOptions } from './determinize'

/**
 * Check whether two automata accept the same language.
 *
 * L(A) = L(B) iff both A ∩ B̄ and Ā ∩ B are empty.
 *
 * @param a - First automaton
 * @param b - Second automaton
 * @param options - Options forwarded to determinization
 * @returns true if the languages are equal
 * @throws AutomatonError `ALPHABET_MISMATCH` if the alphabets differ
 * @throws AutomatonError `NO_INITIAL_STATE` if either input has no initial state
 *
 * @public
 */
export function areEquivalent<A extends StateLabel, B extends StateLabel>(
  a: FiniteAutomaton<A>,
  b: FiniteAutomaton<B>,
  options: DeterminizeOptions = {},
): boolean {
  return isEmpty(intersect(a, complement(b, options), options)) && isEmpty(intersect(complement(a, options), b, options))
}
