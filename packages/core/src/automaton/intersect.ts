/**
 * Automaton intersection using product construction, and NFA union.
 * @packageDocumentation
 */

import type { Alphabet } from '../alphabet'
import type { FiniteAutomaton } from '../model'
import { DFA, NFA } from '../model'
import type { StateLabel } from '../types'
import { AutomatonError } from '../types'
import { determinize, type DeterminizeOptions } from './determinize'

/**
 * Compute the intersection of two automata using product construction.
 *
 * The resulting automaton accepts a word iff both input automata accept it.
 * L(A ∩ B) = L(A) ∩ L(B)
 *
 * Both inputs are determinized first. Product states are pairs of DFA
 * states, labelled in breadth-first discovery order from the pair of initial
 * states. The result is partial wherever either side is.
 *
 * @param a - First automaton
 * @param b - Second automaton
 * @param options - Options forwarded to determinization
 * @returns Intersection DFA
 * @throws AutomatonError `ALPHABET_MISMATCH` if the alphabets differ
 * @throws AutomatonError `NO_INITIAL_STATE` if either input has no initial state
 *
 * @public
 */
export function intersect<A extends StateLabel, B extends StateLabel>(
  a: FiniteAutomaton<A>,
  b: FiniteAutomaton<B>,
  options: DeterminizeOptions = {},
): DFA<number> {
  const alphabet = requireSameAlphabet(a.alphabet, b.alphabet)
  const dfaA = determinize(a, options)
  const dfaB = determinize(b, options)

  // Map from (stateA, stateB) pair to product state ID
  const pairToState = new Map<string, number>()
  const pairs: [number, number][] = []
  const product = new DFA<number>(alphabet)

  const getOrCreateState = (sa: number, sb: number): number => {
    const key = `${sa},${sb}`
    let stateId = pairToState.get(key)

    if (stateId === undefined) {
      stateId = pairs.length
      pairToState.set(key, stateId)
      pairs.push([sa, sb])
      product.addState(stateId, { initial: stateId === 0, final: dfaA.isFinal(sa) && dfaB.isFinal(sb) })
    }

    return stateId
  }

  // Both determinized automata have initial state 0
  getOrCreateState(0, 0)

  for (let next = 0; next < pairs.length; next++) {
    const [sa, sb] = pairs[next]
    for (const symbol of alphabet) {
      const ta = dfaA.successor(sa, symbol)
      const tb = dfaB.successor(sb, symbol)
      if (ta !== undefined && tb !== undefined) {
        product.addTransition([symbol], next, getOrCreateState(ta, tb))
      }
    }
  }

  return product
}

/**
 * Compute the union of two automata.
 *
 * The resulting NFA accepts a word iff either input automaton accepts it.
 * L(A ∪ B) = L(A) ∪ L(B)
 *
 * NFAs may have several initial states, so the union is simply both
 * automata side by side: a's states are renumbered `0..m-1`, b's states
 * `m..m+n-1`, in insertion order.
 *
 * @param a - First automaton
 * @param b - Second automaton
 * @returns Union automaton (NFA)
 * @throws AutomatonError `ALPHABET_MISMATCH` if the alphabets differ
 *
 * @public
 */
export function union<A extends StateLabel, B extends StateLabel>(
  a: FiniteAutomaton<A>,
  b: FiniteAutomaton<B>,
): NFA<number> {
  const result = new NFA<number>(requireSameAlphabet(a.alphabet, b.alphabet))
  copyInto(result, a, 0)
  copyInto(result, b, a.size)
  return result
}

/**
 * Copy every state and edge of `source` into `target`, renumbered from `offset`.
 */
function copyInto<L extends StateLabel>(target: NFA<number>, source: FiniteAutomaton<L>, offset: number): void {
  const renumber = new Map<L, number>()
  for (const state of source.states()) {
    const label = offset + renumber.size
    renumber.set(state.label, label)
    target.addState(label, { initial: state.initial, final: state.final })
  }
  for (const { from, symbol, to } of source.edges()) {
    target.addTransition([symbol], renumber.get(from) ?? -1, renumber.get(to) ?? -1)
  }
}

/**
 * Check that two alphabets hold the same symbols.
 *
 * @returns The first alphabet
 * @throws AutomatonError `ALPHABET_MISMATCH`
 */
export function requireSameAlphabet(a: Alphabet, b: Alphabet): Alphabet {
  if (a === b) return a
  if (a.size === b.size && a.symbols.every((symbol) => b.has(symbol))) return a
  throw new AutomatonError(
    'ALPHABET_MISMATCH',
    `Automata are defined over different alphabets: ${a.toString()} and ${b.toString()}`,
  )
}
