/**
 * Automaton emptiness checking and witness finding.
 * @packageDocumentation
 */

import type { FiniteAutomaton } from '../model'
import type { AlphabetSymbol, StateLabel } from '../types'
import { findReachableStates } from './reachable'

/**
 * Check if an automaton's language is empty.
 *
 * Uses reachability analysis from the initial states to any accepting state.
 *
 * @param automaton - The automaton to check
 * @returns true if the automaton accepts no words
 *
 * @public
 */
export function isEmpty<L extends StateLabel>(automaton: FiniteAutomaton<L>): boolean {
  return !findReachableStates(automaton).some((label) => automaton.isFinal(label))
}

/**
 * Find a shortest word accepted by the automaton.
 *
 * Breadth-first search over states from the initial states, trying symbols
 * in alphabet order, so ties resolve to the alphabetically first word.
 *
 * @param automaton - The automaton to find a witness for
 * @returns A witness word (empty array for the empty word), or undefined if the language is empty
 *
 * @public
 */
export function findWitness<L extends StateLabel>(automaton: FiniteAutomaton<L>): AlphabetSymbol[] | undefined {
  // How each state was first reached: previous state and symbol
  const parent = new Map<L, { from: L; symbol: AlphabetSymbol } | null>()
  const queue: L[] = []

  for (const label of automaton.initialStates()) {
    parent.set(label, null)
    queue.push(label)
  }

  for (let next = 0; next < queue.length; next++) {
    const label = queue[next]

    if (automaton.isFinal(label)) {
      return spellPath(parent, label)
    }

    for (const symbol of automaton.alphabet) {
      for (const target of automaton.successors(label, symbol)) {
        if (!parent.has(target)) {
          parent.set(target, { from: label, symbol })
          queue.push(target)
        }
      }
    }
  }

  return undefined // No accepting state found
}

function spellPath<L extends StateLabel>(
  parent: ReadonlyMap<L, { from: L; symbol: AlphabetSymbol } | null>,
  end: L,
): AlphabetSymbol[] {
  const word: AlphabetSymbol[] = []
  let step = parent.get(end)
  while (step) {
    word.push(step.symbol)
    step = parent.get(step.from)
  }
  return word.reverse()
}
