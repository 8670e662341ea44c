/**
 * Reachability analysis.
 * @packageDocumentation
 */

import type { DFA, NFA, FiniteAutomaton } from '../model'
import { createEmptyLike } from '../model'
import type { StateLabel } from '../types'

/**
 * Find all states reachable from the initial states, in breadth-first order.
 *
 * @public
 */
export function findReachableStates<L extends StateLabel>(automaton: FiniteAutomaton<L>): L[] {
  const reachable = new Set<L>(automaton.initialStates())
  const queue = [...reachable]

  for (let next = 0; next < queue.length; next++) {
    const label = queue[next]
    for (const symbol of automaton.alphabet) {
      for (const target of automaton.successors(label, symbol)) {
        if (!reachable.has(target)) {
          reachable.add(target)
          queue.push(target)
        }
      }
    }
  }

  return queue
}

/**
 * Restrict an automaton to the states reachable from its initial states.
 *
 * Labels, flags and edges between kept states are unchanged; states keep
 * their original relative order.
 *
 * @param automaton - The automaton to trim
 * @returns A new automaton of the same kind
 *
 * @public
 */
export function reachablePart<L extends StateLabel>(automaton: DFA<L>): DFA<L>
export function reachablePart<L extends StateLabel>(automaton: NFA<L>): NFA<L>
export function reachablePart<L extends StateLabel>(automaton: FiniteAutomaton<L>): FiniteAutomaton<L>
export function reachablePart<L extends StateLabel>(automaton: FiniteAutomaton<L>): FiniteAutomaton<L> {
  const reachable = new Set(findReachableStates(automaton))
  const result = createEmptyLike<L>(automaton.kind, automaton.alphabet)

  for (const state of automaton.states()) {
    if (reachable.has(state.label)) {
      result.addState(state.label, { initial: state.initial, final: state.final })
    }
  }
  for (const { from, symbol, to } of automaton.edges()) {
    if (reachable.has(from)) {
      result.addTransition([symbol], from, to)
    }
  }

  if (automaton.hasBeenCompleted()) {
    result.markCompleted()
  }
  return result
}
