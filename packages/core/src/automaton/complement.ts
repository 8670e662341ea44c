/**
 * DFA complement operation.
 * @packageDocumentation
 */

import type { FiniteAutomaton } from '../model'
import { DFA } from '../model'
import type { StateLabel } from '../types'
import { complete } from './complete'
import { determinize, type DeterminizeOptions } from './determinize'

/**
 * Complement an automaton by swapping accepting and non-accepting states.
 *
 * The complemented automaton accepts exactly the words over the alphabet
 * that the input rejects, and vice versa. The input is determinized and
 * completed first, since swapping finality is only sound on a complete DFA.
 *
 * @param automaton - The automaton to complement
 * @param options - Options forwarded to determinization
 * @returns Complemented complete DFA
 * @throws AutomatonError `NO_INITIAL_STATE` if the input has no initial state
 *
 * @public
 */
export function complement<L extends StateLabel>(
  automaton: FiniteAutomaton<L>,
  options: DeterminizeOptions = {},
): DFA<number> {
  const dfa = complete(determinize(automaton, options), options)

  const complemented = new DFA<number>(dfa.alphabet)
  for (const state of dfa.states()) {
    complemented.addState(state.label, { initial: state.initial, final: !state.final })
  }
  for (const { from, symbol, to } of dfa.edges()) {
    complemented.addTransition([symbol], from, to)
  }

  return complemented.markCompleted()
}
