/**
 * Automaton completion (totalizing the transition function).
 * @packageDocumentation
 */

import type { DFA, NFA, FiniteAutomaton } from '../model'
import { createEmptyLike } from '../model'
import type { StateLabel, TransformOptions } from '../types'
import { createDebugLog } from '../util/logger'

/**
 * Make an automaton complete by adding a sink state for missing transitions.
 *
 * A complete automaton has at least one transition (exactly one, for a DFA)
 * for each symbol from each state. States are relabelled `0..n-1` in
 * insertion order. If any transition is missing, a non-final sink state
 * labelled `n` is added with a self-loop on every symbol, and every missing
 * `(state, symbol)` pair is sent to it. An already complete automaton comes
 * back as a structurally identical copy, so completion is idempotent.
 *
 * The result is marked complete (see `hasBeenCompleted`).
 *
 * @param automaton - The automaton to complete
 * @param options - Debug logging options
 * @returns A new complete automaton of the same kind
 *
 * @public
 */
export function complete<L extends StateLabel>(automaton: DFA<L>, options?: TransformOptions): DFA<number>
export function complete<L extends StateLabel>(automaton: NFA<L>, options?: TransformOptions): NFA<number>
export function complete<L extends StateLabel>(
  automaton: FiniteAutomaton<L>,
  options?: TransformOptions,
): FiniteAutomaton<number>
export function complete<L extends StateLabel>(
  automaton: FiniteAutomaton<L>,
  options: TransformOptions = {},
): FiniteAutomaton<number> {
  const debug = createDebugLog('[complete]', options)
  const result = createEmptyLike<number>(automaton.kind, automaton.alphabet)

  const relabel = new Map<L, number>()
  for (const state of automaton.states()) {
    relabel.set(state.label, relabel.size)
    result.addState(relabel.size - 1, { initial: state.initial, final: state.final })
  }
  const target = (label: L): number => relabel.get(label) ?? -1

  for (const { from, symbol, to } of automaton.edges()) {
    result.addTransition([symbol], target(from), target(to))
  }

  const missing = automaton.missingTransitions()
  if (missing.length > 0) {
    // Create a sink state (non-accepting, transitions to self on any input)
    const sink = relabel.size
    result.addState(sink)
    result.addTransition(automaton.alphabet, sink, sink)

    for (const { from, symbol } of missing) {
      result.addTransition([symbol], target(from), sink)
    }
    debug(`redirected ${missing.length} missing transitions to sink state ${sink}`)
  } else {
    debug('already complete')
  }

  return result.markCompleted()
}
