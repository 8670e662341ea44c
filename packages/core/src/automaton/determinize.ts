/**
 * NFA to DFA conversion using subset construction.
 * @packageDocumentation
 */

import type { FiniteAutomaton } from '../model'
import { DFA } from '../model'
import type { StateLabel, TransformOptions } from '../types'
import { AutomatonError, AutomatonLimitError } from '../types'
import { createDebugLog } from '../util/logger'
import { StateOrdinals, intersects } from '../util/state-set'

/**
 * Default maximum number of DFA states before throwing an error.
 * This prevents runaway memory use on the exponential worst case.
 *
 * @public
 */
export const DEFAULT_MAX_DFA_STATES = 10_000

/**
 * Options for DFA construction.
 *
 * @public
 */
export interface DeterminizeOptions extends TransformOptions {
  /**
   * Maximum number of DFA states to create before throwing an error.
   * Set to `Infinity` to disable the limit (not recommended).
   * @defaultValue 10000
   */
  maxStates?: number
}

/**
 * Convert an automaton to an equivalent DFA using subset construction.
 *
 * Each DFA state stands for the set of NFA states some run can be in. The
 * initial DFA state is the set of all initial states. Subsets are labelled
 * `0, 1, 2, …` in the order a breadth-first traversal (symbols in alphabet
 * order) discovers them, so the same input always yields the same DFA.
 *
 * The result is left partial: a subset with no successor on a symbol gets no
 * transition. Use `complete` to totalize it.
 *
 * The number of subsets can grow as 2^n for n NFA states.
 *
 * @param automaton - The NFA (or DFA) to determinize
 * @param options - Optional configuration for the conversion
 * @returns An equivalent DFA with fresh integer labels
 * @throws AutomatonError `NO_INITIAL_STATE` if the input has no initial state
 * @throws AutomatonLimitError if DFA state count exceeds the configured limit
 *
 * @public
 */
export function determinize<L extends StateLabel>(
  automaton: FiniteAutomaton<L>,
  options: DeterminizeOptions = {},
): DFA<number> {
  const maxStates = options.maxStates ?? DEFAULT_MAX_DFA_STATES
  const debug = createDebugLog('[determinize]', options)

  const initial = automaton.initialStates()
  if (initial.length === 0) {
    throw new AutomatonError('NO_INITIAL_STATE', 'Cannot determinize an automaton without an initial state')
  }

  const ordinals = new StateOrdinals(automaton.labels())
  const finals = new Set(automaton.finalStates())
  const dfa = new DFA<number>(automaton.alphabet)

  // Subset key -> DFA label
  const stateSetMap = new Map<string, number>()
  const worklist: { dfaStateId: number; nfaStateSet: Set<L> }[] = []

  // Labels a subset on first sight and queues it for expansion
  const getOrCreateState = (nfaStateSet: Set<L>): number => {
    const key = ordinals.key(nfaStateSet)
    let dfaStateId = stateSetMap.get(key)

    if (dfaStateId === undefined) {
      if (dfa.size >= maxStates) {
        throw new AutomatonLimitError(
          'DFA_STATE_LIMIT',
          `Subset construction needs more than ${maxStates} states; raise maxStates to allow it`,
          maxStates,
          dfa.size + 1,
        )
      }

      dfaStateId = dfa.size
      stateSetMap.set(key, dfaStateId)
      dfa.addState(dfaStateId, { initial: dfaStateId === 0, final: intersects(nfaStateSet, finals) })
      worklist.push({ dfaStateId, nfaStateSet })
      debug(`subset {${key}} is state ${dfaStateId}`)
    }

    return dfaStateId
  }

  getOrCreateState(new Set(initial))

  // FIFO: labels follow discovery order
  for (let next = 0; next < worklist.length; next++) {
    const { dfaStateId, nfaStateSet } = worklist[next]

    for (const symbol of automaton.alphabet) {
      const target = new Set<L>()
      for (const label of nfaStateSet) {
        for (const reached of automaton.successors(label, symbol)) {
          target.add(reached)
        }
      }

      if (target.size > 0) {
        dfa.addTransition([symbol], dfaStateId, getOrCreateState(target))
      }
    }
  }

  debug(`${automaton.size} states became ${dfa.size}`)
  return dfa
}
