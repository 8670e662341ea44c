/**
 * Non-deterministic finite automata.
 * @packageDocumentation
 */

import type { Alphabet } from '../alphabet'
import type { AlphabetSymbol, AutomatonOptions, StateLabel } from '../types'
import { FiniteAutomaton } from './automaton'

/**
 * A non-deterministic finite automaton.
 *
 * Any number of states may be initial, and a `(state, symbol)` pair may lead
 * to zero, one or many targets.
 *
 * @public
 */
export class NFA<L extends StateLabel = StateLabel> extends FiniteAutomaton<L> {
  readonly kind = 'nfa' as const

  constructor(alphabet: Alphabet, options: AutomatonOptions = {}) {
    super(alphabet, '[NFA]', options)
  }

  /**
   * Union of the targets of every state in `states` on `symbol`.
   */
  step(states: Iterable<L>, symbol: AlphabetSymbol): Set<L> {
    const reached = new Set<L>()
    for (const label of states) {
      for (const target of this.successors(label, symbol)) {
        reached.add(target)
      }
    }
    return reached
  }

  protected checkNewState(): void {
    // Any number of initial states
  }

  protected checkNewTransition(): void {
    // Ambiguous edges are allowed
  }

  /**
   * Track the set of states some run can be in after each prefix.
   * Once the set is empty no suffix can revive it.
   */
  protected run(symbols: readonly AlphabetSymbol[]): boolean {
    let current = new Set(this.initialStates())

    for (const symbol of symbols) {
      current = this.step(current, symbol)
      if (current.size === 0) return false
    }

    for (const label of current) {
      if (this.isFinal(label)) return true
    }
    return false
  }
}

/**
 * Create an empty NFA over an alphabet.
 *
 * @param alphabet - Alphabet shared with the new automaton
 * @param options - Debug logging options
 *
 * @public
 */
export function createNFA<L extends StateLabel = StateLabel>(alphabet: Alphabet, options?: AutomatonOptions): NFA<L> {
  return new NFA<L>(alphabet, options)
}
