/**
 * Deterministic finite automata.
 * @packageDocumentation
 */

import type { Alphabet } from '../alphabet'
import type { AlphabetSymbol, AutomatonOptions, AutomatonState, StateLabel } from '../types'
import { AutomatonError } from '../types'
import { FiniteAutomaton } from './automaton'

/**
 * A deterministic finite automaton.
 *
 * Exactly one state is initial (once construction is done) and every
 * `(state, symbol)` pair has at most one target. Ambiguous edges are
 * rejected when they are added.
 *
 * @public
 */
export class DFA<L extends StateLabel = StateLabel> extends FiniteAutomaton<L> {
  readonly kind = 'dfa' as const

  constructor(alphabet: Alphabet, options: AutomatonOptions = {}) {
    super(alphabet, '[DFA]', options)
  }

  /** The initial state, or undefined while none has been added. */
  get initialState(): L | undefined {
    return this.initialStates()[0]
  }

  /**
   * The unique target of `label` on `symbol`.
   *
   * @returns The target label, or undefined if the transition is missing
   */
  successor(label: L, symbol: AlphabetSymbol): L | undefined {
    for (const target of this.successors(label, symbol)) {
      return target
    }
    return undefined
  }

  protected checkNewState(label: L, initial: boolean): void {
    const current = this.initialState
    if (initial && current !== undefined) {
      throw new AutomatonError(
        'MULTIPLE_INITIAL_STATES',
        `DFAs must have a single initial state: cannot make ${String(label)} initial, ${String(current)} already is`,
      )
    }
  }

  protected checkNewTransition(source: AutomatonState<L>, letters: readonly AlphabetSymbol[], to: L): void {
    for (const letter of letters) {
      const targets = source.transitions.get(letter)
      if (targets !== undefined && targets.size > 0 && !targets.has(to)) {
        throw new AutomatonError(
          'NONDETERMINISTIC_TRANSITION',
          `Transition ${String(source.label)} -${letter}-> already exists. ` +
            `DFAs cannot have two or more transitions with the same symbol`,
        )
      }
    }
  }

  /**
   * Follow the unique path. A missing transition rejects the word, unless the
   * automaton was marked complete, which makes the gap a modelling error.
   */
  protected run(symbols: readonly AlphabetSymbol[]): boolean {
    let current = this.initialState
    if (current === undefined) return false

    for (const symbol of symbols) {
      const next = this.successor(current, symbol)
      if (next === undefined) {
        if (this.hasBeenCompleted()) {
          throw new AutomatonError(
            'INCOMPLETE_AUTOMATON',
            `Completed DFA has no transition from ${String(current)} on ${JSON.stringify(symbol)}`,
          )
        }
        return false
      }
      current = next
    }

    return this.isFinal(current)
  }
}

/**
 * Create an empty DFA over an alphabet.
 *
 * @param alphabet - Alphabet shared with the new automaton
 * @param options - Debug logging options
 *
 * @public
 */
export function createDFA<L extends StateLabel = StateLabel>(alphabet: Alphabet, options?: AutomatonOptions): DFA<L> {
  return new DFA<L>(alphabet, options)
}
