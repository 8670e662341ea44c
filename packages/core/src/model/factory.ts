import type { Alphabet } from '../alphabet'
import type { AutomatonKind, StateLabel } from '../types'
import type { FiniteAutomaton } from './automaton'
import { DFA } from './dfa'
import { NFA } from './nfa'

/**
 * Create an empty automaton of the given kind over an alphabet.
 * Used by transformations that preserve the kind of their input.
 */
export function createEmptyLike<L extends StateLabel>(kind: AutomatonKind, alphabet: Alphabet): FiniteAutomaton<L> {
  return kind === 'dfa' ? new DFA<L>(alphabet) : new NFA<L>(alphabet)
}
