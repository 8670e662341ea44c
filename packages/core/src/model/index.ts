/**
 * Automaton data model.
 * @packageDocumentation
 */

export { FiniteAutomaton } from './automaton'
export { NFA, createNFA } from './nfa'
export { DFA, createDFA } from './dfa'
export { createEmptyLike } from './factory'
