/**
 * Finite Automata Library
 *
 * Models non-deterministic and deterministic finite automata over a finite
 * alphabet, with the classical algorithms over them: acceptance, subset
 * construction, completion and minimization.
 *
 * @packageDocumentation
 */

/**
 * Library version.
 * @public
 */
export const version = '0.0.0'

// =============================================================================
// Types
// =============================================================================

export type {
  AlphabetSymbol,
  Word,
  StateLabel,
  AutomatonKind,
  AutomatonState,
  AutomatonEdge,
  MissingTransition,
  StateFlags,
  TransformOptions,
  AutomatonOptions,
  AutomatonErrorCode,
} from './types'
export { AutomatonError, AutomatonLimitError } from './types'

// =============================================================================
// Logging
// =============================================================================

export { defaultLogger, type Logger } from './util/logger'

// =============================================================================
// Construction
// =============================================================================

export { Alphabet, createAlphabet } from './alphabet'
export { FiniteAutomaton, NFA, DFA, createNFA, createDFA } from './model'

// =============================================================================
// Transformations
// =============================================================================

export { determinize, DEFAULT_MAX_DFA_STATES, type DeterminizeOptions } from './automaton'
export { complete } from './automaton'
export { minimize, equivalentStates } from './automaton'
export { reachablePart, findReachableStates } from './automaton'

// =============================================================================
// Automaton Algebra
// =============================================================================

export { complement } from './automaton'
export { intersect, union } from './automaton'
export { isEmpty, findWitness } from './automaton'
export { areEquivalent } from './automaton'
