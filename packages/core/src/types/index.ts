/**
 * Type definitions for finite automata.
 * @packageDocumentation
 */

// Automaton types
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
} from './automaton'

// Error types
export type { AutomatonErrorCode } from './errors'
export { AutomatonError, AutomatonLimitError } from './errors'
