/**
 * Error codes for automaton construction and algorithm failures.
 * @public
 */
export type AutomatonErrorCode =
  | 'EMPTY_ALPHABET' // Alphabet created without symbols
  | 'DUPLICATE_LABEL' // addState with a label already in use
  | 'UNKNOWN_STATE' // Label not owned by the automaton
  | 'INVALID_SYMBOL' // Transition on a symbol outside the alphabet
  | 'SYMBOL_NOT_IN_ALPHABET' // Input word contains a symbol outside the alphabet
  | 'NONDETERMINISTIC_TRANSITION' // Second target for a DFA (state, symbol) pair
  | 'MULTIPLE_INITIAL_STATES' // Second initial state on a DFA
  | 'INCOMPLETE_AUTOMATON' // Missing transition where a total function is required
  | 'NO_INITIAL_STATE' // Execution or determinization without an initial state
  | 'ALPHABET_MISMATCH' // Binary operation over automata with different alphabets
  | 'DFA_STATE_LIMIT' // DFA construction exceeded state limit

/**
 * Error thrown by automaton operations.
 *
 * Every operation validates its input before mutating anything, so an
 * automaton is left untouched when one of these is thrown.
 *
 * @public
 */
export class AutomatonError extends Error {
  /** Error classification code */
  readonly code: AutomatonErrorCode

  constructor(code: AutomatonErrorCode, message: string) {
    super(message)
    this.name = 'AutomatonError'
    this.code = code
  }
}

/**
 * Error thrown when automaton operations exceed configured limits.
 *
 * This typically occurs during DFA construction when the subset construction
 * runs into its exponential worst case.
 *
 * @public
 */
export class AutomatonLimitError extends AutomatonError {
  /** The limit that was exceeded */
  readonly limit: number

  /** The actual value that exceeded the limit */
  readonly actual: number

  constructor(code: AutomatonErrorCode, message: string, limit: number, actual: number) {
    super(code, message)
    this.name = 'AutomatonLimitError'
    this.limit = limit
    this.actual = actual
  }
}
