import type { Logger } from '../util/logger'

// =============================================================================
// SYMBOLS AND LABELS
// =============================================================================

/**
 * A single symbol of an alphabet: a character or an atomic token.
 * @public
 */
export type AlphabetSymbol = string

/**
 * An input word. A string is read as the sequence of its characters,
 * an array as a sequence of tokens.
 * @public
 */
export type Word = Iterable<AlphabetSymbol>

/**
 * Identity of a state within one automaton.
 * @public
 */
export type StateLabel = string | number

/**
 * Which acceptance discipline an automaton follows.
 * @public
 */
export type AutomatonKind = 'nfa' | 'dfa'

// =============================================================================
// STATES AND EDGES
// =============================================================================

/**
 * Read-only view of a state.
 *
 * The transition table maps each symbol that has outgoing edges to the set of
 * target labels. In a DFA every set has exactly one member.
 *
 * @public
 */
export interface AutomatonState<L extends StateLabel> {
  readonly label: L

  readonly initial: boolean

  readonly final: boolean

  /** Outgoing edges grouped by symbol */
  readonly transitions: ReadonlyMap<AlphabetSymbol, ReadonlySet<L>>
}

/**
 * One edge of an automaton, as enumerated by `edges()`.
 * @public
 */
export interface AutomatonEdge<L extends StateLabel> {
  readonly from: L
  readonly symbol: AlphabetSymbol
  readonly to: L
}

/**
 * A `(state, symbol)` pair with no outgoing edge.
 * @public
 */
export interface MissingTransition<L extends StateLabel> {
  readonly from: L
  readonly symbol: AlphabetSymbol
}

// =============================================================================
// OPTIONS
// =============================================================================

/**
 * Flags accepted by `addState`.
 * @public
 */
export interface StateFlags {
  /** @defaultValue false */
  initial?: boolean

  /** @defaultValue false */
  final?: boolean
}

/**
 * Options shared by automata and by every transformation.
 * @public
 */
export interface TransformOptions {
  /**
   * Emit debug lines through the logger.
   * @defaultValue false
   */
  debug?: boolean

  /**
   * Where debug lines go.
   * @defaultValue a console-backed logger
   */
  logger?: Logger
}

/**
 * Options for `createNFA` / `createDFA`.
 * @public
 */
export type AutomatonOptions = TransformOptions
