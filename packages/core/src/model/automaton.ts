/**
 * State storage and queries shared by NFAs and DFAs.
 * @packageDocumentation
 */

import type { Alphabet } from '../alphabet'
import type {
  AlphabetSymbol,
  AutomatonEdge,
  AutomatonKind,
  AutomatonOptions,
  AutomatonState,
  MissingTransition,
  StateFlags,
  StateLabel,
  Word,
} from '../types'
import { AutomatonError } from '../types'
import { createDebugLog, type DebugLog } from '../util/logger'

/**
 * Internal, owned representation of a state.
 * The transition table is never shared with another automaton.
 */
interface MutableState<L extends StateLabel> {
  readonly label: L
  readonly initial: boolean
  readonly final: boolean
  readonly transitions: Map<AlphabetSymbol, Set<L>>
}

const EMPTY_TARGETS: ReadonlySet<never> = new Set<never>()

/** Copy of a state that later changes to the automaton do not reach. */
function snapshot<L extends StateLabel>(state: MutableState<L>): AutomatonState<L> {
  const transitions = new Map<AlphabetSymbol, ReadonlySet<L>>()
  for (const [symbol, targets] of state.transitions) {
    transitions.set(symbol, new Set(targets))
  }
  return { label: state.label, initial: state.initial, final: state.final, transitions }
}

/**
 * A finite automaton over a fixed alphabet.
 *
 * Automata are built incrementally: add states first, then transitions
 * between them. Subclasses decide how a word is run ({@link NFA}, {@link DFA})
 * and which additional constraints construction enforces.
 *
 * @public
 */
export abstract class FiniteAutomaton<L extends StateLabel = StateLabel> {
  /** Acceptance discipline */
  abstract readonly kind: AutomatonKind

  /** Alphabet this automaton is defined over, shared by reference */
  readonly alphabet: Alphabet

  protected readonly debugLog: DebugLog

  private readonly stateMap = new Map<L, MutableState<L>>()
  private readonly initialLabels = new Set<L>()
  private readonly finalLabels = new Set<L>()
  private completed = false

  protected constructor(alphabet: Alphabet, logPrefix: string, options: AutomatonOptions = {}) {
    this.alphabet = alphabet
    this.debugLog = createDebugLog(logPrefix, options)
  }

  // ===========================================================================
  // CONSTRUCTION
  // ===========================================================================

  /**
   * Register a new state.
   *
   * A completed automaton loses its completed mark, since the new state has
   * no outgoing edges.
   *
   * @param label - Label, unique within this automaton
   * @param flags - Whether the state is initial and/or final
   * @returns This automaton, for chaining
   * @throws AutomatonError `DUPLICATE_LABEL` if the label is taken
   */
  addState(label: L, flags: StateFlags = {}): this {
    if (this.stateMap.has(label)) {
      throw new AutomatonError('DUPLICATE_LABEL', `A state with label ${String(label)} already exists`)
    }

    const initial = flags.initial ?? false
    const final = flags.final ?? false
    this.checkNewState(label, initial)

    this.stateMap.set(label, { label, initial, final, transitions: new Map() })
    if (initial) this.initialLabels.add(label)
    if (final) this.finalLabels.add(label)
    // A new state has no outgoing edges yet
    this.completed = false

    this.debugLog(`added state ${String(label)}`, { initial, final })
    return this
  }

  /**
   * Add an edge `from → to` for each of the given symbols.
   *
   * All arguments are validated before any edge is added, so a failing call
   * leaves the automaton unchanged.
   *
   * @param symbols - Symbols labelling the edge; a string contributes each of its characters
   * @param from - Source state label
   * @param to - Target state label
   * @returns This automaton, for chaining
   * @throws AutomatonError `INVALID_SYMBOL` if a symbol is not in the alphabet
   * @throws AutomatonError `UNKNOWN_STATE` if either label is not a state
   */
  addTransition(symbols: Word, from: L, to: L): this {
    const letters = [...new Set(symbols)]

    for (const letter of letters) {
      if (!this.alphabet.has(letter)) {
        throw new AutomatonError(
          'INVALID_SYMBOL',
          `Symbol ${JSON.stringify(letter)} is not in the alphabet ${this.alphabet.toString()}`,
        )
      }
    }

    const source = this.requireState(from)
    this.requireState(to)
    this.checkNewTransition(source, letters, to)

    for (const letter of letters) {
      let targets = source.transitions.get(letter)
      if (targets === undefined) {
        targets = new Set()
        source.transitions.set(letter, targets)
      }
      targets.add(to)
    }

    this.debugLog(`added transition ${String(from)} -[${letters.join(',')}]-> ${String(to)}`)
    return this
  }

  /**
   * Mark this automaton as completed.
   *
   * Until the next `addState`, a DFA run that meets a missing transition is
   * reported as a modelling error instead of a rejection.
   *
   * @throws AutomatonError `INCOMPLETE_AUTOMATON` if a transition is missing
   */
  markCompleted(): this {
    const missing = this.missingTransitions()
    if (missing.length > 0) {
      const { from, symbol } = missing[0]
      throw new AutomatonError(
        'INCOMPLETE_AUTOMATON',
        `Cannot mark as complete: state ${String(from)} has no transition on ${JSON.stringify(symbol)}`,
      )
    }
    this.completed = true
    return this
  }

  /** Hook for subclass constraints on new states. Runs before mutation. */
  protected abstract checkNewState(label: L, initial: boolean): void

  /** Hook for subclass constraints on new edges. Runs before mutation. */
  protected abstract checkNewTransition(source: AutomatonState<L>, letters: readonly AlphabetSymbol[], to: L): void

  // ===========================================================================
  // EXECUTION
  // ===========================================================================

  /**
   * Run the automaton on a word.
   *
   * The whole word is checked against the alphabet before the run starts.
   *
   * @param word - Input word; a string is read character by character
   * @returns true if the word is accepted
   * @throws AutomatonError `SYMBOL_NOT_IN_ALPHABET` if the word uses an unknown symbol
   * @throws AutomatonError `NO_INITIAL_STATE` if the automaton has no initial state
   */
  accepts(word: Word): boolean {
    const symbols = [...word]
    const missing = this.alphabet.missingFrom(symbols)
    if (missing !== undefined) {
      throw new AutomatonError(
        'SYMBOL_NOT_IN_ALPHABET',
        `Symbol ${JSON.stringify(missing)} is not in the alphabet ${this.alphabet.toString()}`,
      )
    }
    if (this.initialLabels.size === 0) {
      throw new AutomatonError('NO_INITIAL_STATE', 'Cannot run an automaton without an initial state')
    }

    return this.run(symbols)
  }

  /** Simulate a word already known to be over the alphabet. */
  protected abstract run(symbols: readonly AlphabetSymbol[]): boolean

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  /** Number of states */
  get size(): number {
    return this.stateMap.size
  }

  hasState(label: L): boolean {
    return this.stateMap.has(label)
  }

  /** Snapshot of a state, or undefined if there is none with this label. */
  getState(label: L): AutomatonState<L> | undefined {
    const state = this.stateMap.get(label)
    return state === undefined ? undefined : snapshot(state)
  }

  /** Snapshots of all states, in insertion order. */
  states(): AutomatonState<L>[] {
    return [...this.stateMap.values()].map((state) => snapshot(state))
  }

  /** All labels, in insertion order. */
  labels(): L[] {
    return [...this.stateMap.keys()]
  }

  initialStates(): L[] {
    return [...this.initialLabels]
  }

  finalStates(): L[] {
    return [...this.finalLabels]
  }

  isInitial(label: L): boolean {
    return this.initialLabels.has(label)
  }

  isFinal(label: L): boolean {
    return this.finalLabels.has(label)
  }

  /**
   * Targets of the edges leaving `label` on `symbol`.
   *
   * @returns The target set; empty when there is no such edge
   * @throws AutomatonError `UNKNOWN_STATE` / `INVALID_SYMBOL` on bad arguments
   */
  successors(label: L, symbol: AlphabetSymbol): ReadonlySet<L> {
    const state = this.requireState(label)
    if (!this.alphabet.has(symbol)) {
      throw new AutomatonError('INVALID_SYMBOL', `Symbol ${JSON.stringify(symbol)} is not in the alphabet`)
    }
    return state.transitions.get(symbol) ?? EMPTY_TARGETS
  }

  /**
   * Every edge, ordered by source state, then alphabet order, then target insertion.
   */
  edges(): AutomatonEdge<L>[] {
    const edges: AutomatonEdge<L>[] = []
    for (const state of this.stateMap.values()) {
      for (const symbol of this.alphabet) {
        for (const to of state.transitions.get(symbol) ?? EMPTY_TARGETS) {
          edges.push({ from: state.label, symbol, to })
        }
      }
    }
    return edges
  }

  /**
   * Every `(state, symbol)` pair without an outgoing edge.
   */
  missingTransitions(): MissingTransition<L>[] {
    const missing: MissingTransition<L>[] = []
    for (const state of this.stateMap.values()) {
      for (const symbol of this.alphabet) {
        if ((state.transitions.get(symbol)?.size ?? 0) === 0) {
          missing.push({ from: state.label, symbol })
        }
      }
    }
    return missing
  }

  /**
   * Whether every `(state, symbol)` pair has at least one target.
   */
  isComplete(): boolean {
    for (const state of this.stateMap.values()) {
      for (const symbol of this.alphabet) {
        if ((state.transitions.get(symbol)?.size ?? 0) === 0) return false
      }
    }
    return true
  }

  /**
   * Whether the automaton is structurally deterministic: exactly one initial
   * state and at most one target per `(state, symbol)` pair.
   */
  isDeterministic(): boolean {
    if (this.initialLabels.size !== 1) return false
    for (const state of this.stateMap.values()) {
      for (const targets of state.transitions.values()) {
        if (targets.size > 1) return false
      }
    }
    return true
  }

  /** Whether the automaton has been explicitly marked as complete. */
  hasBeenCompleted(): boolean {
    return this.completed
  }

  /**
   * Look up a state or fail.
   * @throws AutomatonError `UNKNOWN_STATE`
   */
  private requireState(label: L): MutableState<L> {
    const state = this.stateMap.get(label)
    if (state === undefined) {
      throw new AutomatonError('UNKNOWN_STATE', `State with label ${String(label)} doesn't exist`)
    }
    return state
  }
}
