/**
 * Example automata and fast-check arbitraries shared by the test suites.
 */

import fc from 'fast-check'

import { createAlphabet, type Alphabet } from '../src/alphabet'
import { createDFA, createNFA, type DFA, type NFA } from '../src/model'
import type { AlphabetSymbol, AutomatonErrorCode, StateLabel } from '../src/types'
import { AutomatonError } from '../src/types'
import type { FiniteAutomaton } from '../src/model'

/** Fixed seed for deterministic property runs */
export const PROPERTY_SEED = 424242

export const AB: Alphabet = createAlphabet('ab')

/**
 * NFA over {a, b} accepting the words that end with `a`.
 * State 2 is a dead end reached by reading past the final `a`.
 */
export function endsWithA(): NFA<number> {
  return createNFA<number>(AB)
    .addState(0, { initial: true })
    .addState(1, { final: true })
    .addState(2)
    .addTransition('ab', 0, 0)
    .addTransition('a', 0, 1)
    .addTransition('ab', 1, 2)
    .addTransition('ab', 2, 2)
}

/**
 * Complete DFA over {0, 1} accepting the empty word and every word ending in `0`.
 */
export function endsWithZero(): DFA<number> {
  return createDFA<number>(createAlphabet('01'))
    .addState(0, { initial: true, final: true })
    .addState(1)
    .addTransition('0', 0, 0)
    .addTransition('1', 0, 1)
    .addTransition('1', 1, 1)
    .addTransition('0', 1, 0)
}

/**
 * Partial DFA over {a, b} accepting `(b(a+b))*`.
 */
export function bThenAny(): DFA<number> {
  return createDFA<number>(AB)
    .addState(0, { initial: true, final: true })
    .addState(1)
    .addTransition('b', 0, 1)
    .addTransition('ab', 1, 0)
}

/**
 * Complete DFA over {0, 1} in which states 1, 2 and 3 are indistinguishable.
 * States 2 and 3 are unreachable.
 */
export function redundantStates(): DFA<number> {
  const dfa = createDFA<number>(createAlphabet('01'))
    .addState(0, { initial: true, final: true })
    .addState(1)
    .addState(2)
    .addState(3)
  for (const label of [0, 1, 2, 3]) {
    dfa.addTransition('0', label, 0).addTransition('1', label, 1)
  }
  return dfa
}

/**
 * Run `fn` and return the code of the AutomatonError it throws, if any.
 * Errors of any other type are rethrown.
 */
export function errorCodeOf(fn: () => unknown): AutomatonErrorCode | undefined {
  try {
    fn()
  } catch (e) {
    if (e instanceof AutomatonError) return e.code
    throw e
  }
  return undefined
}

/**
 * Every word over `alphabet` of length at most `maxLength`, shortest first.
 */
export function allWords(alphabet: Alphabet, maxLength: number): AlphabetSymbol[][] {
  const words: AlphabetSymbol[][] = [[]]
  let frontier: AlphabetSymbol[][] = [[]]
  for (let length = 1; length <= maxLength; length++) {
    const next: AlphabetSymbol[][] = []
    for (const prefix of frontier) {
      for (const symbol of alphabet) {
        next.push([...prefix, symbol])
      }
    }
    words.push(...next)
    frontier = next
  }
  return words
}

/**
 * Words on which two automata disagree, up to `maxLength`.
 */
export function disagreements<A extends StateLabel, B extends StateLabel>(
  a: FiniteAutomaton<A>,
  b: FiniteAutomaton<B>,
  maxLength = 6,
): string[] {
  return allWords(a.alphabet, maxLength)
    .filter((word) => a.accepts(word) !== b.accepts(word))
    .map((word) => word.join(''))
}

/**
 * Labels, flags and edges of an automaton, for structural comparisons.
 */
export function structureOf<L extends StateLabel>(automaton: FiniteAutomaton<L>) {
  return {
    kind: automaton.kind,
    states: automaton.states().map((s) => ({ label: s.label, initial: s.initial, final: s.final })),
    edges: automaton.edges(),
  }
}

// =============================================================================
// ARBITRARIES
// =============================================================================

/**
 * Shape of a random NFA over {a, b}.
 */
export interface NfaShape {
  size: number
  initial: number[]
  final: number[]
  edges: [number, AlphabetSymbol, number][]
}

export const nfaShapeArbitrary: fc.Arbitrary<NfaShape> = fc.integer({ min: 1, max: 5 }).chain((size) => {
  const label = fc.integer({ min: 0, max: size - 1 })
  return fc.record({
    size: fc.constant(size),
    initial: fc.uniqueArray(label, { minLength: 1, maxLength: size }),
    final: fc.uniqueArray(label, { maxLength: size }),
    edges: fc.array(fc.tuple(label, fc.constantFrom('a', 'b'), label), { maxLength: size * 4 }),
  })
})

export function buildNFA(shape: NfaShape): NFA<number> {
  const nfa = createNFA<number>(AB)
  for (let label = 0; label < shape.size; label++) {
    nfa.addState(label, { initial: shape.initial.includes(label), final: shape.final.includes(label) })
  }
  for (const [from, symbol, to] of shape.edges) {
    nfa.addTransition([symbol], from, to)
  }
  return nfa
}

/**
 * Shape of a random, possibly partial DFA over {a, b} whose initial state is 0.
 * `targets[i]` holds the successors of state `i` on `a` and on `b`.
 */
export interface DfaShape {
  size: number
  final: number[]
  targets: [number | undefined, number | undefined][]
}

export const dfaShapeArbitrary: fc.Arbitrary<DfaShape> = fc.integer({ min: 1, max: 6 }).chain((size) => {
  const target = fc.option(fc.integer({ min: 0, max: size - 1 }), { nil: undefined })
  return fc.record({
    size: fc.constant(size),
    final: fc.uniqueArray(fc.integer({ min: 0, max: size - 1 }), { maxLength: size }),
    targets: fc.array(fc.tuple(target, target), { minLength: size, maxLength: size }),
  })
})

export function buildDFA(shape: DfaShape): DFA<number> {
  const dfa = createDFA<number>(AB)
  for (let label = 0; label < shape.size; label++) {
    dfa.addState(label, { initial: label === 0, final: shape.final.includes(label) })
  }
  shape.targets.forEach(([onA, onB], from) => {
    if (onA !== undefined) dfa.addTransition('a', from, onA)
    if (onB !== undefined) dfa.addTransition('b', from, onB)
  })
  return dfa
}

export const wordArbitrary: fc.Arbitrary<AlphabetSymbol[]> = fc.array(fc.constantFrom('a', 'b'), { maxLength: 10 })
