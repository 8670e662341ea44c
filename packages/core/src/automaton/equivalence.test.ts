import { describe, it, expect } from 'vitest'

import { areEquivalent } from './equivalence'
import { complement } from './complement'
import { complete } from './complete'
import { determinize } from './determinize'
import { isEmpty } from './emptiness'
import { intersect } from './intersect'
import { minimize } from './minimize'
import { createNFA } from '../model'
import { AB, bThenAny, endsWithA, endsWithZero, errorCodeOf, redundantStates } from '../../test/fixtures'

describe('areEquivalent', () => {
  it('holds between an NFA and its transformations', () => {
    const nfa = endsWithA()
    const dfa = determinize(nfa)

    expect(areEquivalent(nfa, dfa)).toBe(true)
    expect(areEquivalent(nfa, minimize(complete(dfa)))).toBe(true)
  })

  it('holds between automata that differ only in redundant states', () => {
    expect(areEquivalent(redundantStates(), endsWithZero())).toBe(true)
  })

  it('fails for different languages', () => {
    expect(areEquivalent(endsWithA(), bThenAny())).toBe(false)
  })

  it('fails when one language strictly contains the other', () => {
    const anything = createNFA<number>(AB).addState(0, { initial: true, final: true }).addTransition('ab', 0, 0)

    expect(areEquivalent(endsWithA(), anything)).toBe(false)
    expect(areEquivalent(anything, endsWithA())).toBe(false)
  })

  it('rejects different alphabets', () => {
    expect(errorCodeOf(() => areEquivalent(endsWithA(), endsWithZero()))).toBe('ALPHABET_MISMATCH')
  })

  it('needs an initial state on both sides, unlike the emptiness check', () => {
    const noStart = createNFA<number>(AB).addState(0, { final: true }).addTransition('ab', 0, 0)

    expect(isEmpty(noStart)).toBe(true)
    expect(errorCodeOf(() => areEquivalent(endsWithA(), noStart))).toBe('NO_INITIAL_STATE')
    expect(errorCodeOf(() => intersect(endsWithA(), noStart))).toBe('NO_INITIAL_STATE')
    expect(errorCodeOf(() => complement(noStart))).toBe('NO_INITIAL_STATE')
  })
})
