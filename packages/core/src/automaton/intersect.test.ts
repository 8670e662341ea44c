import { describe, it, expect } from 'vitest'

import { intersect, union } from './intersect'
import { createAlphabet } from '../alphabet'
import { createDFA, createNFA } from '../model'
import { allWords, AB, bThenAny, endsWithA, endsWithZero, errorCodeOf } from '../../test/fixtures'

/** Words over {a, b} with an even number of a's */
function evenAs() {
  return createDFA<string>(AB)
    .addState('even', { initial: true, final: true })
    .addState('odd')
    .addTransition('a', 'even', 'odd')
    .addTransition('a', 'odd', 'even')
    .addTransition('b', 'even', 'even')
    .addTransition('b', 'odd', 'odd')
}

describe('intersect', () => {
  it('accepts words accepted by both', () => {
    const product = intersect(endsWithA(), evenAs())

    for (const word of allWords(AB, 5)) {
      expect(product.accepts(word), word.join('')).toBe(endsWithA().accepts(word) && evenAs().accepts(word))
    }
  })

  it('labels pairs breadth-first from the initial pair', () => {
    const product = intersect(bThenAny(), evenAs())

    expect(product.initialState).toBe(0)
    expect(product.isFinal(0)).toBe(true)
    expect(product.successor(0, 'a')).toBeUndefined()
    expect(product.successor(0, 'b')).toBe(1)
  })

  it('accepts automata over equal alphabets built separately', () => {
    const other = createNFA<number>(createAlphabet('ba')).addState(0, { initial: true, final: true })

    expect(intersect(endsWithA(), other).accepts('')).toBe(false)
  })

  it('rejects different alphabets', () => {
    expect(errorCodeOf(() => intersect(endsWithA(), endsWithZero()))).toBe('ALPHABET_MISMATCH')
  })
})

describe('union', () => {
  it('accepts words accepted by either', () => {
    const either = union(bThenAny(), evenAs())

    for (const word of allWords(AB, 5)) {
      expect(either.accepts(word), word.join('')).toBe(bThenAny().accepts(word) || evenAs().accepts(word))
    }
  })

  it('keeps the initial states of both sides', () => {
    const either = union(bThenAny(), evenAs())

    expect(either.kind).toBe('nfa')
    expect(either.size).toBe(4)
    expect(either.initialStates()).toEqual([0, 2])
  })

  it('rejects different alphabets', () => {
    expect(errorCodeOf(() => union(endsWithZero(), endsWithA()))).toBe('ALPHABET_MISMATCH')
  })
})
