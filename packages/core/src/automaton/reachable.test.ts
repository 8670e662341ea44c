import { describe, it, expect } from 'vitest'

import { reachablePart, findReachableStates } from './reachable'
import { complete } from './complete'
import { createNFA } from '../model'
import { AB, bThenAny, endsWithZero, redundantStates, structureOf } from '../../test/fixtures'

describe('findReachableStates', () => {
  it('lists states breadth-first from the initial states', () => {
    const nfa = createNFA<string>(AB)
      .addState('x')
      .addState('start', { initial: true })
      .addState('mid')
      .addState('end', { final: true })
      .addTransition('b', 'start', 'end')
      .addTransition('a', 'start', 'mid')
      .addTransition('a', 'mid', 'end')

    expect(findReachableStates(nfa)).toEqual(['start', 'mid', 'end'])
  })

  it('returns nothing without an initial state', () => {
    expect(findReachableStates(createNFA<number>(AB).addState(0))).toEqual([])
  })
})

describe('reachablePart', () => {
  it('removes unreachable states and their edges', () => {
    const trimmed = reachablePart(redundantStates())

    expect(trimmed.labels()).toEqual([0, 1])
    expect(structureOf(trimmed)).toEqual(structureOf(endsWithZero()))
  })

  it('returns an equal copy when everything is reachable', () => {
    const dfa = bThenAny()
    const trimmed = reachablePart(dfa)

    expect(trimmed).not.toBe(dfa)
    expect(structureOf(trimmed)).toEqual(structureOf(dfa))
  })

  it('keeps the completed flag', () => {
    expect(reachablePart(complete(bThenAny())).hasBeenCompleted()).toBe(true)
    expect(reachablePart(bThenAny()).hasBeenCompleted()).toBe(false)
  })

  it('keeps the kind of its input', () => {
    const nfa = createNFA<number>(AB).addState(0, { initial: true }).addState(1)

    const trimmed = reachablePart(nfa)

    expect(trimmed.kind).toBe('nfa')
    expect(trimmed.labels()).toEqual([0])
  })
})
