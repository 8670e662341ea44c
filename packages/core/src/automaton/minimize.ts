/**
 * DFA minimization by partition refinement.
 * @packageDocumentation
 */

import { DFA } from '../model'
import type { AlphabetSymbol, StateLabel, TransformOptions } from '../types'
import { AutomatonError } from '../types'
import { createDebugLog } from '../util/logger'
import { reachablePart } from './reachable'

/**
 * Assignment of every state to a block of indistinguishable states.
 * Blocks are numbered `0..count-1` in order of their first member.
 */
interface Partition<L extends StateLabel> {
  readonly blockOf: ReadonlyMap<L, number>
  readonly count: number
}

/**
 * Reduce a complete DFA to the unique minimal DFA for the same language.
 *
 * Unreachable states are dropped first. The remaining states start in two
 * blocks (final, non-final) which are split, pass after pass, wherever two
 * members move into different blocks on some symbol, until a pass splits
 * nothing. Each resulting block becomes one state.
 *
 * Output labels are assigned breadth-first from the initial state (label 0)
 * with symbols in alphabet order, so two equivalent inputs minimize to the
 * same automaton, labels included.
 *
 * @param dfa - A complete DFA
 * @param options - Debug logging options
 * @returns The minimal complete DFA, marked as completed
 * @throws AutomatonError `NO_INITIAL_STATE` if the DFA has no initial state
 * @throws AutomatonError `INCOMPLETE_AUTOMATON` if any transition is missing
 *
 * @public
 */
export function minimize<L extends StateLabel>(dfa: DFA<L>, options: TransformOptions = {}): DFA<number> {
  const debug = createDebugLog('[minimize]', options)

  const initial = dfa.initialState
  if (initial === undefined) {
    throw new AutomatonError('NO_INITIAL_STATE', 'Cannot minimize a DFA without an initial state')
  }
  requireComplete(dfa)

  const trimmed = reachablePart(dfa)
  const { blockOf, count } = refinePartition(trimmed)
  debug(`${dfa.size} states, ${trimmed.size} reachable, ${count} after refinement`)

  const block = (label: L): number => blockOf.get(label) ?? -1

  // First member of each block stands for the whole block
  const representative = new Map<number, L>()
  for (const label of trimmed.labels()) {
    if (!representative.has(block(label))) representative.set(block(label), label)
  }

  // Number blocks breadth-first from the initial block
  const order: L[] = [initial]
  const labelOfBlock = new Map<number, number>([[block(initial), 0]])
  for (let next = 0; next < order.length; next++) {
    for (const symbol of trimmed.alphabet) {
      const target = successorOf(trimmed, order[next], symbol)
      if (!labelOfBlock.has(block(target))) {
        labelOfBlock.set(block(target), order.length)
        order.push(representative.get(block(target)) ?? target)
      }
    }
  }

  const minimal = new DFA<number>(dfa.alphabet)
  order.forEach((label, index) => {
    minimal.addState(index, { initial: index === 0, final: trimmed.isFinal(label) })
  })
  order.forEach((label, index) => {
    for (const symbol of trimmed.alphabet) {
      const target = labelOfBlock.get(block(successorOf(trimmed, label, symbol))) ?? -1
      minimal.addTransition([symbol], index, target)
    }
  })

  return minimal.markCompleted()
}

/**
 * Find every pair of distinct, indistinguishable states of a complete DFA.
 *
 * Two states are equivalent when no suffix is accepted from one and rejected
 * from the other. All states are considered, reachable or not. Pairs are
 * listed in state insertion order, each pair ordered the same way.
 *
 * @param dfa - A complete DFA
 * @returns Equivalent state pairs
 * @throws AutomatonError `INCOMPLETE_AUTOMATON` if any transition is missing
 *
 * @public
 */
export function equivalentStates<L extends StateLabel>(dfa: DFA<L>): [L, L][] {
  requireComplete(dfa)

  const { blockOf } = refinePartition(dfa)
  const labels = dfa.labels()
  const pairs: [L, L][] = []

  for (let i = 0; i < labels.length; i++) {
    for (let j = i + 1; j < labels.length; j++) {
      if (blockOf.get(labels[i]) === blockOf.get(labels[j])) {
        pairs.push([labels[i], labels[j]])
      }
    }
  }

  return pairs
}

/**
 * Moore-style refinement to a fixed point.
 *
 * A state's signature is its current block followed by the blocks of its
 * successors in alphabet order. Since the signature includes the current
 * block, a pass can only split blocks; an unchanged block count therefore
 * means an unchanged partition.
 */
function refinePartition<L extends StateLabel>(dfa: DFA<L>): Partition<L> {
  const labels = dfa.labels()
  let partition = numberBlocks(labels, (label) => (dfa.isFinal(label) ? 'final' : 'non-final'))

  for (;;) {
    const current = partition
    const block = (label: L): number => current.blockOf.get(label) ?? -1
    const refined = numberBlocks(labels, (label) =>
      [block(label), ...dfa.alphabet.symbols.map((symbol) => block(successorOf(dfa, label, symbol)))].join(','),
    )

    if (refined.count === current.count) return current
    partition = refined
  }
}

/**
 * Group labels by signature, numbering groups by first appearance.
 */
function numberBlocks<L extends StateLabel>(labels: readonly L[], signature: (label: L) => string): Partition<L> {
  const ids = new Map<string, number>()
  const blockOf = new Map<L, number>()

  for (const label of labels) {
    const key = signature(label)
    let id = ids.get(key)
    if (id === undefined) {
      id = ids.size
      ids.set(key, id)
    }
    blockOf.set(label, id)
  }

  return { blockOf, count: ids.size }
}

function successorOf<L extends StateLabel>(dfa: DFA<L>, label: L, symbol: AlphabetSymbol): L {
  const target = dfa.successor(label, symbol)
  if (target === undefined) {
    throw new AutomatonError(
      'INCOMPLETE_AUTOMATON',
      `State ${String(label)} has no transition on ${JSON.stringify(symbol)}; complete the DFA first`,
    )
  }
  return target
}

function requireComplete<L extends StateLabel>(dfa: DFA<L>): void {
  const [missing] = dfa.missingTransitions()
  if (missing !== undefined) {
    throw new AutomatonError(
      'INCOMPLETE_AUTOMATON',
      `State ${String(missing.from)} has no transition on ${JSON.stringify(missing.symbol)}; complete the DFA first`,
    )
  }
}
