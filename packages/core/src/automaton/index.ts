/**
 * Automaton transformations and analyses.
 * @packageDocumentation
 */

export { determinize, DEFAULT_MAX_DFA_STATES, type DeterminizeOptions } from './determinize'
export { complete } from './complete'
export { minimize, equivalentStates } from './minimize'
export { reachablePart, findReachableStates } from './reachable'
export { complement } from './complement'
export { intersect, union } from './intersect'
export { isEmpty, findWitness } from './emptiness'
export { areEquivalent } from './equivalence'
