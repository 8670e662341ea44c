/**
 * Immutable finite alphabets.
 * @packageDocumentation
 */

import type { AlphabetSymbol, Word } from '../types'
import { AutomatonError } from '../types'

/**
 * A non-empty, immutable set of symbols.
 *
 * Symbols keep their insertion order, which is the order every algorithm in
 * this package enumerates them in. Automata built over the same alphabet share
 * it by reference.
 *
 * @public
 */
export class Alphabet implements Iterable<AlphabetSymbol> {
  /** Symbols in insertion order */
  readonly symbols: readonly AlphabetSymbol[]

  private readonly members: ReadonlySet<AlphabetSymbol>

  private constructor(symbols: readonly AlphabetSymbol[]) {
    this.symbols = Object.freeze([...symbols])
    this.members = new Set(symbols)
    Object.freeze(this)
  }

  /**
   * Create an alphabet. Duplicate symbols collapse into one.
   *
   * @throws AutomatonError `EMPTY_ALPHABET` if no symbol is given
   */
  static of(symbols: Iterable<AlphabetSymbol>): Alphabet {
    const unique = [...new Set(symbols)]
    if (unique.length === 0) {
      throw new AutomatonError('EMPTY_ALPHABET', 'An alphabet must contain at least one symbol')
    }
    return new Alphabet(unique)
  }

  get size(): number {
    return this.symbols.length
  }

  has(symbol: AlphabetSymbol): boolean {
    return this.members.has(symbol)
  }

  /**
   * First symbol of `word` that does not belong to this alphabet.
   *
   * @returns The offending symbol, or undefined if the whole word is valid
   */
  missingFrom(word: Word): AlphabetSymbol | undefined {
    for (const symbol of word) {
      if (!this.members.has(symbol)) return symbol
    }
    return undefined
  }

  [Symbol.iterator](): Iterator<AlphabetSymbol> {
    return this.symbols[Symbol.iterator]()
  }

  toString(): string {
    return `{${this.symbols.join(', ')}}`
  }
}

/**
 * Create an alphabet from symbols.
 *
 * A string argument contributes each of its characters, so
 * `createAlphabet('ab')` and `createAlphabet(['a', 'b'])` are the same
 * alphabet. Pass an array for multi-character tokens.
 *
 * @param symbols - Symbols of the alphabet
 * @returns A frozen alphabet
 * @throws AutomatonError `EMPTY_ALPHABET` if no symbol is given
 *
 * @public
 */
export function createAlphabet(symbols: Iterable<AlphabetSymbol>): Alphabet {
  return Alphabet.of(symbols)
}
