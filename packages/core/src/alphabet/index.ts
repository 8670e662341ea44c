/**
 * Alphabets.
 * @packageDocumentation
 */

export { Alphabet, createAlphabet } from './alphabet'
