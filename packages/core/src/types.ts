/**
 * Shared codec contracts
 */

/**
 * Container formats handled by the toolkit
 */
export type Format = 'vgm' | 'vgz' | 'gd3'

/**
 * Codec interface for encoding/decoding
 */
export interface Codec<T, DecodeOptions = undefined, EncodeOptions = undefined> {
	readonly format: Format
	isFormat(data: Uint8Array): boolean
	decode(data: Uint8Array, options?: DecodeOptions): T
	encode(input: T, options?: EncodeOptions): Uint8Array
}

/**
 * Result of decoding a value at a byte offset
 */
export interface Decoded<T> {
	readonly value: T
	readonly nextOffset: number
}
