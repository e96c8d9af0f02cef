/**
 * DEFLATE alphabets shared by the inflater and deflater (RFC 1951 section 3.2.5)
 */

// Length base values and extra bits, symbols 257..285
export const LENGTH_BASE = [
	3, 4, 5, 6, 7, 8, 9, 10, 11, 13, 15, 17, 19, 23, 27, 31, 35, 43, 51, 59, 67, 83, 99, 115, 131,
	163, 195, 227, 258,
]
export const LENGTH_EXTRA = [
	0, 0, 0, 0, 0, 0, 0, 0, 1, 1, 1, 1, 2, 2, 2, 2, 3, 3, 3, 3, 4, 4, 4, 4, 5, 5, 5, 5, 0,
]

// Distance base values and extra bits, symbols 0..29
export const DIST_BASE = [
	1, 2, 3, 4, 5, 7, 9, 13, 17, 25, 33, 49, 65, 97, 129, 193, 257, 385, 513, 769, 1025, 1537, 2049,
	3073, 4097, 6145, 8193, 12289, 16385, 24577,
]
export const DIST_EXTRA = [
	0, 0, 0, 0, 1, 1, 2, 2, 3, 3, 4, 4, 5, 5, 6, 6, 7, 7, 8, 8, 9, 9, 10, 10, 11, 11, 12, 12, 13, 13,
]

// Code length alphabet order
export const CL_ORDER = [16, 17, 18, 0, 8, 7, 9, 6, 10, 5, 11, 4, 12, 3, 13, 2, 14, 1, 15]

export const END_OF_BLOCK = 256
export const WINDOW_SIZE = 32768
export const MIN_MATCH = 3
export const MAX_MATCH = 258

/**
 * Code lengths of the fixed literal/length alphabet
 */
export function fixedLitLenLengths(): number[] {
	const lengths = new Array<number>(288)
	for (let i = 0; i <= 143; i++) lengths[i] = 8
	for (let i = 144; i <= 255; i++) lengths[i] = 9
	for (let i = 256; i <= 279; i++) lengths[i] = 7
	for (let i = 280; i <= 287; i++) lengths[i] = 8
	return lengths
}

export function fixedDistLengths(): number[] {
	return new Array<number>(30).fill(5)
}

/**
 * Index of the largest base not above `value`
 */
export function baseIndex(bases: readonly number[], value: number): number {
	for (let i = bases.length - 1; i > 0; i--) {
		if (bases[i]! <= value) return i
	}
	return 0
}
