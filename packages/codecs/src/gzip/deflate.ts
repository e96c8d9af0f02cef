/**
 * Raw DEFLATE compression (RFC 1951)
 * Level 0 writes stored blocks; levels 1-9 run a hash-chain LZ77 over one
 * fixed-Huffman block, with longer chains at higher levels
 */

import { ByteWriter, VgmError } from '@vgmkit/core'
import {
	DIST_BASE,
	DIST_EXTRA,
	END_OF_BLOCK,
	LENGTH_BASE,
	LENGTH_EXTRA,
	MAX_MATCH,
	MIN_MATCH,
	WINDOW_SIZE,
	baseIndex,
	fixedDistLengths,
	fixedLitLenLengths,
} from './tables'

const MAX_STORED_BLOCK = 65535
const HASH_BITS = 15
const HASH_SIZE = 1 << HASH_BITS
const HASH_MASK = HASH_SIZE - 1
const WINDOW_MASK = WINDOW_SIZE - 1

export const DEFAULT_LEVEL = 6

export interface DeflateOptions {
	/** 0 (stored) to 9 (longest match search) */
	level?: number
}

/**
 * LSB-first bit writer
 */
class BitWriter {
	private bitBuffer = 0
	private bitCount = 0
	readonly out = new ByteWriter(1024)

	writeBits(value: number, n: number): void {
		this.bitBuffer |= value << this.bitCount
		this.bitCount += n
		while (this.bitCount >= 8) {
			this.out.u8(this.bitBuffer & 0xff)
			this.bitBuffer >>>= 8
			this.bitCount -= 8
		}
	}

	/**
	 * Huffman codes go out most significant bit first
	 */
	writeCode(code: number, length: number): void {
		let reversed = 0
		for (let i = 0; i < length; i++) {
			reversed = (reversed << 1) | ((code >> i) & 1)
		}
		this.writeBits(reversed, length)
	}

	flush(): Uint8Array {
		if (this.bitCount > 0) {
			this.out.u8(this.bitBuffer & 0xff)
			this.bitBuffer = 0
			this.bitCount = 0
		}
		return this.out.toUint8Array()
	}
}

/**
 * Canonical code per symbol from its code length
 */
function canonicalCodes(lengths: readonly number[]): number[] {
	const counts = new Array<number>(16).fill(0)
	for (const len of lengths) counts[len] = counts[len]! + 1
	counts[0] = 0

	const next = new Array<number>(16).fill(0)
	let code = 0
	for (let len = 1; len <= 15; len++) {
		code = (code + counts[len - 1]!) << 1
		next[len] = code
	}

	return lengths.map((len) => {
		if (len === 0) return 0
		const assigned = next[len]!
		next[len] = assigned + 1
		return assigned
	})
}

const FIXED_LIT_LEN_LENGTHS = fixedLitLenLengths()
const FIXED_LIT_LEN_CODES = canonicalCodes(FIXED_LIT_LEN_LENGTHS)
const FIXED_DIST_LENGTHS = fixedDistLengths()
const FIXED_DIST_CODES = canonicalCodes(FIXED_DIST_LENGTHS)

function storedBlocks(data: Uint8Array): Uint8Array {
	const out = new ByteWriter(data.length + 5 * Math.ceil((data.length + 1) / MAX_STORED_BLOCK))
	let i = 0
	do {
		const size = Math.min(MAX_STORED_BLOCK, data.length - i)
		const isLast = i + size >= data.length
		// BFINAL in bit 0, BTYPE 00
		out.u8(isLast ? 0x01 : 0x00)
		out.u16LE(size)
		out.u16LE(size ^ 0xffff)
		out.bytes(data.subarray(i, i + size))
		i += size
	} while (i < data.length)
	return out.toUint8Array()
}

function fixedBlock(data: Uint8Array, maxChain: number): Uint8Array {
	const writer = new BitWriter()
	const literal = (symbol: number) =>
		writer.writeCode(FIXED_LIT_LEN_CODES[symbol]!, FIXED_LIT_LEN_LENGTHS[symbol]!)

	// BFINAL 1, BTYPE 01
	writer.writeBits(1, 1)
	writer.writeBits(1, 2)

	const n = data.length
	const head = new Int32Array(HASH_SIZE).fill(-1)
	const prev = new Int32Array(WINDOW_SIZE)
	const hashAt = (i: number) => ((data[i]! << 10) ^ (data[i + 1]! << 5) ^ data[i + 2]!) & HASH_MASK
	const insert = (i: number) => {
		if (i + MIN_MATCH > n) return
		const h = hashAt(i)
		prev[i & WINDOW_MASK] = head[h]!
		head[h] = i
	}

	let i = 0
	while (i < n) {
		let bestLength = 0
		let bestDistance = 0

		if (i + MIN_MATCH <= n) {
			const maxLength = Math.min(MAX_MATCH, n - i)
			let candidate = head[hashAt(i)]!
			let chain = maxChain
			while (candidate >= 0 && i - candidate <= WINDOW_SIZE && chain-- > 0) {
				let length = 0
				while (length < maxLength && data[candidate + length] === data[i + length]) length++
				if (length > bestLength) {
					bestLength = length
					bestDistance = i - candidate
					if (length === maxLength) break
				}
				candidate = prev[candidate & WINDOW_MASK]!
			}
		}

		if (bestLength >= MIN_MATCH) {
			const lengthIdx = baseIndex(LENGTH_BASE, bestLength)
			literal(257 + lengthIdx)
			writer.writeBits(bestLength - LENGTH_BASE[lengthIdx]!, LENGTH_EXTRA[lengthIdx]!)

			const distIdx = baseIndex(DIST_BASE, bestDistance)
			writer.writeCode(FIXED_DIST_CODES[distIdx]!, FIXED_DIST_LENGTHS[distIdx]!)
			writer.writeBits(bestDistance - DIST_BASE[distIdx]!, DIST_EXTRA[distIdx]!)

			for (let j = i; j < i + bestLength; j++) insert(j)
			i += bestLength
		} else {
			literal(data[i]!)
			insert(i)
			i++
		}
	}

	literal(END_OF_BLOCK)
	return writer.flush()
}

/**
 * Deflate data (raw, no zlib or gzip wrapper)
 */
export function deflateRaw(data: Uint8Array, options: DeflateOptions = {}): Uint8Array {
	const level = options.level ?? DEFAULT_LEVEL
	if (!Number.isInteger(level) || level < 0 || level > 9) {
		throw new VgmError({ kind: 'invalidDataFormat', field: 'level', reason: `compression level must be 0-9, got ${level}` })
	}
	if (level === 0) return storedBlocks(data)
	return fixedBlock(data, 1 << (level + 1))
}
