/**
 * Raw DEFLATE decompression (RFC 1951)
 * Stored, fixed-Huffman and dynamic-Huffman blocks
 */

import { VgmError } from '@vgmkit/core'
import {
	CL_ORDER,
	DIST_BASE,
	DIST_EXTRA,
	END_OF_BLOCK,
	LENGTH_BASE,
	LENGTH_EXTRA,
	fixedDistLengths,
	fixedLitLenLengths,
} from './tables'

const MAX_CODE_LENGTH = 15

function malformed(reason: string): VgmError {
	return new VgmError({ kind: 'invalidDataFormat', field: 'deflate', reason })
}

/**
 * LSB-first bit reader that only pulls whole bytes on demand,
 * so after alignment `position` is the next unread byte
 */
class BitReader {
	private bitBuffer = 0
	private bitCount = 0

	constructor(
		private readonly data: Uint8Array,
		public position: number
	) {}

	readBits(n: number): number {
		while (this.bitCount < n) {
			if (this.position >= this.data.length) {
				throw new VgmError({ kind: 'bufferUnderflow', offset: this.position, needed: 1, available: 0 })
			}
			this.bitBuffer |= this.data[this.position++]! << this.bitCount
			this.bitCount += 8
		}
		const value = this.bitBuffer & ((1 << n) - 1)
		this.bitBuffer >>>= n
		this.bitCount -= n
		return value
	}

	alignToByte(): void {
		this.bitBuffer = 0
		this.bitCount = 0
	}

	readBytes(n: number): Uint8Array {
		const available = this.data.length - this.position
		if (n > available) {
			throw new VgmError({ kind: 'bufferUnderflow', offset: this.position, needed: n, available })
		}
		const bytes = this.data.subarray(this.position, this.position + n)
		this.position += n
		return bytes
	}
}

/**
 * Canonical Huffman decoder: code counts per length plus symbols in code order
 */
class HuffmanTable {
	private readonly counts = new Uint16Array(MAX_CODE_LENGTH + 1)
	private readonly symbols: Uint16Array

	constructor(lengths: readonly number[]) {
		this.symbols = new Uint16Array(lengths.length)
		for (const len of lengths) this.counts[len] = this.counts[len]! + 1
		this.counts[0] = 0

		const offsets = new Uint16Array(MAX_CODE_LENGTH + 2)
		for (let len = 1; len <= MAX_CODE_LENGTH; len++) {
			offsets[len + 1] = offsets[len]! + this.counts[len]!
		}
		for (let symbol = 0; symbol < lengths.length; symbol++) {
			const len = lengths[symbol]!
			if (len === 0) continue
			const slot = offsets[len]!
			this.symbols[slot] = symbol
			offsets[len] = slot + 1
		}
	}

	decode(reader: BitReader): number {
		let code = 0
		let first = 0
		let index = 0
		for (let len = 1; len <= MAX_CODE_LENGTH; len++) {
			code |= reader.readBits(1)
			const count = this.counts[len]!
			if (code - first < count) {
				return this.symbols[index + code - first]!
			}
			index += count
			first = (first + count) << 1
			code <<= 1
		}
		throw malformed('invalid Huffman code')
	}
}

let fixedTables: { litLen: HuffmanTable; dist: HuffmanTable } | null = null

function getFixedTables(): { litLen: HuffmanTable; dist: HuffmanTable } {
	fixedTables ??= {
		litLen: new HuffmanTable(fixedLitLenLengths()),
		dist: new HuffmanTable(fixedDistLengths()),
	}
	return fixedTables
}

/**
 * Growable output with a size ceiling
 */
class Output {
	private buffer = new Uint8Array(1024)
	length = 0

	constructor(private readonly maxSize: number) {}

	private ensure(extra: number): void {
		const needed = this.length + extra
		if (needed > this.maxSize) {
			throw new VgmError({ kind: 'dataSizeExceedsLimit', field: 'decompressed_size', size: needed, limit: this.maxSize })
		}
		if (needed <= this.buffer.length) return
		let capacity = this.buffer.length * 2
		while (capacity < needed) capacity *= 2
		const next = new Uint8Array(capacity)
		next.set(this.buffer.subarray(0, this.length))
		this.buffer = next
	}

	push(byte: number): void {
		this.ensure(1)
		this.buffer[this.length++] = byte
	}

	append(bytes: Uint8Array): void {
		this.ensure(bytes.length)
		this.buffer.set(bytes, this.length)
		this.length += bytes.length
	}

	copyBack(distance: number, length: number): void {
		if (distance > this.length) {
			throw malformed(`distance ${distance} exceeds output length ${this.length}`)
		}
		this.ensure(length)
		// Byte by byte: the source may overlap the bytes being written
		let from = this.length - distance
		for (let i = 0; i < length; i++) {
			this.buffer[this.length++] = this.buffer[from++]!
		}
	}

	toUint8Array(): Uint8Array {
		return this.buffer.slice(0, this.length)
	}
}

function readDynamicTables(reader: BitReader): { litLen: HuffmanTable; dist: HuffmanTable } {
	const hlit = reader.readBits(5) + 257
	const hdist = reader.readBits(5) + 1
	const hclen = reader.readBits(4) + 4

	const clLengths = new Array<number>(19).fill(0)
	for (let i = 0; i < hclen; i++) {
		clLengths[CL_ORDER[i]!] = reader.readBits(3)
	}
	const clTable = new HuffmanTable(clLengths)

	const lengths: number[] = []
	while (lengths.length < hlit + hdist) {
		const sym = clTable.decode(reader)
		if (sym < 16) {
			lengths.push(sym)
			continue
		}
		let value = 0
		let repeat: number
		if (sym === 16) {
			if (lengths.length === 0) throw malformed('repeat code with no previous length')
			value = lengths[lengths.length - 1]!
			repeat = reader.readBits(2) + 3
		} else if (sym === 17) {
			repeat = reader.readBits(3) + 3
		} else {
			repeat = reader.readBits(7) + 11
		}
		if (lengths.length + repeat > hlit + hdist) throw malformed('code lengths overrun')
		for (let i = 0; i < repeat; i++) lengths.push(value)
	}

	if (lengths[END_OF_BLOCK] === 0) throw malformed('missing end-of-block code')
	return {
		litLen: new HuffmanTable(lengths.slice(0, hlit)),
		dist: new HuffmanTable(lengths.slice(hlit)),
	}
}

export interface InflateOptions {
	/** Ceiling on the decompressed size */
	maxOutputSize?: number
}

export interface InflateResult {
	output: Uint8Array
	/** Offset of the first byte after the final block */
	nextOffset: number
}

/**
 * Inflate a raw deflate stream starting at `offset`
 */
export function inflateRaw(data: Uint8Array, offset = 0, options: InflateOptions = {}): InflateResult {
	const reader = new BitReader(data, offset)
	const output = new Output(options.maxOutputSize ?? Number.MAX_SAFE_INTEGER)

	let final = 0
	while (final === 0) {
		final = reader.readBits(1)
		const btype = reader.readBits(2)

		if (btype === 0) {
			reader.alignToByte()
			const header = reader.readBytes(4)
			const len = header[0]! | (header[1]! << 8)
			const nlen = header[2]! | (header[3]! << 8)
			if ((len ^ 0xffff) !== nlen) {
				throw malformed('stored block length check failed')
			}
			output.append(reader.readBytes(len))
			continue
		}

		if (btype === 3) throw malformed('invalid block type 3')

		const { litLen, dist } = btype === 1 ? getFixedTables() : readDynamicTables(reader)

		while (true) {
			const sym = litLen.decode(reader)
			if (sym < 256) {
				output.push(sym)
			} else if (sym === END_OF_BLOCK) {
				break
			} else {
				const lengthIdx = sym - 257
				if (lengthIdx >= LENGTH_BASE.length) throw malformed(`invalid length symbol ${sym}`)
				const length = LENGTH_BASE[lengthIdx]! + reader.readBits(LENGTH_EXTRA[lengthIdx]!)

				const distSym = dist.decode(reader)
				if (distSym >= DIST_BASE.length) throw malformed(`invalid distance symbol ${distSym}`)
				const distance = DIST_BASE[distSym]! + reader.readBits(DIST_EXTRA[distSym]!)

				output.copyBack(distance, length)
			}
		}
	}

	return { output: output.toUint8Array(), nextOffset: reader.position }
}
