/**
 * Byte cursor helpers shared by the VGM, GD3 and gzip codecs
 * Little-endian unless the method name says otherwise
 */

import { VgmError } from './errors'

/**
 * Bounds-checked reader over a byte buffer
 */
export class ByteReader {
	readonly data: Uint8Array
	position: number

	constructor(data: Uint8Array, position = 0) {
		this.data = data
		this.position = position
	}

	get length(): number {
		return this.data.length
	}

	remaining(): number {
		return Math.max(0, this.data.length - this.position)
	}

	eof(): boolean {
		return this.position >= this.data.length
	}

	/**
	 * Throw a buffer underflow unless `n` more bytes are available
	 */
	require(n: number): void {
		const available = this.remaining()
		if (n > available) {
			throw new VgmError({ kind: 'bufferUnderflow', offset: this.position, needed: n, available })
		}
	}

	seek(pos: number): void {
		if (pos < 0 || pos > this.data.length) {
			throw new VgmError({
				kind: 'bufferUnderflow',
				offset: pos,
				needed: 0,
				available: this.data.length,
			})
		}
		this.position = pos
	}

	readU8(): number {
		this.require(1)
		return this.data[this.position++]!
	}

	readU16LE(): number {
		this.require(2)
		const v = this.data[this.position]! | (this.data[this.position + 1]! << 8)
		this.position += 2
		return v
	}

	readU16BE(): number {
		this.require(2)
		const v = (this.data[this.position]! << 8) | this.data[this.position + 1]!
		this.position += 2
		return v
	}

	readU24LE(): number {
		this.require(3)
		const v =
			this.data[this.position]! | (this.data[this.position + 1]! << 8) | (this.data[this.position + 2]! << 16)
		this.position += 3
		return v
	}

	readU32LE(): number {
		this.require(4)
		const v =
			this.data[this.position]! |
			(this.data[this.position + 1]! << 8) |
			(this.data[this.position + 2]! << 16) |
			(this.data[this.position + 3]! << 24)
		this.position += 4
		return v >>> 0
	}

	/**
	 * Read a little-endian unsigned value of 1, 2 or 4 bytes
	 */
	readUint(width: 1 | 2 | 4): number {
		if (width === 1) return this.readU8()
		if (width === 2) return this.readU16LE()
		return this.readU32LE()
	}

	/**
	 * Copy out `n` bytes
	 */
	readBytes(n: number): Uint8Array {
		this.require(n)
		const bytes = this.data.slice(this.position, this.position + n)
		this.position += n
		return bytes
	}

	/**
	 * Read `n` bytes as Latin-1 text
	 */
	readAscii(n: number): string {
		const bytes = this.readBytes(n)
		let str = ''
		for (let i = 0; i < bytes.length; i++) {
			str += String.fromCharCode(bytes[i]!)
		}
		return str
	}
}

/**
 * Growable little-endian writer
 */
export class ByteWriter {
	private buffer: Uint8Array
	private size = 0

	constructor(initialCapacity = 256) {
		this.buffer = new Uint8Array(Math.max(16, initialCapacity))
	}

	get length(): number {
		return this.size
	}

	private ensure(extra: number): void {
		const needed = this.size + extra
		if (needed <= this.buffer.length) return
		let capacity = this.buffer.length * 2
		while (capacity < needed) capacity *= 2
		const next = new Uint8Array(capacity)
		next.set(this.buffer.subarray(0, this.size))
		this.buffer = next
	}

	u8(value: number): this {
		this.ensure(1)
		this.buffer[this.size++] = value & 0xff
		return this
	}

	u16LE(value: number): this {
		this.ensure(2)
		this.buffer[this.size++] = value & 0xff
		this.buffer[this.size++] = (value >> 8) & 0xff
		return this
	}

	u16BE(value: number): this {
		this.ensure(2)
		this.buffer[this.size++] = (value >> 8) & 0xff
		this.buffer[this.size++] = value & 0xff
		return this
	}

	u24LE(value: number): this {
		this.ensure(3)
		this.buffer[this.size++] = value & 0xff
		this.buffer[this.size++] = (value >> 8) & 0xff
		this.buffer[this.size++] = (value >> 16) & 0xff
		return this
	}

	u32LE(value: number): this {
		this.ensure(4)
		this.buffer[this.size++] = value & 0xff
		this.buffer[this.size++] = (value >>> 8) & 0xff
		this.buffer[this.size++] = (value >>> 16) & 0xff
		this.buffer[this.size++] = (value >>> 24) & 0xff
		return this
	}

	uint(width: 1 | 2 | 4, value: number): this {
		if (width === 1) return this.u8(value)
		if (width === 2) return this.u16LE(value)
		return this.u32LE(value)
	}

	bytes(data: Uint8Array | readonly number[]): this {
		this.ensure(data.length)
		this.buffer.set(data, this.size)
		this.size += data.length
		return this
	}

	ascii(text: string): this {
		for (let i = 0; i < text.length; i++) {
			this.u8(text.charCodeAt(i))
		}
		return this
	}

	/**
	 * Zero-fill up to absolute length `target`
	 */
	padTo(target: number): this {
		if (target > this.size) {
			this.ensure(target - this.size)
			this.buffer.fill(0, this.size, target)
			this.size = target
		}
		return this
	}

	/**
	 * Overwrite a u32 at an earlier position
	 */
	patchU32LE(position: number, value: number): void {
		this.buffer[position] = value & 0xff
		this.buffer[position + 1] = (value >>> 8) & 0xff
		this.buffer[position + 2] = (value >>> 16) & 0xff
		this.buffer[position + 3] = (value >>> 24) & 0xff
	}

	toUint8Array(): Uint8Array {
		return this.buffer.slice(0, this.size)
	}
}

/**
 * Read 32-bit little-endian without a cursor
 */
export function readU32LE(data: Uint8Array, offset: number): number {
	return (
		(data[offset]! | (data[offset + 1]! << 8) | (data[offset + 2]! << 16) | (data[offset + 3]! << 24)) >>> 0
	)
}

/**
 * Concatenate byte arrays
 */
export function concatBytes(arrays: readonly Uint8Array[]): Uint8Array {
	const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0)
	const result = new Uint8Array(totalLength)
	let offset = 0

	for (const arr of arrays) {
		result.set(arr, offset)
		offset += arr.length
	}

	return result
}

/**
 * Compare two byte arrays, returning the first differing index or -1
 */
export function firstDifference(a: Uint8Array, b: Uint8Array): number {
	const n = Math.min(a.length, b.length)
	for (let i = 0; i < n; i++) {
		if (a[i] !== b[i]) return i
	}
	return a.length === b.length ? -1 : n
}
