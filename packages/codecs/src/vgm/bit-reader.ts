/**
 * MSB-first bit reader for compressed data block streams
 */

import { VgmError } from '@vgmkit/core'

export const MAX_BITS_PER_READ = 16

export class BitReader {
	private bytePos = 0
	private bitPos = 0

	constructor(private readonly data: Uint8Array) {}

	/**
	 * Bits consumed so far
	 */
	get bitsRead(): number {
		return this.bytePos * 8 + this.bitPos
	}

	/**
	 * Read `n` bits (at most 16), most significant bit first
	 */
	readBits(n: number): number {
		if (n > MAX_BITS_PER_READ) {
			throw new VgmError({
				kind: 'invalidDataFormat',
				field: 'bit_count',
				reason: `Cannot read more than ${MAX_BITS_PER_READ} bits at once, requested: ${n}`,
			})
		}

		let result = 0
		let read = 0
		while (read < n) {
			if (this.bytePos >= this.data.length) {
				throw new VgmError({ kind: 'bufferUnderflow', offset: this.bytePos, needed: 1, available: 0 })
			}

			const available = 8 - this.bitPos
			const take = Math.min(n - read, available)
			const bits = (this.data[this.bytePos]! >> (available - take)) & ((1 << take) - 1)

			result = (result << take) | bits
			read += take
			this.bitPos += take
			if (this.bitPos >= 8) {
				this.bitPos = 0
				this.bytePos++
			}
		}

		return result
	}
}
