/**
 * Data block decompression: bit packing and DPCM
 *
 * Both algorithms emit ceil(bitsDecompressed / 8) little-endian bytes per
 * value (at most 4) and stop once `uncompressedSize` bytes exist.
 */

import { VgmError, hex8 } from '@vgmkit/core'
import { BitReader, MAX_BITS_PER_READ } from './bit-reader'
import { BitPackingSubType } from './types'

function invalid(field: string, reason: string): VgmError {
	return new VgmError({ kind: 'invalidDataFormat', field, reason })
}

function checkBitWidths(bitsCompressed: number, bitsDecompressed: number): number {
	if (bitsCompressed < 1 || bitsCompressed > MAX_BITS_PER_READ) {
		throw invalid('bits_compressed', `Compressed width must be 1-${MAX_BITS_PER_READ} bits, got ${bitsCompressed}`)
	}
	if (bitsDecompressed < 1 || bitsDecompressed > 32) {
		throw invalid('bits_decompressed', `Decompressed width must be 1-32 bits, got ${bitsDecompressed}`)
	}
	return Math.ceil(bitsDecompressed / 8)
}

/**
 * Refuse sizes the stream cannot fill before allocating the output
 */
function checkOutputSize(
	compressed: Uint8Array,
	bitsCompressed: number,
	bytesPerValue: number,
	uncompressedSize: number
): void {
	const values = Math.floor((compressed.length * 8) / bitsCompressed)
	const available = values * Math.min(bytesPerValue, 4)
	if (uncompressedSize > available) {
		throw new VgmError({ kind: 'bufferUnderflow', offset: 0, needed: uncompressedSize, available })
	}
}

function readTableValue(table: Uint8Array, index: number, bytesPerValue: number, field: string): number {
	const at = index * bytesPerValue
	if (at + bytesPerValue > table.length) {
		throw invalid(field, `Table index ${at} out of bounds`)
	}
	let value = 0
	for (let i = 0; i < Math.min(bytesPerValue, 4); i++) {
		value |= table[at + i]! << (i * 8)
	}
	return value >>> 0
}

/**
 * Append the low bytes of `value`, little-endian, without passing `size`
 */
function pushValue(out: Uint8Array, length: number, value: number, bytesPerValue: number): number {
	let n = length
	for (let i = 0; i < Math.min(bytesPerValue, 4) && n < out.length; i++) {
		out[n++] = (value >>> (i * 8)) & 0xff
	}
	return n
}

/**
 * Expand bit-packed values.
 * copy: value + add; shiftLeft: (value << (bd - bc)) + add; table: table[value] with no add.
 */
export function decompressBitPacking(
	compressed: Uint8Array,
	bitsCompressed: number,
	bitsDecompressed: number,
	subType: number,
	addValue: number,
	uncompressedSize: number,
	table?: Uint8Array
): Uint8Array {
	const bytesPerValue = checkBitWidths(bitsCompressed, bitsDecompressed)
	if (subType === BitPackingSubType.shiftLeft && bitsDecompressed < bitsCompressed) {
		throw invalid('bits_decompressed', 'Shift-left packing needs bitsDecompressed >= bitsCompressed')
	}

	checkOutputSize(compressed, bitsCompressed, bytesPerValue, uncompressedSize)
	const out = new Uint8Array(uncompressedSize)
	const reader = new BitReader(compressed)
	let length = 0

	while (length < uncompressedSize) {
		const raw = reader.readBits(bitsCompressed)
		let value: number

		switch (subType) {
			case BitPackingSubType.copy:
				value = (raw + addValue) >>> 0
				break
			case BitPackingSubType.shiftLeft:
				value = ((raw << (bitsDecompressed - bitsCompressed)) + addValue) >>> 0
				break
			case BitPackingSubType.table:
				if (!table) {
					throw invalid('decompression_table', 'Bit packing sub-type 0x02 requires a decompression table')
				}
				value = readTableValue(table, raw, bytesPerValue, 'table_index')
				break
			default:
				throw invalid('bit_packing_sub_type', `Unknown bit packing sub-type: ${hex8(subType)}`)
		}

		length = pushValue(out, length, value, bytesPerValue)
	}

	return out
}

/**
 * Expand DPCM: each symbol indexes a signed delta in the table; the running
 * state starts at `startValue` and wraps at 32 bits.
 */
export function decompressDpcm(
	compressed: Uint8Array,
	bitsCompressed: number,
	bitsDecompressed: number,
	startValue: number,
	uncompressedSize: number,
	table: Uint8Array
): Uint8Array {
	const bytesPerValue = checkBitWidths(bitsCompressed, bitsDecompressed)
	const signBit = bytesPerValue < 4 ? 2 ** (bytesPerValue * 8 - 1) : 0

	checkOutputSize(compressed, bitsCompressed, bytesPerValue, uncompressedSize)
	const out = new Uint8Array(uncompressedSize)
	const reader = new BitReader(compressed)
	let state = startValue | 0
	let length = 0

	while (length < uncompressedSize) {
		const index = reader.readBits(bitsCompressed)
		let delta = readTableValue(table, index, bytesPerValue, 'dpcm_table_index')
		if (signBit !== 0 && delta >= signBit) {
			delta -= signBit * 2
		}

		state = (state + delta) | 0
		length = pushValue(out, length, state, bytesPerValue)
	}

	return out
}
