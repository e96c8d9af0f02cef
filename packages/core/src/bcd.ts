/**
 * Binary-coded decimal helpers for the VGM version field
 * The field is a little-endian u32 whose nibbles are decimal digits: 1.51 is 51 01 00 00
 */

import { VgmError } from './errors'

const MAX_BCD_VALUE = 99_999_999

/**
 * Decode little-endian BCD bytes to a decimal number
 */
export function bcdFromBytes(bytes: Uint8Array | readonly number[], field = 'version'): number {
	let value = 0
	let scale = 1

	for (let i = 0; i < bytes.length; i++) {
		const byte = bytes[i]!
		const low = byte & 0x0f
		const high = byte >> 4
		if (low > 9 || high > 9) {
			throw new VgmError({ kind: 'invalidBcdData', field, data: Array.from(bytes) })
		}
		value += (low + high * 10) * scale
		scale *= 100
	}

	return value
}

/**
 * Encode a decimal number as 4 little-endian BCD bytes
 */
export function decimalToBcd(value: number, field = 'version'): Uint8Array {
	if (!Number.isInteger(value) || value < 0 || value > MAX_BCD_VALUE) {
		throw new VgmError({ kind: 'invalidBcdData', field, data: [value] })
	}

	const out = new Uint8Array(4)
	let rest = value
	for (let i = 0; i < 4; i++) {
		const pair = rest % 100
		out[i] = ((Math.floor(pair / 10) << 4) | (pair % 10)) & 0xff
		rest = Math.floor(rest / 100)
	}
	return out
}

/**
 * Human-readable version: 151 becomes "1.51", 170 becomes "1.70"
 */
export function formatVersion(version: number): string {
	const major = Math.floor(version / 100)
	const minor = version % 100
	return `${major}.${minor.toString().padStart(2, '0')}`
}

/**
 * Parse "1.51" back to 151
 */
export function parseVersion(text: string): number | null {
	const match = /^(\d+)\.(\d{2})$/.exec(text.trim())
	if (!match) return null
	return Number(match[1]) * 100 + Number(match[2])
}
