import { describe, expect, it } from 'vitest'
import { ParserConfig, VgmError, concatBytes } from '@vgmkit/core'
import { createGd3, decodeGd3, encodeGd3, isGd3 } from './gd3'

function catchError(fn: () => unknown): VgmError {
	try {
		fn()
	} catch (e) {
		if (e instanceof VgmError) return e
		throw e
	}
	throw new Error('expected a VgmError')
}

function gd3Bytes(length: number, body: number[]): Uint8Array {
	return new Uint8Array([0x47, 0x64, 0x33, 0x20, 0x00, 0x01, 0x00, 0x00, length, 0, 0, 0, ...body])
}

describe('GD3', () => {
	it('should encode empty metadata as eleven terminators', () => {
		const bytes = encodeGd3(createGd3())
		expect(bytes.length).toBe(34)
		expect(Array.from(bytes.subarray(0, 12))).toEqual([0x47, 0x64, 0x33, 0x20, 0, 1, 0, 0, 22, 0, 0, 0])
		expect(bytes.subarray(12).every((b) => b === 0)).toBe(true)
	})

	it('should write strings in English/Japanese pairs', () => {
		const metadata = createGd3()
		metadata.english.track = 'A'
		metadata.japanese.track = 'B'
		const bytes = encodeGd3(metadata)
		expect(bytes[8]).toBe(26)
		expect(Array.from(bytes.subarray(12, 20))).toEqual([0x41, 0, 0, 0, 0x42, 0, 0, 0])
	})

	it('should decode what it encodes', () => {
		const metadata = createGd3({
			english: { track: 'Green Hill Zone', game: 'Test Game', system: 'Sega Mega Drive', author: 'Someone' },
			japanese: { track: 'グリーンヒル', game: 'テスト', system: 'メガドライブ', author: '誰か' },
			releaseDate: '1991/06/23',
			creator: 'tester',
			notes: 'line one\nline two',
		})
		const bytes = encodeGd3(metadata)
		const decoded = decodeGd3(bytes)
		expect(decoded.value).toEqual(metadata)
		expect(decoded.nextOffset).toBe(bytes.length)
	})

	it('should decode at an offset', () => {
		const tag = encodeGd3(createGd3({ notes: 'x' }))
		const data = concatBytes([new Uint8Array([0x66, 0x00]), tag])
		expect(isGd3(data, 2)).toBe(true)
		expect(isGd3(data, 0)).toBe(false)
		const decoded = decodeGd3(data, 2)
		expect(decoded.value.notes).toBe('x')
		expect(decoded.nextOffset).toBe(data.length)
	})

	it('should reject other versions', () => {
		const bytes = encodeGd3(createGd3())
		bytes[5] = 0x02
		const error = catchError(() => decodeGd3(bytes))
		expect(error.kind).toBe('unsupportedGd3Version')
		expect(error.message).toBe('Unsupported GD3 version 0x200: supported versions are 0x100')
	})

	it('should reject the wrong magic', () => {
		const bytes = encodeGd3(createGd3())
		bytes[0] = 0x67
		expect(catchError(() => decodeGd3(bytes)).kind).toBe('invalidMagicBytes')
	})

	it('should reject an odd string area', () => {
		expect(catchError(() => decodeGd3(gd3Bytes(1, [0]))).detail).toEqual({
			kind: 'invalidDataFormat',
			field: 'gd3_strings',
			reason: 'UTF-16 data must have even byte count',
		})
	})

	it('should require eleven strings', () => {
		expect(catchError(() => decodeGd3(gd3Bytes(4, [0, 0, 0, 0]))).detail).toEqual({
			kind: 'invalidDataLength',
			field: 'gd3_strings',
			expected: 11,
			actual: 2,
		})
	})

	it('should check the declared length against the metadata limit', () => {
		const config = new ParserConfig({ maxMetadataSize: 10 })
		expect(catchError(() => decodeGd3(encodeGd3(createGd3()), 0, { config })).detail).toEqual({
			kind: 'dataSizeExceedsLimit',
			field: 'metadata_size',
			size: 22,
			limit: 10,
		})
	})

	it('should underflow when the length runs past the data', () => {
		expect(catchError(() => decodeGd3(gd3Bytes(100, [0, 0]))).kind).toBe('bufferUnderflow')
	})

	it('should refuse embedded NUL characters', () => {
		expect(catchError(() => encodeGd3(createGd3({ notes: 'a\u0000b' }))).kind).toBe('invalidDataFormat')
	})
})
