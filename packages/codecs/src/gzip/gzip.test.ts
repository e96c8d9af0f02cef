import { describe, expect, it } from 'vitest'
import { VgmError, isVgmError } from '@vgmkit/core'
import { deflateRaw } from './deflate'
import { FCOMMENT, FEXTRA, FHCRC, FNAME, crc32, gunzip, gzip, isGzip } from './gzip'
import { inflateRaw } from './inflate'

const ascii = (text: string) => new TextEncoder().encode(text)
const fromHex = (hex: string) => new Uint8Array(hex.match(/../g)?.map((h) => parseInt(h, 16)) ?? [])

// Deterministic pseudo-random bytes
function noise(length: number, seed = 7): Uint8Array {
	const out = new Uint8Array(length)
	let state = seed
	for (let i = 0; i < length; i++) {
		state = (state * 1103515245 + 12345) >>> 0
		out[i] = state >>> 24
	}
	return out
}

describe('crc32', () => {
	it('matches the standard check value', () => {
		expect(crc32(ascii('123456789'))).toBe(0xcbf43926)
	})

	it('is 0 for empty input', () => {
		expect(crc32(new Uint8Array(0))).toBe(0)
	})

	it('covers a sub-range', () => {
		const data = ascii('xx123456789yy')
		expect(crc32(data, 2, 9)).toBe(0xcbf43926)
	})
})

describe('inflateRaw', () => {
	it('decodes a stored block', () => {
		const stream = new Uint8Array([0x01, 0x03, 0x00, 0xfc, 0xff, 0x56, 0x67, 0x6d])
		const { output, nextOffset } = inflateRaw(stream)
		expect(Array.from(output)).toEqual([0x56, 0x67, 0x6d])
		expect(nextOffset).toBe(8)
	})

	it('decodes a fixed-Huffman literal', () => {
		const { output, nextOffset } = inflateRaw(new Uint8Array([0x4b, 0x04, 0x00]))
		expect(Array.from(output)).toEqual([0x61])
		expect(nextOffset).toBe(3)
	})

	it('decodes a dynamic-Huffman block', () => {
		const { output, nextOffset } = inflateRaw(fromHex('05c001090000000090adfe9f1001'))
		expect(Array.from(output)).toEqual([0x61, 0x61])
		expect(nextOffset).toBe(14)
	})

	it('resolves back references', () => {
		const text = 'the quick sound chip sang the quick song of the sound chip '.repeat(4)
		const stream = fromHex(
			'2bc94855282ccd4cce5628ce2fcd4b5148cec82c50284ecc4b572841920172f3d3c02248aa4a869a5600'
		)
		const { output } = inflateRaw(stream)
		expect(new TextDecoder().decode(output)).toBe(text)
	})

	it('starts at an offset and reports where the stream ended', () => {
		const data = new Uint8Array([0xaa, 0xbb, 0x4b, 0x04, 0x00, 0xcc])
		const { output, nextOffset } = inflateRaw(data, 2)
		expect(Array.from(output)).toEqual([0x61])
		expect(nextOffset).toBe(5)
	})

	it('rejects block type 3', () => {
		expect(() => inflateRaw(new Uint8Array([0x07]))).toThrow('invalid block type 3')
	})

	it('rejects a stored length that fails its complement', () => {
		expect(() => inflateRaw(new Uint8Array([0x01, 0x03, 0x00, 0x00, 0x00]))).toThrow(
			'stored block length check failed'
		)
	})

	it('reports truncation as buffer underflow', () => {
		try {
			inflateRaw(new Uint8Array([0x4b]))
			expect.unreachable()
		} catch (error) {
			expect(isVgmError(error, 'bufferUnderflow')).toBe(true)
		}
	})

	it('enforces the output ceiling', () => {
		const stream = deflateRaw(new Uint8Array(100))
		try {
			inflateRaw(stream, 0, { maxOutputSize: 50 })
			expect.unreachable()
		} catch (error) {
			expect(isVgmError(error, 'dataSizeExceedsLimit')).toBe(true)
		}
	})
})

describe('deflateRaw', () => {
	it('writes one fixed-Huffman literal', () => {
		expect(Array.from(deflateRaw(ascii('a')))).toEqual([0x4b, 0x04, 0x00])
	})

	it('writes an empty fixed block', () => {
		expect(Array.from(deflateRaw(new Uint8Array(0)))).toEqual([0x03, 0x00])
	})

	it('writes an empty stored block at level 0', () => {
		expect(Array.from(deflateRaw(new Uint8Array(0), { level: 0 }))).toEqual([0x01, 0x00, 0x00, 0xff, 0xff])
	})

	it('splits stored output into 65535-byte blocks', () => {
		const data = noise(70000)
		const stream = deflateRaw(data, { level: 0 })
		expect(stream.length).toBe(70000 + 10)
		expect(stream[0]).toBe(0x00)
		expect(stream[5 + 65535]).toBe(0x01)
		expect(inflateRaw(stream).output).toEqual(data)
	})

	it('compresses runs with overlapping matches', () => {
		const data = new Uint8Array(4096).fill(0x66)
		const stream = deflateRaw(data)
		expect(stream.length).toBeLessThan(64)
		expect(inflateRaw(stream).output).toEqual(data)
	})

	it.each([1, 6, 9])('restores mixed data at level %i', (level) => {
		const data = new Uint8Array(50000)
		data.set(noise(20000), 0)
		data.set(noise(20000), 20000)
		data.set(ascii('Gd3 '.repeat(2500)), 40000)
		expect(inflateRaw(deflateRaw(data, { level })).output).toEqual(data)
	})

	it('rejects a level outside 0-9', () => {
		expect(() => deflateRaw(new Uint8Array(1), { level: 10 })).toThrow(VgmError)
	})
})

describe('gzip', () => {
	it('frames a member', () => {
		expect(Array.from(gzip(ascii('a')))).toEqual([
			0x1f, 0x8b, 0x08, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0xff, 0x4b, 0x04, 0x00, 0x43, 0xbe, 0xb7, 0xe8,
			0x01, 0x00, 0x00, 0x00,
		])
	})

	it('stores a file name', () => {
		const out = gzip(ascii('a'), { fileName: 'x.vgm', mtime: 1 })
		expect(out[3]).toBe(FNAME)
		expect(out[4]).toBe(1)
		expect(Array.from(out.subarray(10, 16))).toEqual([0x78, 0x2e, 0x76, 0x67, 0x6d, 0x00])
		expect(Array.from(gunzip(out))).toEqual([0x61])
	})

	it('detects the gzip magic', () => {
		expect(isGzip(new Uint8Array([0x1f, 0x8b]))).toBe(true)
		expect(isGzip(ascii('Vgm '))).toBe(false)
		expect(isGzip(new Uint8Array([0x1f]))).toBe(false)
	})
})

describe('gunzip', () => {
	const member = (flags: number, fields: number[]) =>
		new Uint8Array([0x1f, 0x8b, 0x08, flags, 0, 0, 0, 0, 0, 0xff, ...fields, 0x4b, 0x04, 0x00, 0x43, 0xbe, 0xb7, 0xe8, 1, 0, 0, 0])

	it('round-trips', () => {
		const data = noise(3000)
		expect(gunzip(gzip(data))).toEqual(data)
	})

	it('skips FEXTRA, FNAME and FCOMMENT fields', () => {
		const fields = [0x02, 0x00, 0xaa, 0xbb, 0x6e, 0x00, 0x63, 0x00]
		expect(Array.from(gunzip(member(FEXTRA | FNAME | FCOMMENT, fields)))).toEqual([0x61])
	})

	it('checks FHCRC', () => {
		const header = new Uint8Array([0x1f, 0x8b, 0x08, FHCRC, 0, 0, 0, 0, 0, 0xff])
		const crc = crc32(header) & 0xffff
		const good = member(FHCRC, [crc & 0xff, crc >> 8])
		expect(Array.from(gunzip(good))).toEqual([0x61])

		const bad = member(FHCRC, [(crc + 1) & 0xff, crc >> 8])
		expect(() => gunzip(bad)).toThrow('header CRC mismatch')
	})

	it('concatenates members', () => {
		const data = new Uint8Array([...gzip(ascii('ab')), ...gzip(ascii('cd'))])
		expect(new TextDecoder().decode(gunzip(data))).toBe('abcd')
	})

	it('rejects a CRC mismatch', () => {
		const data = gzip(ascii('a'))
		data[13] = 0x00
		expect(() => gunzip(data)).toThrow('CRC32 mismatch')
	})

	it('rejects an ISIZE mismatch', () => {
		const data = gzip(ascii('a'))
		data[17] = 0x02
		try {
			gunzip(data)
			expect.unreachable()
		} catch (error) {
			expect(isVgmError(error, 'dataBlockSizeMismatch')).toBe(true)
		}
	})

	it('rejects a non-deflate method', () => {
		const data = gzip(ascii('a'))
		data[2] = 0x07
		expect(() => gunzip(data)).toThrow('Unsupported compression algorithm in data block: gzip method 7')
	})

	it('rejects bad magic', () => {
		try {
			gunzip(new Uint8Array(20))
			expect.unreachable()
		} catch (error) {
			expect(isVgmError(error, 'invalidMagicBytes')).toBe(true)
		}
	})

	it('rejects a missing trailer', () => {
		const data = gzip(ascii('a')).subarray(0, 15)
		expect(() => gunzip(data)).toThrow(VgmError)
	})

	it('caps total output across members', () => {
		const data = new Uint8Array([...gzip(new Uint8Array(40)), ...gzip(new Uint8Array(40))])
		expect(() => gunzip(data, { maxOutputSize: 60 })).toThrow('decompressed_size')
	})
})
