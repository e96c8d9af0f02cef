import { describe, expect, it } from 'vitest'
import { ByteReader, ByteWriter, concatBytes, firstDifference, readU32LE } from './bytes'
import { VgmError } from './errors'

describe('ByteReader', () => {
	it('should read little- and big-endian values', () => {
		const reader = new ByteReader(new Uint8Array([0x01, 0x02, 0x03, 0x04, 0x05, 0x06, 0x07, 0x08, 0x09, 0x0a, 0x0b]))
		expect(reader.readU8()).toBe(0x01)
		expect(reader.readU16LE()).toBe(0x0302)
		expect(reader.readU16BE()).toBe(0x0405)
		expect(reader.readU24LE()).toBe(0x080706)
		expect(reader.position).toBe(8)
		expect(reader.remaining()).toBe(3)
	})

	it('should read u32 values as unsigned', () => {
		const reader = new ByteReader(new Uint8Array([0xff, 0xff, 0xff, 0xff]))
		expect(reader.readU32LE()).toBe(0xffffffff)
		expect(reader.eof()).toBe(true)
	})

	it('should throw a structured underflow past the end', () => {
		const reader = new ByteReader(new Uint8Array([1, 2]), 1)
		try {
			reader.readU16LE()
			expect.unreachable()
		} catch (e) {
			expect(e).toBeInstanceOf(VgmError)
			if (e instanceof VgmError) {
				expect(e.detail).toEqual({ kind: 'bufferUnderflow', offset: 1, needed: 2, available: 1 })
			}
		}
		expect(reader.position).toBe(1)
	})

	it('should copy bytes and read ASCII', () => {
		const data = new Uint8Array([0x56, 0x67, 0x6d, 0x20, 9])
		const reader = new ByteReader(data)
		expect(reader.readAscii(4)).toBe('Vgm ')
		const copy = reader.readBytes(1)
		data[4] = 0
		expect(copy[0]).toBe(9)
	})
})

describe('ByteWriter', () => {
	it('should write values and grow', () => {
		const writer = new ByteWriter(1)
		writer.u8(0x12).u16LE(0x3456).u16BE(0x789a).u24LE(0xbcdef0).u32LE(0xfedcba98)
		expect(Array.from(writer.toUint8Array())).toEqual([
			0x12, 0x56, 0x34, 0x78, 0x9a, 0xf0, 0xde, 0xbc, 0x98, 0xba, 0xdc, 0xfe,
		])
		expect(writer.length).toBe(12)
	})

	it('should pad, patch and write ASCII', () => {
		const writer = new ByteWriter()
		writer.ascii('Gd3 ').u32LE(0).padTo(10)
		writer.patchU32LE(4, 0x01020304)
		expect(Array.from(writer.toUint8Array())).toEqual([0x47, 0x64, 0x33, 0x20, 4, 3, 2, 1, 0, 0])
		writer.padTo(4)
		expect(writer.length).toBe(10)
	})

	it('should write variable-width integers', () => {
		const writer = new ByteWriter()
		writer.uint(1, 0x11).uint(2, 0x2233).uint(4, 0x44556677)
		const reader = new ByteReader(writer.toUint8Array())
		expect(reader.readUint(1)).toBe(0x11)
		expect(reader.readUint(2)).toBe(0x2233)
		expect(reader.readUint(4)).toBe(0x44556677)
	})
})

describe('byte helpers', () => {
	it('should concatenate arrays', () => {
		expect(Array.from(concatBytes([new Uint8Array([1]), new Uint8Array([]), new Uint8Array([2, 3])]))).toEqual([1, 2, 3])
	})

	it('should find the first difference', () => {
		expect(firstDifference(new Uint8Array([1, 2, 3]), new Uint8Array([1, 2, 3]))).toBe(-1)
		expect(firstDifference(new Uint8Array([1, 2, 3]), new Uint8Array([1, 9, 3]))).toBe(1)
		expect(firstDifference(new Uint8Array([1, 2]), new Uint8Array([1, 2, 3]))).toBe(2)
	})

	it('should read u32 at an offset', () => {
		expect(readU32LE(new Uint8Array([0, 0x78, 0x56, 0x34, 0x12]), 1)).toBe(0x12345678)
	})
})
