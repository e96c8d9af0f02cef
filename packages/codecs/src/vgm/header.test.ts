import { describe, expect, it } from 'vitest'
import { ParserConfig, VgmError } from '@vgmkit/core'
import { HEADER_FIELDS, createHeader, decodeHeader, encodeHeader, headerFieldOffset } from './header'

/**
 * Header buffer with the magic and a 1.xx version; `u32` / `u8` place raw values
 */
function headerBuffer(size: number, version: number, vgmDataOffset: number) {
	const data = new Uint8Array(size)
	const view = new DataView(data.buffer)
	data.set([0x56, 0x67, 0x6d, 0x20])
	data[0x08] = version
	data[0x09] = 0x01
	view.setUint32(0x34, vgmDataOffset, true)
	return {
		data,
		u32(offset: number, value: number) {
			view.setUint32(offset, value, true)
		},
		u16(offset: number, value: number) {
			view.setUint16(offset, value, true)
		},
	}
}

function catchError(fn: () => unknown): VgmError {
	try {
		fn()
	} catch (e) {
		if (e instanceof VgmError) return e
		throw e
	}
	throw new Error('expected a VgmError')
}

describe('header layout', () => {
	it('should place fields at their documented offsets', () => {
		expect(headerFieldOffset('endOfFileOffset')).toBe(0x04)
		expect(headerFieldOffset('sn76489Feedback')).toBe(0x28)
		expect(headerFieldOffset('vgmDataOffset')).toBe(0x34)
		expect(headerFieldOffset('rf5c68Clock')).toBe(0x40)
		expect(headerFieldOffset('ay8910ChipType')).toBe(0x78)
		expect(headerFieldOffset('loopModifier')).toBe(0x7f)
		expect(headerFieldOffset('okim6295Clock')).toBe(0x98)
		expect(headerFieldOffset('extraHeaderOffset')).toBe(0xbc)
		expect(headerFieldOffset('es5503Channels')).toBe(0xd4)
		expect(headerFieldOffset('ga20Clock')).toBe(0xe0)
	})

	it('should create a minimal header', () => {
		const header = createHeader({ sn76489Clock: 3579545 })
		expect(header.version).toBe(151)
		expect(header.vgmDataOffset).toBe(0x0c)
		expect(header.sn76489Clock).toBe(3579545)
		expect(header.extraHeader).toBeNull()
		expect(encodeHeader(header).length).toBe(0x40)
	})
})

describe('decodeHeader', () => {
	it('should decode a 64-byte header', () => {
		const buf = headerBuffer(0x40, 0x50, 0x0c)
		buf.u32(0x04, 0x1234)
		buf.u32(0x0c, 3579545)
		buf.u32(0x18, 44100)
		buf.u16(0x28, 0x0009)
		buf.data[0x2a] = 16

		const { header, dataStart } = decodeHeader(buf.data)
		expect(dataStart).toBe(0x40)
		expect(header.version).toBe(150)
		expect(header.endOfFileOffset).toBe(0x1234)
		expect(header.sn76489Clock).toBe(3579545)
		expect(header.totalSamples).toBe(44100)
		expect(header.sn76489Feedback).toBe(9)
		expect(header.sn76489ShiftRegisterWidth).toBe(16)
		expect(header.rf5c68Clock).toBe(0)
		expect(Array.from(encodeHeader(header))).toEqual(Array.from(buf.data))
	})

	it('should treat a zero data offset as the legacy layout', () => {
		const buf = headerBuffer(0x80, 0x01, 0)
		buf.u32(0x40, 12345)
		const { header, dataStart } = decodeHeader(buf.data)
		expect(dataStart).toBe(0x40)
		expect(header.rf5c68Clock).toBe(0)
		expect(encodeHeader(header).length).toBe(0x40)
	})

	it('should stop at the data start', () => {
		const buf = headerBuffer(0x7b, 0x51, 0x46)
		buf.data[0x79] = 0x01
		buf.data[0x7a] = 0x66
		const { header, dataStart } = decodeHeader(buf.data)
		expect(dataStart).toBe(0x7a)
		expect(header.ay8910Flags).toBe(1)
		expect(header.ym2203Ay8910Flags).toBe(0)
		expect(Array.from(encodeHeader(header))).toEqual(Array.from(buf.data.subarray(0, 0x7a)))
	})

	it('should not read a field that straddles the data start', () => {
		const buf = headerBuffer(0x44, 0x51, 0x0e)
		buf.u32(0x40, 0xffffffff)
		const { header, dataStart } = decodeHeader(buf.data)
		expect(dataStart).toBe(0x42)
		expect(header.rf5c68Clock).toBe(0)
		expect(encodeHeader(header).length).toBe(0x42)
	})

	it('should decode an extra header inside the field table', () => {
		const buf = headerBuffer(0x100, 0x70, 0xcc)
		buf.u32(0xbc, 0x04)
		buf.u32(0xc0, 12)
		buf.u32(0xc4, 8)
		buf.data[0xcc] = 1
		buf.data[0xcd] = 0x02
		buf.u32(0xce, 7670453)

		const { header, dataStart } = decodeHeader(buf.data)
		expect(dataStart).toBe(0x100)
		expect(header.extraHeader).toEqual({
			headerSize: 12,
			chipClockOffset: 8,
			chipVolumeOffset: 0,
			chipClocks: [{ chipId: 2, clock: 7670453 }],
			chipVolumes: [],
		})
		expect(header.wonderSwanClock).toBe(0)
		expect(Array.from(encodeHeader(header))).toEqual(Array.from(buf.data))
	})

	it('should keep the volume list first when its offset says so', () => {
		const buf = headerBuffer(0x100, 0x71, 0xcc)
		buf.u32(0xbc, 0x04)
		buf.u32(0xc0, 12)
		buf.u32(0xc4, 0x0d)
		buf.u32(0xc8, 0x04)
		buf.data[0xcc] = 1
		buf.data[0xcd] = 0x80
		buf.data[0xce] = 0x01
		buf.u16(0xcf, 0x0100)
		buf.data[0xd1] = 1
		buf.data[0xd2] = 0x00
		buf.u32(0xd3, 3579545)

		const { header } = decodeHeader(buf.data)
		expect(header.extraHeader?.chipVolumes).toEqual([{ chipId: 0x80, flags: 1, volume: 0x100 }])
		expect(header.extraHeader?.chipClocks).toEqual([{ chipId: 0, clock: 3579545 }])
		expect(Array.from(encodeHeader(header))).toEqual(Array.from(buf.data))
	})

	it('should decode an extra header placed after the last field', () => {
		const buf = headerBuffer(0x100, 0x71, 0xcc)
		buf.u32(0xbc, 0x30)
		buf.u32(0xe0, 1000000)
		buf.u32(0xec, 12)
		buf.u32(0xf0, 8)
		buf.data[0xf8] = 1
		buf.data[0xf9] = 0x01
		buf.u32(0xfa, 4000000)

		const { header } = decodeHeader(buf.data)
		expect(header.ga20Clock).toBe(1000000)
		expect(header.extraHeader?.chipClocks).toEqual([{ chipId: 1, clock: 4000000 }])
		expect(Array.from(encodeHeader(header))).toEqual(Array.from(buf.data))
	})

	it('should decode exactly the fields that end before the data start', () => {
		for (let offset = 0x0c; offset <= 0xb0; offset++) {
			const end = offset + 0x34
			const buf = headerBuffer(end, 0x51, offset)
			buf.data.fill(0x01, 0x40)

			const { header, dataStart } = decodeHeader(buf.data)
			expect(dataStart).toBe(end)
			for (const field of HEADER_FIELDS) {
				const at = headerFieldOffset(field.name)
				if (at < 0x40) continue
				expect(header[field.name] !== 0, `${field.name} with vgmDataOffset 0x${offset.toString(16)}`).toBe(
					at + field.width <= end
				)
			}
			expect(encodeHeader(header).length).toBe(end)
		}
	})

	it('should reject extra-header lists that run past the data start', () => {
		const buf = headerBuffer(0x100, 0x71, 0x9c)
		buf.u32(0xbc, 0x04)
		buf.u32(0xc0, 12)
		buf.u32(0xc4, 0x20)
		expect(catchError(() => decodeHeader(buf.data)).detail).toEqual({
			kind: 'corruptedHeader',
			reason: 'Extra header clocks list ends at 229, past the data start 208',
			offset: 229,
		})

		const inside = headerBuffer(0x100, 0x71, 0x9c)
		inside.u32(0xbc, 0x04)
		inside.u32(0xc0, 12)
		inside.u32(0xc4, 8)
		inside.data[0xcc] = 1
		expect(catchError(() => decodeHeader(inside.data)).detail).toEqual({
			kind: 'corruptedHeader',
			reason: 'Extra header clocks list ends at 210, past the data start 208',
			offset: 210,
		})
	})

	it('should reject short input', () => {
		expect(catchError(() => decodeHeader(new Uint8Array(63))).detail).toEqual({
			kind: 'truncatedFile',
			expected: 64,
			actual: 63,
		})
	})

	it('should reject the wrong magic', () => {
		const buf = headerBuffer(0x40, 0x51, 0x0c)
		buf.data[3] = 0x7a
		const error = catchError(() => decodeHeader(buf.data))
		expect(error.detail).toEqual({ kind: 'invalidMagicBytes', expected: 'Vgm ', found: 'Vgmz', offset: 0 })
	})

	it('should reject a data offset beyond the file', () => {
		const buf = headerBuffer(0x40, 0x51, 0x100)
		expect(catchError(() => decodeHeader(buf.data)).kind).toBe('invalidOffset')
	})

	it('should reject a non-decimal version', () => {
		const buf = headerBuffer(0x40, 0x5a, 0x0c)
		expect(catchError(() => decodeHeader(buf.data)).kind).toBe('invalidBcdData')
	})

	it('should enforce the chip entry limit', () => {
		const buf = headerBuffer(0x100, 0x70, 0xcc)
		buf.u32(0xbc, 0x04)
		buf.u32(0xc0, 12)
		buf.u32(0xc4, 8)
		buf.data[0xcc] = 3
		const config = new ParserConfig({ maxChipClockEntries: 2 })
		expect(catchError(() => decodeHeader(buf.data, { config })).detail).toEqual({
			kind: 'dataSizeExceedsLimit',
			field: 'chip_clock_entries',
			size: 3,
			limit: 2,
		})
	})

	it('should count against the parsing depth', () => {
		const buf = headerBuffer(0x40, 0x51, 0x0c)
		const config = new ParserConfig({ maxParsingDepth: 0 })
		expect(catchError(() => decodeHeader(buf.data, { config })).kind).toBe('parseStackOverflow')
	})
})

describe('encodeHeader', () => {
	it('should reject an extra header with no offset pointing at it', () => {
		const header = createHeader({
			extraHeader: { headerSize: 12, chipClockOffset: 0, chipVolumeOffset: 0, chipClocks: [], chipVolumes: [] },
		})
		expect(catchError(() => encodeHeader(header)).kind).toBe('inconsistentData')
	})

	it('should reject an offset with no extra header', () => {
		const header = createHeader({ vgmDataOffset: 0xcc, extraHeaderOffset: 0x04 })
		expect(catchError(() => encodeHeader(header)).kind).toBe('inconsistentData')
	})
})
