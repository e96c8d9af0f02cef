import { describe, expect, it } from 'vitest'
import { VgmError } from '@vgmkit/core'
import {
	chipTypeName,
	dataBlockShape,
	dataBlockSize,
	decodeDataBlock,
	decompressDataBlock,
	encodeDataBlock,
	findDecompressionTable,
	ramWriteChipType,
	romDumpChipType,
	streamChipType,
} from './data-block'
import type { DataBlockContent, VgmCommand } from './types'

function catchError(fn: () => unknown): VgmError {
	try {
		fn()
	} catch (e) {
		if (e instanceof VgmError) return e
		throw e
	}
	throw new Error('expected a VgmError')
}

const dpcmTable: DataBlockContent = {
	shape: 'decompressionTable',
	compressionType: 0x01,
	subType: 0x00,
	bitsDecompressed: 8,
	bitsCompressed: 2,
	valueCount: 4,
	tableData: new Uint8Array([0x00, 0x01, 0xff, 0x02]),
}

describe('block types', () => {
	it('should select the shape from the type range', () => {
		expect([0x00, 0x3f, 0x40, 0x7e, 0x7f, 0x80, 0xbf, 0xc0, 0xdf, 0xe0, 0xff].map(dataBlockShape)).toEqual([
			'uncompressedStream',
			'uncompressedStream',
			'compressedStream',
			'compressedStream',
			'decompressionTable',
			'romDump',
			'romDump',
			'ramWriteSmall',
			'ramWriteSmall',
			'ramWriteLarge',
			'ramWriteLarge',
		])
	})

	it('should name chips and keep unknown values', () => {
		expect(streamChipType(0x00)).toBe('ym2612')
		expect(streamChipType(0x40)).toBe('ym2612')
		expect(streamChipType(0x09)).toEqual({ reserved: 0x09 })
		expect(romDumpChipType(0x80)).toBe('segaPcm')
		expect(romDumpChipType(0x93)).toBe('ga20')
		expect(romDumpChipType(0x94)).toEqual({ reserved: 0x94 })
		expect(ramWriteChipType(0xc1)).toBe('rf5c164')
		expect(ramWriteChipType(0xc3)).toEqual({ reserved: 0xc3 })
		expect(chipTypeName({ reserved: 0x09 })).toBe('reserved(0x09)')
		expect(chipTypeName('scsp')).toBe('scsp')
	})
})

describe('decodeDataBlock', () => {
	it('should decode a ROM dump', () => {
		const data = new Uint8Array([0x00, 0x00, 0x01, 0x00, 0x20, 0x00, 0x00, 0x00, 1, 2, 3])
		const { value, nextOffset } = decodeDataBlock(0x80, 11, data, 0)
		expect(value).toEqual({
			shape: 'romDump',
			chipType: 'segaPcm',
			totalSize: 0x10000,
			startAddress: 0x20,
			data: new Uint8Array([1, 2, 3]),
		})
		expect(nextOffset).toBe(11)
	})

	it('should decode and expand a DPCM stream at an offset', () => {
		const data = new Uint8Array([0xaa, 0x01, 4, 0, 0, 0, 8, 2, 0, 100, 0, 0b00011011])
		const { value, nextOffset } = decodeDataBlock(0x41, 11, data, 1)
		expect(nextOffset).toBe(12)
		expect(value).toEqual({
			shape: 'compressedStream',
			chipType: 'rf5c68',
			compression: { type: 'dpcm', bitsDecompressed: 8, bitsCompressed: 2, reserved: 0, startValue: 100 },
			uncompressedSize: 4,
			data: new Uint8Array([0b00011011]),
		})
		expect(Array.from(decompressDataBlock(value, dpcmTable.tableData))).toEqual([100, 101, 100, 102])
	})

	it('should read a short compressed block as an empty payload', () => {
		const data = new Uint8Array([0x00, 0, 0, 0, 0, 8, 8, 0, 0, 0])
		const { value } = decodeDataBlock(0x40, 10, data, 0)
		expect(value.shape === 'compressedStream' && value.data.length).toBe(0)
	})

	it('should reject a size smaller than the shape header', () => {
		const error = catchError(() => decodeDataBlock(0xc0, 1, new Uint8Array(4), 0))
		expect(error.message).toBe('Invalid data length for data_block_size: expected 2, got 1')
	})

	it('should reject unknown compression types', () => {
		const data = new Uint8Array([0x02, 0, 0, 0, 0, 8, 8, 0, 0, 0])
		expect(catchError(() => decodeDataBlock(0x40, 10, data, 0)).message).toBe(
			'Invalid data format for compression_type: Unknown compression type: 0x02'
		)
	})
})

describe('encodeDataBlock', () => {
	it('should write a table block with its header', () => {
		const bytes = encodeDataBlock(0x7f, dpcmTable)
		expect(Array.from(bytes)).toEqual([0x01, 0x00, 8, 2, 4, 0, 0x00, 0x01, 0xff, 0x02])
		expect(dataBlockSize(dpcmTable)).toBe(bytes.length)
		expect(decodeDataBlock(0x7f, bytes.length, bytes, 0).value).toEqual(dpcmTable)
	})

	it('should write large RAM writes with a 32-bit address', () => {
		const content: DataBlockContent = {
			shape: 'ramWriteLarge',
			chipType: 'scsp',
			startAddress: 0x12345,
			data: new Uint8Array([9]),
		}
		expect(Array.from(encodeDataBlock(0xe0, content))).toEqual([0x45, 0x23, 0x01, 0x00, 9])
	})

	it('should reject content that does not fit the block type', () => {
		const content: DataBlockContent = { shape: 'ramWriteSmall', chipType: 'rf5c68', startAddress: 0, data: new Uint8Array(0) }
		expect(catchError(() => encodeDataBlock(0x00, content)).message).toBe(
			'Data inconsistency in data_block: Block type 0x00 holds uncompressedStream, got ramWriteSmall'
		)
	})
})

describe('decompressDataBlock', () => {
	it('should copy uncompressed streams', () => {
		const content: DataBlockContent = { shape: 'uncompressedStream', chipType: 'pwm', data: new Uint8Array([1, 2]) }
		const out = decompressDataBlock(content)
		expect(out).toEqual(content.data)
		expect(out).not.toBe(content.data)
	})

	it('should refuse non-stream blocks', () => {
		expect(catchError(() => decompressDataBlock(dpcmTable)).message).toBe(
			'Invalid data format for data_block: Cannot decompress non-stream data blocks'
		)
	})

	it('should require a table for DPCM', () => {
		const content: DataBlockContent = {
			shape: 'compressedStream',
			chipType: 'ym2612',
			compression: { type: 'dpcm', bitsDecompressed: 8, bitsCompressed: 2, reserved: 0, startValue: 0 },
			uncompressedSize: 1,
			data: new Uint8Array([0]),
		}
		expect(catchError(() => decompressDataBlock(content)).message).toBe(
			'Invalid data format for decompression_table: DPCM decompression requires a decompression table'
		)
	})
})

describe('findDecompressionTable', () => {
	it('should return the last table for the compression type', () => {
		const later = { ...dpcmTable, tableData: new Uint8Array([7]) }
		const commands: VgmCommand[] = [
			{ type: 'dataBlock', blockType: 0x7f, data: dpcmTable },
			{ type: 'wait735Samples' },
			{ type: 'dataBlock', blockType: 0x7f, data: later },
		]
		expect(findDecompressionTable(commands, 0x01)).toEqual(new Uint8Array([7]))
		expect(findDecompressionTable(commands, 0x00)).toBeUndefined()
	})
})
