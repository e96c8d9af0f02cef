/**
 * 0x67 data block payloads
 * The block type byte selects one of six shapes and, within a shape, the target chip
 */

import { ByteReader, ByteWriter, VgmError, hex8 } from '@vgmkit/core'
import type { Decoded } from '@vgmkit/core'
import { decompressBitPacking, decompressDpcm } from './compression'
import type {
	Compression,
	DataBlockContent,
	DataBlockShape,
	RamWriteChip,
	RamWriteChipType,
	RomDumpChip,
	RomDumpChipType,
	StreamChip,
	StreamChipType,
	VgmCommand,
} from './types'

/**
 * Stream chips by `blockType & 0x3F`
 */
export const STREAM_CHIPS: readonly StreamChip[] = [
	'ym2612',
	'rf5c68',
	'rf5c164',
	'pwm',
	'okim6258',
	'huc6280',
	'scsp',
	'nesApu',
	'mikey',
]

/**
 * ROM dump chips from block type 0x80
 */
export const ROM_DUMP_CHIPS: readonly RomDumpChip[] = [
	'segaPcm',
	'ym2608DeltaT',
	'ym2610Adpcm',
	'ym2610DeltaT',
	'ymf278b',
	'ymf271',
	'ymz280b',
	'ymf278bRam',
	'y8950DeltaT',
	'multiPcm',
	'upd7759',
	'okim6295',
	'k054539',
	'c140',
	'k053260',
	'qsound',
	'es5505',
	'x1010',
	'c352',
	'ga20',
]

const RAM_WRITE_CHIPS: Partial<Record<number, RamWriteChip>> = {
	0xc0: 'rf5c68',
	0xc1: 'rf5c164',
	0xc2: 'nesApu',
	0xe0: 'scsp',
	0xe1: 'es5503',
}

/**
 * Fixed header length in front of each shape's payload
 */
export const DATA_BLOCK_HEADER_SIZE: Record<DataBlockShape, number> = {
	uncompressedStream: 0,
	compressedStream: 10,
	decompressionTable: 6,
	romDump: 8,
	ramWriteSmall: 2,
	ramWriteLarge: 4,
}

export function streamChipType(blockType: number): StreamChipType {
	const value = blockType & 0x3f
	return STREAM_CHIPS[value] ?? { reserved: value }
}

export function romDumpChipType(blockType: number): RomDumpChipType {
	return ROM_DUMP_CHIPS[blockType - 0x80] ?? { reserved: blockType }
}

export function ramWriteChipType(blockType: number): RamWriteChipType {
	return RAM_WRITE_CHIPS[blockType] ?? { reserved: blockType }
}

/**
 * Display name for any chip type value
 */
export function chipTypeName(chipType: StreamChipType | RomDumpChipType | RamWriteChipType): string {
	return typeof chipType === 'string' ? chipType : `reserved(${hex8(chipType.reserved)})`
}

/**
 * Shape selected by a block type byte
 */
export function dataBlockShape(blockType: number): DataBlockShape {
	if (blockType <= 0x3f) return 'uncompressedStream'
	if (blockType <= 0x7e) return 'compressedStream'
	if (blockType === 0x7f) return 'decompressionTable'
	if (blockType <= 0xbf) return 'romDump'
	if (blockType <= 0xdf) return 'ramWriteSmall'
	return 'ramWriteLarge'
}

function readCompression(reader: ByteReader): { compression: Compression; uncompressedSize: number } {
	const compressionType = reader.readU8()
	const uncompressedSize = reader.readU32LE()
	const bitsDecompressed = reader.readU8()
	const bitsCompressed = reader.readU8()

	switch (compressionType) {
		case 0x00: {
			const subType = reader.readU8()
			const addValue = reader.readU16LE()
			return {
				compression: { type: 'bitPacking', bitsDecompressed, bitsCompressed, subType, addValue },
				uncompressedSize,
			}
		}
		case 0x01: {
			const reserved = reader.readU8()
			const startValue = reader.readU16LE()
			return {
				compression: { type: 'dpcm', bitsDecompressed, bitsCompressed, reserved, startValue },
				uncompressedSize,
			}
		}
		default:
			throw new VgmError({
				kind: 'invalidDataFormat',
				field: 'compression_type',
				reason: `Unknown compression type: ${hex8(compressionType)}`,
			})
	}
}

/**
 * Decode a block payload of `dataSize` bytes starting at `offset`
 */
export function decodeDataBlock(
	blockType: number,
	dataSize: number,
	data: Uint8Array,
	offset: number
): Decoded<DataBlockContent> {
	const shape = dataBlockShape(blockType)
	const headerSize = DATA_BLOCK_HEADER_SIZE[shape]
	const reader = new ByteReader(data, offset)

	if (shape === 'compressedStream') {
		const chipType = streamChipType(blockType)
		const { compression, uncompressedSize } = readCompression(reader)
		const payload = reader.readBytes(Math.max(0, dataSize - headerSize))
		return {
			value: { shape, chipType, compression, uncompressedSize, data: payload },
			nextOffset: reader.position,
		}
	}

	if (dataSize < headerSize) {
		throw new VgmError({ kind: 'invalidDataLength', field: 'data_block_size', expected: headerSize, actual: dataSize })
	}
	const payloadSize = dataSize - headerSize

	let value: DataBlockContent
	switch (shape) {
		case 'uncompressedStream':
			value = { shape, chipType: streamChipType(blockType), data: reader.readBytes(payloadSize) }
			break
		case 'decompressionTable':
			value = {
				shape,
				compressionType: reader.readU8(),
				subType: reader.readU8(),
				bitsDecompressed: reader.readU8(),
				bitsCompressed: reader.readU8(),
				valueCount: reader.readU16LE(),
				tableData: reader.readBytes(payloadSize),
			}
			break
		case 'romDump':
			value = {
				shape,
				chipType: romDumpChipType(blockType),
				totalSize: reader.readU32LE(),
				startAddress: reader.readU32LE(),
				data: reader.readBytes(payloadSize),
			}
			break
		case 'ramWriteSmall':
			value = {
				shape,
				chipType: ramWriteChipType(blockType),
				startAddress: reader.readU16LE(),
				data: reader.readBytes(payloadSize),
			}
			break
		case 'ramWriteLarge':
			value = {
				shape,
				chipType: ramWriteChipType(blockType),
				startAddress: reader.readU32LE(),
				data: reader.readBytes(payloadSize),
			}
			break
	}

	return { value, nextOffset: reader.position }
}

/**
 * Serialize a block payload (everything after the u32 size)
 */
export function encodeDataBlock(blockType: number, content: DataBlockContent): Uint8Array {
	const expected = dataBlockShape(blockType)
	if (content.shape !== expected) {
		throw new VgmError({
			kind: 'inconsistentData',
			context: 'data_block',
			reason: `Block type ${hex8(blockType)} holds ${expected}, got ${content.shape}`,
		})
	}

	const writer = new ByteWriter(DATA_BLOCK_HEADER_SIZE[content.shape] + 16)
	switch (content.shape) {
		case 'uncompressedStream':
			writer.bytes(content.data)
			break
		case 'compressedStream': {
			const c = content.compression
			writer
				.u8(c.type === 'bitPacking' ? 0x00 : 0x01)
				.u32LE(content.uncompressedSize)
				.u8(c.bitsDecompressed)
				.u8(c.bitsCompressed)
			if (c.type === 'bitPacking') {
				writer.u8(c.subType).u16LE(c.addValue)
			} else {
				writer.u8(c.reserved).u16LE(c.startValue)
			}
			writer.bytes(content.data)
			break
		}
		case 'decompressionTable':
			writer
				.u8(content.compressionType)
				.u8(content.subType)
				.u8(content.bitsDecompressed)
				.u8(content.bitsCompressed)
				.u16LE(content.valueCount)
				.bytes(content.tableData)
			break
		case 'romDump':
			writer.u32LE(content.totalSize).u32LE(content.startAddress).bytes(content.data)
			break
		case 'ramWriteSmall':
			writer.u16LE(content.startAddress).bytes(content.data)
			break
		case 'ramWriteLarge':
			writer.u32LE(content.startAddress).bytes(content.data)
			break
	}
	return writer.toUint8Array()
}

/**
 * Expand a stream block to raw samples. Table lookups (bit packing sub-type 2, DPCM) need `table`.
 */
export function decompressDataBlock(content: DataBlockContent, table?: Uint8Array): Uint8Array {
	if (content.shape === 'uncompressedStream') {
		return content.data.slice()
	}
	if (content.shape !== 'compressedStream') {
		throw new VgmError({
			kind: 'invalidDataFormat',
			field: 'data_block',
			reason: 'Cannot decompress non-stream data blocks',
		})
	}

	const c = content.compression
	if (c.type === 'bitPacking') {
		return decompressBitPacking(
			content.data,
			c.bitsCompressed,
			c.bitsDecompressed,
			c.subType,
			c.addValue,
			content.uncompressedSize,
			table
		)
	}

	if (!table) {
		throw new VgmError({
			kind: 'invalidDataFormat',
			field: 'decompression_table',
			reason: 'DPCM decompression requires a decompression table',
		})
	}
	return decompressDpcm(
		content.data,
		c.bitsCompressed,
		c.bitsDecompressed,
		c.startValue,
		content.uncompressedSize,
		table
	)
}

/**
 * Most recent 0x7F table for a compression type, as a player would see it at the end of the stream
 */
export function findDecompressionTable(commands: readonly VgmCommand[], compressionType: number): Uint8Array | undefined {
	let found: Uint8Array | undefined
	for (const command of commands) {
		if (
			command.type === 'dataBlock' &&
			command.data.shape === 'decompressionTable' &&
			command.data.compressionType === compressionType
		) {
			found = command.data.tableData
		}
	}
	return found
}

/**
 * Declared size of a block on the wire: shape header plus payload
 */
export function dataBlockSize(content: DataBlockContent): number {
	const payload = content.shape === 'decompressionTable' ? content.tableData.length : content.data.length
	return DATA_BLOCK_HEADER_SIZE[content.shape] + payload
}
