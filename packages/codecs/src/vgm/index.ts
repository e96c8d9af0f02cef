export * from './types'
export { BitReader, MAX_BITS_PER_READ } from './bit-reader'
export { decompressBitPacking, decompressDpcm } from './compression'
export {
	DATA_BLOCK_HEADER_SIZE,
	ROM_DUMP_CHIPS,
	STREAM_CHIPS,
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
export {
	COMPATIBILITY_BYTE,
	PCM_RAM_WRITE_FULL_SIZE,
	decodeCommand,
	decodeCommands,
	encodeCommand,
	encodeCommands,
	parseCommands,
} from './commands'
export {
	DATA_OFFSET_BASE,
	EXTRA_HEADER_OFFSET_BASE,
	GD3_OFFSET_BASE,
	HEADER_FIELDS,
	HEADER_MAX_SIZE,
	HEADER_PREFIX_SIZE,
	LOOP_OFFSET_BASE,
	VGM_MAGIC,
	createHeader,
	dataStartOf,
	decodeHeader,
	encodeHeader,
	extraHeaderPositionOf,
	headerFieldOffset,
	type DecodedHeader,
} from './header'
export { GD3_MAGIC, GD3_VERSION, createGd3, decodeGd3, encodeGd3, isGd3 } from './gd3'
export { decodeVgm, gd3PositionOf, hasDataBlock, hasPcmWrite } from './decoder'
export { encodeVgm } from './encoder'
export { loadVgmFile, readBytes, readVgmFile, type LoadedVgm } from './file'
export { DEFAULT_MAX_VGZ_OUTPUT, isVgm, isVgz, unwrapVgz, wrapVgz, type UnwrapOptions } from './vgz'
export * from './validation'
export * from './chips'
export { Gd3Codec, VgmCodec, gd3Codec, vgmCodec } from './codec'
