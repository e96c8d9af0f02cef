/**
 * VGM (Video Game Music) types
 * Sound-chip register log: header, command stream, GD3 tag
 */

import type { ParserConfig, ResourceTracker } from '@vgmkit/core'

/**
 * Second chip of a pair is addressed with index 1
 */
export type ChipIndex = 0 | 1

// ─────────────────────────────────────────────────────────────────────────────
// Header
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Per-chip clock override from the extra header
 */
export interface ChipClockEntry {
	chipId: number
	clock: number
}

/**
 * Per-chip volume override from the extra header
 */
export interface ChipVolumeEntry {
	chipId: number
	flags: number
	volume: number
}

/**
 * Extra header (v1.70+), located at extraHeaderOffset + 0xBC
 */
export interface ExtraHeader {
	headerSize: number
	/** Relative to the field itself (extra header + 4); 0 = no clock list */
	chipClockOffset: number
	/** Relative to the field itself (extra header + 8); 0 = no volume list */
	chipVolumeOffset: number
	chipClocks: ChipClockEntry[]
	chipVolumes: ChipVolumeEntry[]
}

/**
 * VGM header. Fields the file's header does not reach stay 0.
 */
export interface VgmHeader {
	endOfFileOffset: number
	/** Decimal form of the BCD version, e.g. 151 */
	version: number
	sn76489Clock: number
	ym2413Clock: number
	gd3Offset: number
	totalSamples: number
	loopOffset: number
	loopSamples: number
	rate: number
	sn76489Feedback: number
	sn76489ShiftRegisterWidth: number
	sn76489Flags: number
	ym2612Clock: number
	ym2151Clock: number
	vgmDataOffset: number
	segaPcmClock: number
	segaPcmInterface: number
	rf5c68Clock: number
	ym2203Clock: number
	ym2608Clock: number
	ym2610Clock: number
	ym3812Clock: number
	ym3526Clock: number
	y8950Clock: number
	ymf262Clock: number
	ymf278bClock: number
	ymf271Clock: number
	ymz280bClock: number
	rf5c164Clock: number
	pwmClock: number
	ay8910Clock: number
	ay8910ChipType: number
	ay8910Flags: number
	ym2203Ay8910Flags: number
	ym2608Ay8910Flags: number
	volumeModifier: number
	reserved7D: number
	loopBase: number
	loopModifier: number
	gbDmgClock: number
	nesApuClock: number
	multiPcmClock: number
	upd7759Clock: number
	okim6258Clock: number
	okim6258Flags: number
	k054539Flags: number
	c140ChipType: number
	reserved97: number
	okim6295Clock: number
	k051649Clock: number
	k054539Clock: number
	huc6280Clock: number
	c140Clock: number
	k053260Clock: number
	pokeyClock: number
	qsoundClock: number
	scspClock: number
	extraHeaderOffset: number
	wonderSwanClock: number
	vsuClock: number
	saa1099Clock: number
	es5503Clock: number
	es5506Clock: number
	es5503Channels: number
	es5506Channels: number
	c352ClockDivider: number
	reservedD7: number
	x1010Clock: number
	c352Clock: number
	ga20Clock: number
	extraHeader: ExtraHeader | null
}

/**
 * Numeric header field names
 */
export type VgmHeaderField = Exclude<keyof VgmHeader, 'extraHeader'>

// ─────────────────────────────────────────────────────────────────────────────
// Data blocks
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Chip type byte with no assigned meaning
 */
export interface ReservedChipType {
	reserved: number
}

/**
 * Streamed PCM chip (block types 0x00-0x3F / 0x40-0x7E, low 6 bits)
 */
export type StreamChip =
	| 'ym2612'
	| 'rf5c68'
	| 'rf5c164'
	| 'pwm'
	| 'okim6258'
	| 'huc6280'
	| 'scsp'
	| 'nesApu'
	| 'mikey'

/**
 * ROM/RAM image target (block types 0x80-0xBF)
 */
export type RomDumpChip =
	| 'segaPcm'
	| 'ym2608DeltaT'
	| 'ym2610Adpcm'
	| 'ym2610DeltaT'
	| 'ymf278b'
	| 'ymf271'
	| 'ymz280b'
	| 'ymf278bRam'
	| 'y8950DeltaT'
	| 'multiPcm'
	| 'upd7759'
	| 'okim6295'
	| 'k054539'
	| 'c140'
	| 'k053260'
	| 'qsound'
	| 'es5505'
	| 'x1010'
	| 'c352'
	| 'ga20'

/**
 * RAM write target (block types 0xC0-0xFF)
 */
export type RamWriteChip = 'rf5c68' | 'rf5c164' | 'nesApu' | 'scsp' | 'es5503'

export type StreamChipType = StreamChip | ReservedChipType
export type RomDumpChipType = RomDumpChip | ReservedChipType
export type RamWriteChipType = RamWriteChip | ReservedChipType

/**
 * Bit packing sub-type byte
 */
export const BitPackingSubType = {
	copy: 0,
	shiftLeft: 1,
	table: 2,
} as const

/**
 * Compressed stream algorithm
 */
export type Compression =
	| {
			type: 'bitPacking'
			bitsDecompressed: number
			bitsCompressed: number
			/** See BitPackingSubType */
			subType: number
			addValue: number
	  }
	| {
			type: 'dpcm'
			bitsDecompressed: number
			bitsCompressed: number
			/** Written as 0 by conforming encoders */
			reserved: number
			startValue: number
	  }

/**
 * Structured payload of a 0x67 data block, keyed by block type range
 */
export type DataBlockContent =
	| { shape: 'uncompressedStream'; chipType: StreamChipType; data: Uint8Array }
	| {
			shape: 'compressedStream'
			chipType: StreamChipType
			compression: Compression
			uncompressedSize: number
			data: Uint8Array
	  }
	| {
			shape: 'decompressionTable'
			compressionType: number
			subType: number
			bitsDecompressed: number
			bitsCompressed: number
			valueCount: number
			tableData: Uint8Array
	  }
	| { shape: 'romDump'; chipType: RomDumpChipType; totalSize: number; startAddress: number; data: Uint8Array }
	| { shape: 'ramWriteSmall'; chipType: RamWriteChipType; startAddress: number; data: Uint8Array }
	| { shape: 'ramWriteLarge'; chipType: RamWriteChipType; startAddress: number; data: Uint8Array }

export type DataBlockShape = DataBlockContent['shape']

// ─────────────────────────────────────────────────────────────────────────────
// Commands
// ─────────────────────────────────────────────────────────────────────────────

/**
 * YM-family writes; chip 1 uses a parallel opcode (0x5X -> 0xAX)
 */
export type YmWriteType =
	| 'ym2413Write'
	| 'ym2612Port0Write'
	| 'ym2612Port1Write'
	| 'ym2151Write'
	| 'ym2203Write'
	| 'ym2608Port0Write'
	| 'ym2608Port1Write'
	| 'ym2610Port0Write'
	| 'ym2610Port1Write'
	| 'ym3812Write'
	| 'ym3526Write'
	| 'y8950Write'
	| 'ymz280bWrite'
	| 'ymf262Port0Write'
	| 'ymf262Port1Write'

/**
 * Writes where bit 7 of the register byte selects chip 1
 */
export type RegisterBitWriteType =
	| 'ay8910Write'
	| 'gameBoyDmgWrite'
	| 'nesApuWrite'
	| 'multiPcmWrite'
	| 'upd7759Write'
	| 'okim6258Write'
	| 'okim6295Write'
	| 'huc6280Write'
	| 'k053260Write'
	| 'pokeyWrite'
	| 'wonderSwanWrite'
	| 'saa1099Write'
	| 'es5506Write'
	| 'ga20Write'

/** aa dd, single chip */
export type RegisterWriteType = 'rf5c68Write' | 'rf5c164Write'

/** Little-endian 16-bit offset, then value */
export type OffsetWriteType = 'segaPcmWrite' | 'rf5c68WriteOffset' | 'rf5c164WriteOffset'

/** Big-endian 16-bit offset, then value */
export type OffsetWriteBEType = 'scspWrite' | 'wonderSwanWrite16' | 'vsuWrite' | 'x1010Write'

/** pp aa dd */
export type PortWriteType = 'ymf278bWrite' | 'ymf271Write' | 'scc1Write'

/** Big-endian 16-bit register, then value */
export type Register16WriteType = 'k054539Write' | 'c140Write' | 'es5503Write'

export interface YmWriteCommand {
	type: YmWriteType
	register: number
	value: number
	chipIndex: ChipIndex
}

export interface RegisterBitWriteCommand {
	type: RegisterBitWriteType
	/** 7-bit register; bit 7 on the wire is the chip index */
	register: number
	value: number
	chipIndex: ChipIndex
}

export interface RegisterWriteCommand {
	type: RegisterWriteType
	register: number
	value: number
}

export interface OffsetWriteCommand {
	type: OffsetWriteType
	offset: number
	value: number
}

export interface OffsetWriteBECommand {
	type: OffsetWriteBEType
	offset: number
	value: number
}

export interface PortWriteCommand {
	type: PortWriteType
	port: number
	register: number
	value: number
}

export interface Register16WriteCommand {
	type: Register16WriteType
	register: number
	value: number
}

export interface PsgWriteCommand {
	type: 'psgWrite'
	value: number
	chipIndex: ChipIndex
}

export interface GameGearPsgStereoCommand {
	type: 'gameGearPsgStereo'
	value: number
	chipIndex: ChipIndex
}

export interface Ay8910StereoMaskCommand {
	type: 'ay8910StereoMask'
	value: number
}

export interface WaitNSamplesCommand {
	type: 'waitNSamples'
	n: number
}

/** 1/60 s at 44.1 kHz */
export interface Wait735SamplesCommand {
	type: 'wait735Samples'
}

/** 1/50 s at 44.1 kHz */
export interface Wait882SamplesCommand {
	type: 'wait882Samples'
}

export interface EndOfSoundDataCommand {
	type: 'endOfSoundData'
}

export interface DataBlockCommand {
	type: 'dataBlock'
	blockType: number
	data: DataBlockContent
}

export interface PcmRamWriteCommand {
	type: 'pcmRamWrite'
	chipType: number
	readOffset: number
	writeOffset: number
	/** 0 on the wire means 0x01000000 */
	size: number
	data: Uint8Array
}

/** Waits n + 1 samples, n in 0..15 */
export interface WaitNSamplesPlus1Command {
	type: 'waitNSamplesPlus1'
	n: number
}

/** Writes the next PCM byte to YM2612 register 0x2A, then waits n samples */
export interface Ym2612Port0Address2AWriteWaitCommand {
	type: 'ym2612Port0Address2AWriteWait'
	n: number
}

export interface DacStreamSetupControlCommand {
	type: 'dacStreamSetupControl'
	streamId: number
	/** 7-bit chip type; bit 7 on the wire is the chip index */
	chipType: number
	port: number
	command: number
	chipIndex: ChipIndex
}

export interface DacStreamSetDataCommand {
	type: 'dacStreamSetData'
	streamId: number
	dataBankId: number
	stepSize: number
	stepBase: number
}

export interface DacStreamSetFrequencyCommand {
	type: 'dacStreamSetFrequency'
	streamId: number
	frequency: number
}

export interface DacStreamStartCommand {
	type: 'dacStreamStart'
	streamId: number
	dataStartOffset: number
	lengthMode: number
	dataLength: number
}

export interface DacStreamStopCommand {
	type: 'dacStreamStop'
	streamId: number
}

export interface DacStreamStartFastCommand {
	type: 'dacStreamStartFast'
	streamId: number
	blockId: number
	flags: number
}

/** 4-bit register, 12-bit value */
export interface PwmWriteCommand {
	type: 'pwmWrite'
	register: number
	value: number
}

export interface MultiPcmSetBankCommand {
	type: 'multiPcmSetBank'
	channel: number
	offset: number
}

export interface QsoundWriteCommand {
	type: 'qsoundWrite'
	register: number
	value: number
}

export interface Es5506Write16Command {
	type: 'es5506Write16'
	register: number
	value: number
}

export interface SeekPcmCommand {
	type: 'seekPcm'
	offset: number
}

export interface C352WriteCommand {
	type: 'c352Write'
	register: number
	value: number
}

/**
 * One entry of the command stream
 */
export type VgmCommand =
	| PsgWriteCommand
	| GameGearPsgStereoCommand
	| Ay8910StereoMaskCommand
	| YmWriteCommand
	| WaitNSamplesCommand
	| Wait735SamplesCommand
	| Wait882SamplesCommand
	| EndOfSoundDataCommand
	| DataBlockCommand
	| PcmRamWriteCommand
	| WaitNSamplesPlus1Command
	| Ym2612Port0Address2AWriteWaitCommand
	| DacStreamSetupControlCommand
	| DacStreamSetDataCommand
	| DacStreamSetFrequencyCommand
	| DacStreamStartCommand
	| DacStreamStopCommand
	| DacStreamStartFastCommand
	| RegisterBitWriteCommand
	| RegisterWriteCommand
	| PwmWriteCommand
	| OffsetWriteCommand
	| OffsetWriteBECommand
	| MultiPcmSetBankCommand
	| QsoundWriteCommand
	| PortWriteCommand
	| Register16WriteCommand
	| Es5506Write16Command
	| SeekPcmCommand
	| C352WriteCommand

export type VgmCommandType = VgmCommand['type']

// ─────────────────────────────────────────────────────────────────────────────
// GD3 and file
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One language's worth of GD3 strings
 */
export interface Gd3LocaleData {
	track: string
	game: string
	system: string
	author: string
}

/**
 * GD3 tag
 */
export interface Gd3Metadata {
	english: Gd3LocaleData
	japanese: Gd3LocaleData
	releaseDate: string
	creator: string
	notes: string
}

/**
 * Decoded VGM file
 */
export interface VgmFile {
	header: VgmHeader
	commands: VgmCommand[]
	metadata: Gd3Metadata | null
}

/**
 * Parse session: immutable limits plus the mutable tracker for this call
 */
export interface VgmDecodeOptions {
	/** Ignored when `tracker` is given: the tracker's own limits apply */
	config?: ParserConfig
	tracker?: ResourceTracker
}

/**
 * Serialization options
 */
export interface VgmEncodeOptions {
	/** Wrap the output in gzip (VGZ) */
	compress?: boolean
}

/**
 * Quick summary without full structural detail
 */
export interface VgmInfo {
	version: string
	totalSamples: number
	loopSamples: number
	durationSeconds: number
	loopSeconds: number
	commandCount: number
	dataBlockCount: number
	chips: string[]
	hasMetadata: boolean
	title: string
	game: string
}
