/**
 * VGM header codec
 *
 * The header grows with each format version. Its real length is implied by
 * vgmDataOffset: fields at or past the command stream start are absent and
 * decode as 0. An optional extra header (v1.70+) may sit inside that region.
 */

import { ByteReader, ByteWriter, VgmError, bcdFromBytes, decimalToBcd } from '@vgmkit/core'
import type { ParserConfig } from '@vgmkit/core'
import { resolveSession } from './session'
import type { ExtraHeader, VgmDecodeOptions, VgmHeader, VgmHeaderField } from './types'

export const VGM_MAGIC = 'Vgm '

/** Fields before this offset are present in every file */
export const HEADER_PREFIX_SIZE = 0x40

/** End of the last known field */
export const HEADER_MAX_SIZE = 0xe4

/** Relative offsets in the header are measured from their own field */
export const GD3_OFFSET_BASE = 0x14
export const LOOP_OFFSET_BASE = 0x1c
export const DATA_OFFSET_BASE = 0x34
export const EXTRA_HEADER_OFFSET_BASE = 0xbc

/** The extra-header position is only checked once extraHeaderOffset itself has been read */
const EXTRA_HEADER_CHECK_START = EXTRA_HEADER_OFFSET_BASE + 4

interface FieldDescriptor {
	name: VgmHeaderField
	width: 1 | 2 | 4
}

/**
 * Header layout after the magic, in file order
 */
export const HEADER_FIELDS: readonly FieldDescriptor[] = [
	{ name: 'endOfFileOffset', width: 4 },
	{ name: 'version', width: 4 },
	{ name: 'sn76489Clock', width: 4 },
	{ name: 'ym2413Clock', width: 4 },
	{ name: 'gd3Offset', width: 4 },
	{ name: 'totalSamples', width: 4 },
	{ name: 'loopOffset', width: 4 },
	{ name: 'loopSamples', width: 4 },
	{ name: 'rate', width: 4 },
	{ name: 'sn76489Feedback', width: 2 },
	{ name: 'sn76489ShiftRegisterWidth', width: 1 },
	{ name: 'sn76489Flags', width: 1 },
	{ name: 'ym2612Clock', width: 4 },
	{ name: 'ym2151Clock', width: 4 },
	{ name: 'vgmDataOffset', width: 4 },
	{ name: 'segaPcmClock', width: 4 },
	{ name: 'segaPcmInterface', width: 4 },
	// 0x40: version-gated
	{ name: 'rf5c68Clock', width: 4 },
	{ name: 'ym2203Clock', width: 4 },
	{ name: 'ym2608Clock', width: 4 },
	{ name: 'ym2610Clock', width: 4 },
	{ name: 'ym3812Clock', width: 4 },
	{ name: 'ym3526Clock', width: 4 },
	{ name: 'y8950Clock', width: 4 },
	{ name: 'ymf262Clock', width: 4 },
	{ name: 'ymf278bClock', width: 4 },
	{ name: 'ymf271Clock', width: 4 },
	{ name: 'ymz280bClock', width: 4 },
	{ name: 'rf5c164Clock', width: 4 },
	{ name: 'pwmClock', width: 4 },
	{ name: 'ay8910Clock', width: 4 },
	{ name: 'ay8910ChipType', width: 1 },
	{ name: 'ay8910Flags', width: 1 },
	{ name: 'ym2203Ay8910Flags', width: 1 },
	{ name: 'ym2608Ay8910Flags', width: 1 },
	{ name: 'volumeModifier', width: 1 },
	{ name: 'reserved7D', width: 1 },
	{ name: 'loopBase', width: 1 },
	{ name: 'loopModifier', width: 1 },
	// 0x80
	{ name: 'gbDmgClock', width: 4 },
	{ name: 'nesApuClock', width: 4 },
	{ name: 'multiPcmClock', width: 4 },
	{ name: 'upd7759Clock', width: 4 },
	{ name: 'okim6258Clock', width: 4 },
	{ name: 'okim6258Flags', width: 1 },
	{ name: 'k054539Flags', width: 1 },
	{ name: 'c140ChipType', width: 1 },
	{ name: 'reserved97', width: 1 },
	{ name: 'okim6295Clock', width: 4 },
	{ name: 'k051649Clock', width: 4 },
	{ name: 'k054539Clock', width: 4 },
	{ name: 'huc6280Clock', width: 4 },
	{ name: 'c140Clock', width: 4 },
	{ name: 'k053260Clock', width: 4 },
	{ name: 'pokeyClock', width: 4 },
	{ name: 'qsoundClock', width: 4 },
	{ name: 'scspClock', width: 4 },
	{ name: 'extraHeaderOffset', width: 4 },
	// 0xC0
	{ name: 'wonderSwanClock', width: 4 },
	{ name: 'vsuClock', width: 4 },
	{ name: 'saa1099Clock', width: 4 },
	{ name: 'es5503Clock', width: 4 },
	{ name: 'es5506Clock', width: 4 },
	{ name: 'es5503Channels', width: 1 },
	{ name: 'es5506Channels', width: 1 },
	{ name: 'c352ClockDivider', width: 1 },
	{ name: 'reservedD7', width: 1 },
	{ name: 'x1010Clock', width: 4 },
	{ name: 'c352Clock', width: 4 },
	{ name: 'ga20Clock', width: 4 },
]

/**
 * Byte offset of a header field
 */
export function headerFieldOffset(name: VgmHeaderField): number {
	let at = VGM_MAGIC.length
	for (const field of HEADER_FIELDS) {
		if (field.name === name) return at
		at += field.width
	}
	throw new Error(`Unknown header field: ${name}`)
}

/**
 * Blank header: every field 0 except a 1.51 version and commands right after the prefix
 */
export function createHeader(overrides: Partial<VgmHeader> = {}): VgmHeader {
	return {
		endOfFileOffset: 0,
		version: 151,
		sn76489Clock: 0,
		ym2413Clock: 0,
		gd3Offset: 0,
		totalSamples: 0,
		loopOffset: 0,
		loopSamples: 0,
		rate: 0,
		sn76489Feedback: 0,
		sn76489ShiftRegisterWidth: 0,
		sn76489Flags: 0,
		ym2612Clock: 0,
		ym2151Clock: 0,
		vgmDataOffset: HEADER_PREFIX_SIZE - DATA_OFFSET_BASE,
		segaPcmClock: 0,
		segaPcmInterface: 0,
		rf5c68Clock: 0,
		ym2203Clock: 0,
		ym2608Clock: 0,
		ym2610Clock: 0,
		ym3812Clock: 0,
		ym3526Clock: 0,
		y8950Clock: 0,
		ymf262Clock: 0,
		ymf278bClock: 0,
		ymf271Clock: 0,
		ymz280bClock: 0,
		rf5c164Clock: 0,
		pwmClock: 0,
		ay8910Clock: 0,
		ay8910ChipType: 0,
		ay8910Flags: 0,
		ym2203Ay8910Flags: 0,
		ym2608Ay8910Flags: 0,
		volumeModifier: 0,
		reserved7D: 0,
		loopBase: 0,
		loopModifier: 0,
		gbDmgClock: 0,
		nesApuClock: 0,
		multiPcmClock: 0,
		upd7759Clock: 0,
		okim6258Clock: 0,
		okim6258Flags: 0,
		k054539Flags: 0,
		c140ChipType: 0,
		reserved97: 0,
		okim6295Clock: 0,
		k051649Clock: 0,
		k054539Clock: 0,
		huc6280Clock: 0,
		c140Clock: 0,
		k053260Clock: 0,
		pokeyClock: 0,
		qsoundClock: 0,
		scspClock: 0,
		extraHeaderOffset: 0,
		wonderSwanClock: 0,
		vsuClock: 0,
		saa1099Clock: 0,
		es5503Clock: 0,
		es5506Clock: 0,
		es5503Channels: 0,
		es5506Channels: 0,
		c352ClockDivider: 0,
		reservedD7: 0,
		x1010Clock: 0,
		c352Clock: 0,
		ga20Clock: 0,
		extraHeader: null,
		...overrides,
	}
}

/**
 * Absolute offset of the command stream; a zero vgmDataOffset is the pre-1.50 layout
 */
export function dataStartOf(header: Pick<VgmHeader, 'vgmDataOffset'>): number {
	return header.vgmDataOffset === 0 ? HEADER_PREFIX_SIZE : header.vgmDataOffset + DATA_OFFSET_BASE
}

/**
 * Absolute offset of the extra header, or null when none is declared
 */
export function extraHeaderPositionOf(header: Pick<VgmHeader, 'extraHeaderOffset'>): number | null {
	return header.extraHeaderOffset === 0 ? null : header.extraHeaderOffset + EXTRA_HEADER_OFFSET_BASE
}

/**
 * Where each extra-header list lives, in file order
 */
function extraSections(base: number, extra: Pick<ExtraHeader, 'chipClockOffset' | 'chipVolumeOffset'>) {
	const sections: { kind: 'clocks' | 'volumes'; position: number }[] = []
	if (extra.chipClockOffset !== 0) sections.push({ kind: 'clocks', position: base + 4 + extra.chipClockOffset })
	if (extra.chipVolumeOffset !== 0) sections.push({ kind: 'volumes', position: base + 8 + extra.chipVolumeOffset })
	sections.sort((a, b) => a.position - b.position)

	if (sections.length === 2 && sections[0]!.position === sections[1]!.position) {
		throw new VgmError({
			kind: 'corruptedHeader',
			reason: 'Chip clock and chip volume lists share a position',
			offset: sections[0]!.position,
		})
	}
	return sections
}

const EXTRA_HEADER_FIXED_SIZE = 12
const CHIP_CLOCK_ENTRY_SIZE = 5
const CHIP_VOLUME_ENTRY_SIZE = 4

function beyondDataStart(what: string, end: number, dataStart: number): VgmError {
	return new VgmError({
		kind: 'corruptedHeader',
		reason: `Extra header ${what} ends at ${end}, past the data start ${dataStart}`,
		offset: end,
	})
}

/**
 * Everything read here must end at or before `dataStart`
 */
function decodeExtraHeader(reader: ByteReader, base: number, dataStart: number, config: ParserConfig): ExtraHeader {
	if (base + EXTRA_HEADER_FIXED_SIZE > dataStart) {
		throw beyondDataStart('fields', base + EXTRA_HEADER_FIXED_SIZE, dataStart)
	}
	const extra: ExtraHeader = {
		headerSize: reader.readU32LE(),
		chipClockOffset: reader.readU32LE(),
		chipVolumeOffset: reader.readU32LE(),
		chipClocks: [],
		chipVolumes: [],
	}

	for (const section of extraSections(base, extra)) {
		if (section.position < reader.position) {
			throw new VgmError({
				kind: 'corruptedHeader',
				reason: `Extra header ${section.kind} list overlaps preceding data`,
				offset: section.position,
			})
		}
		if (section.position + 1 > dataStart) {
			throw beyondDataStart(`${section.kind} list`, section.position + 1, dataStart)
		}
		reader.seek(section.position)
		const count = reader.readU8()
		const entrySize = section.kind === 'clocks' ? CHIP_CLOCK_ENTRY_SIZE : CHIP_VOLUME_ENTRY_SIZE
		const end = section.position + 1 + count * entrySize
		if (end > dataStart) throw beyondDataStart(`${section.kind} list`, end, dataStart)

		if (section.kind === 'clocks') {
			config.checkChipEntries(count, 0)
			for (let i = 0; i < count; i++) {
				extra.chipClocks.push({ chipId: reader.readU8(), clock: reader.readU32LE() })
			}
		} else {
			config.checkChipEntries(0, count)
			for (let i = 0; i < count; i++) {
				extra.chipVolumes.push({ chipId: reader.readU8(), flags: reader.readU8(), volume: reader.readU16LE() })
			}
		}
	}

	return extra
}

function encodeExtraHeader(writer: ByteWriter, base: number, extra: ExtraHeader): void {
	writer.u32LE(extra.headerSize).u32LE(extra.chipClockOffset).u32LE(extra.chipVolumeOffset)

	for (const section of extraSections(base, extra)) {
		if (section.position < writer.length) {
			throw new VgmError({
				kind: 'inconsistentData',
				context: 'extra_header',
				reason: `${section.kind} list at ${section.position} overlaps data ending at ${writer.length}`,
			})
		}
		writer.padTo(section.position)

		const count = section.kind === 'clocks' ? extra.chipClocks.length : extra.chipVolumes.length
		if (count > 0xff) {
			throw new VgmError({ kind: 'invalidDataLength', field: `chip_${section.kind}`, expected: 0xff, actual: count })
		}
		writer.u8(count)

		if (section.kind === 'clocks') {
			for (const entry of extra.chipClocks) writer.u8(entry.chipId).u32LE(entry.clock)
		} else {
			for (const entry of extra.chipVolumes) writer.u8(entry.chipId).u8(entry.flags).u16LE(entry.volume)
		}
	}
}

/**
 * Decoded header plus the absolute offset of the first command
 */
export interface DecodedHeader {
	header: VgmHeader
	dataStart: number
}

/**
 * Decode the header at the start of `data`
 */
export function decodeHeader(data: Uint8Array, options: VgmDecodeOptions = {}): DecodedHeader {
	const { config, tracker } = resolveSession(options)

	return tracker.withContext(0, () => {
		if (data.length < HEADER_PREFIX_SIZE) {
			throw new VgmError({ kind: 'truncatedFile', expected: HEADER_PREFIX_SIZE, actual: data.length })
		}

		const reader = new ByteReader(data)
		const magic = reader.readAscii(4)
		if (magic !== VGM_MAGIC) {
			throw new VgmError({ kind: 'invalidMagicBytes', expected: VGM_MAGIC, found: magic, offset: 0 })
		}

		const header = createHeader({ version: 0, vgmDataOffset: 0 })
		let dataStart = HEADER_PREFIX_SIZE
		let extraPosition: number | null = null
		let stopped = false

		for (const field of HEADER_FIELDS) {
			const pos = reader.position

			if (pos >= HEADER_PREFIX_SIZE) {
				if (pos === dataStart) {
					stopped = true
					break
				}
				if (extraPosition !== null && pos >= EXTRA_HEADER_CHECK_START && pos === extraPosition) {
					header.extraHeader = decodeExtraHeader(reader, extraPosition, dataStart, config)
					stopped = true
					break
				}
				if (pos + field.width > dataStart) {
					stopped = true
					break
				}
			}

			if (field.name === 'version') {
				header.version = bcdFromBytes(reader.readBytes(4), 'version')
			} else {
				header[field.name] = reader.readUint(field.width)
			}

			if (field.name === 'vgmDataOffset') {
				dataStart = dataStartOf(header)
				if (dataStart < HEADER_PREFIX_SIZE || dataStart > data.length) {
					throw new VgmError({
						kind: 'invalidOffset',
						field: 'vgmDataOffset',
						offset: header.vgmDataOffset,
						fileSize: data.length,
					})
				}
			} else if (field.name === 'extraHeaderOffset') {
				extraPosition = extraHeaderPositionOf(header)
			}
		}

		// Extra header placed after the last known field
		if (!stopped && extraPosition !== null && extraPosition >= HEADER_MAX_SIZE && extraPosition <= dataStart) {
			reader.seek(extraPosition)
			header.extraHeader = decodeExtraHeader(reader, extraPosition, dataStart, config)
		}

		return { header, dataStart }
	})
}

/**
 * Encode a header, zero-padded to the command stream start
 */
export function encodeHeader(header: VgmHeader): Uint8Array {
	const dataStart = dataStartOf(header)
	const extraPosition = extraHeaderPositionOf(header)
	const writer = new ByteWriter(dataStart)
	writer.ascii(VGM_MAGIC)

	let stopped = false
	let extraWritten = false

	const writeExtra = (position: number) => {
		if (!header.extraHeader) {
			throw new VgmError({
				kind: 'inconsistentData',
				context: 'extra_header',
				reason: 'extraHeaderOffset is set but no extra header is present',
			})
		}
		encodeExtraHeader(writer, position, header.extraHeader)
		extraWritten = true
	}

	for (const field of HEADER_FIELDS) {
		const pos = writer.length

		if (pos >= HEADER_PREFIX_SIZE) {
			if (pos === dataStart) {
				stopped = true
				break
			}
			if (extraPosition !== null && pos >= EXTRA_HEADER_CHECK_START && pos === extraPosition) {
				writeExtra(extraPosition)
				stopped = true
				break
			}
			if (pos + field.width > dataStart) {
				stopped = true
				break
			}
		}

		if (field.name === 'version') {
			writer.bytes(decimalToBcd(header.version, 'version'))
		} else {
			writer.uint(field.width, header[field.name])
		}
	}

	if (!stopped && extraPosition !== null && extraPosition >= HEADER_MAX_SIZE && extraPosition <= dataStart) {
		writer.padTo(extraPosition)
		writeExtra(extraPosition)
	}

	if (header.extraHeader && !extraWritten) {
		throw new VgmError({
			kind: 'inconsistentData',
			context: 'extra_header',
			reason: 'Extra header is not reachable from extraHeaderOffset within the header',
		})
	}

	if (writer.length > dataStart) {
		throw new VgmError({
			kind: 'inconsistentData',
			context: 'header',
			reason: `Header ends at ${writer.length}, past the data start ${dataStart}`,
		})
	}

	return writer.padTo(dataStart).toUint8Array()
}
