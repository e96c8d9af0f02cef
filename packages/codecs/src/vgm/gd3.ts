/**
 * GD3 tag codec
 *
 * "Gd3 " | version u32 (0x00000100) | length u32 | UTF-16LE strings, each
 * terminated by 0x0000. Eleven strings: track, game, system and author in
 * English then Japanese pairs, followed by release date, creator and notes.
 */

import { ByteReader, ByteWriter, VgmError } from '@vgmkit/core'
import type { Decoded } from '@vgmkit/core'
import { resolveSession } from './session'
import type { Gd3LocaleData, Gd3Metadata, VgmDecodeOptions } from './types'

export const GD3_MAGIC = 'Gd3 '
export const GD3_VERSION = 0x00000100
export const GD3_HEADER_SIZE = 12
export const GD3_STRING_COUNT = 11

const LOCALE_FIELDS = ['track', 'game', 'system', 'author'] as const

/**
 * Metadata with every string empty
 */
export function createGd3(overrides: Partial<Gd3Metadata> = {}): Gd3Metadata {
	const blank = (): Gd3LocaleData => ({ track: '', game: '', system: '', author: '' })
	return {
		english: blank(),
		japanese: blank(),
		releaseDate: '',
		creator: '',
		notes: '',
		...overrides,
	}
}

/**
 * Whether a GD3 tag starts at `offset`
 */
export function isGd3(data: Uint8Array, offset = 0): boolean {
	return (
		data.length >= offset + 4 &&
		data[offset] === 0x47 &&
		data[offset + 1] === 0x64 &&
		data[offset + 2] === 0x33 &&
		data[offset + 3] === 0x20
	)
}

function decodeUtf16(units: Uint8Array, field: string): string {
	try {
		return new TextDecoder('utf-16le', { fatal: true }).decode(units)
	} catch (error) {
		throw new VgmError({
			kind: 'invalidUtf16Encoding',
			field,
			reason: error instanceof Error ? error.message : String(error),
		})
	}
}

/**
 * Split the string area on 0x0000 terminators; an unterminated tail is dropped
 */
function splitStrings(body: Uint8Array): Uint8Array[] {
	const strings: Uint8Array[] = []
	let start = 0
	for (let i = 0; i + 1 < body.length; i += 2) {
		if (body[i] === 0 && body[i + 1] === 0) {
			strings.push(body.subarray(start, i))
			start = i + 2
		}
	}
	return strings
}

const STRING_NAMES = [
	'english.track',
	'japanese.track',
	'english.game',
	'japanese.game',
	'english.system',
	'japanese.system',
	'english.author',
	'japanese.author',
	'releaseDate',
	'creator',
	'notes',
] as const

/**
 * Decode a GD3 tag at `offset`
 */
export function decodeGd3(data: Uint8Array, offset = 0, options: VgmDecodeOptions = {}): Decoded<Gd3Metadata> {
	const { config } = resolveSession(options)
	const reader = new ByteReader(data, offset)
	reader.require(GD3_HEADER_SIZE)

	const magic = reader.readAscii(4)
	if (magic !== GD3_MAGIC) {
		throw new VgmError({ kind: 'invalidMagicBytes', expected: GD3_MAGIC, found: magic, offset })
	}

	const version = reader.readU32LE()
	if (version !== GD3_VERSION) {
		throw new VgmError({ kind: 'unsupportedGd3Version', version, supportedVersions: [GD3_VERSION] })
	}

	const length = reader.readU32LE()
	config.checkMetadataSize(length)
	if (length % 2 !== 0) {
		throw new VgmError({
			kind: 'invalidDataFormat',
			field: 'gd3_strings',
			reason: 'UTF-16 data must have even byte count',
		})
	}
	const body = reader.readBytes(length)

	const raw = splitStrings(body)
	if (raw.length < GD3_STRING_COUNT) {
		throw new VgmError({
			kind: 'invalidDataLength',
			field: 'gd3_strings',
			expected: GD3_STRING_COUNT,
			actual: raw.length,
		})
	}

	const text = STRING_NAMES.map((name, i) => decodeUtf16(raw[i] ?? new Uint8Array(0), name))
	const pick = (i: number) => text[i] ?? ''
	const metadata: Gd3Metadata = {
		english: { track: pick(0), game: pick(2), system: pick(4), author: pick(6) },
		japanese: { track: pick(1), game: pick(3), system: pick(5), author: pick(7) },
		releaseDate: pick(8),
		creator: pick(9),
		notes: pick(10),
	}

	return { value: metadata, nextOffset: reader.position }
}

/**
 * Encode a GD3 tag
 */
export function encodeGd3(metadata: Gd3Metadata): Uint8Array {
	const strings: string[] = []
	for (const field of LOCALE_FIELDS) {
		strings.push(metadata.english[field], metadata.japanese[field])
	}
	strings.push(metadata.releaseDate, metadata.creator, metadata.notes)

	const writer = new ByteWriter(GD3_HEADER_SIZE + 64)
	writer.ascii(GD3_MAGIC).u32LE(GD3_VERSION).u32LE(0)

	strings.forEach((text, i) => {
		for (let c = 0; c < text.length; c++) {
			const unit = text.charCodeAt(c)
			if (unit === 0) {
				throw new VgmError({
					kind: 'invalidDataFormat',
					field: STRING_NAMES[i] ?? 'gd3_strings',
					reason: 'GD3 strings cannot contain U+0000',
				})
			}
			writer.u16LE(unit)
		}
		writer.u16LE(0)
	})

	writer.patchU32LE(8, writer.length - GD3_HEADER_SIZE)
	return writer.toUint8Array()
}
