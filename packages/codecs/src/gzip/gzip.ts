/**
 * gzip member framing (RFC 1952) around the raw DEFLATE codec
 */

import { ByteReader, ByteWriter, VgmError, concatBytes, createLogger } from '@vgmkit/core'
import { DEFAULT_LEVEL, type DeflateOptions, deflateRaw } from './deflate'
import { inflateRaw } from './inflate'

const log = createLogger('gzip')

export const GZIP_ID1 = 0x1f
export const GZIP_ID2 = 0x8b
const CM_DEFLATE = 8
const OS_UNKNOWN = 255

// FLG bits
export const FTEXT = 0x01
export const FHCRC = 0x02
export const FEXTRA = 0x04
export const FNAME = 0x08
export const FCOMMENT = 0x10
const FRESERVED = 0xe0

/**
 * CRC-32 (IEEE 802.3, reflected)
 */
const crcTable: number[] = []
for (let n = 0; n < 256; n++) {
	let c = n
	for (let k = 0; k < 8; k++) {
		c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1
	}
	crcTable[n] = c
}

export function crc32(data: Uint8Array, start = 0, length = data.length - start): number {
	let crc = 0xffffffff
	for (let i = start; i < start + length; i++) {
		crc = crcTable[(crc ^ data[i]!) & 0xff]! ^ (crc >>> 8)
	}
	return (crc ^ 0xffffffff) >>> 0
}

export function isGzip(data: Uint8Array): boolean {
	return data.length >= 2 && data[0] === GZIP_ID1 && data[1] === GZIP_ID2
}

export interface GzipOptions extends DeflateOptions {
	/** Original file name stored in FNAME (Latin-1) */
	fileName?: string
	/** Modification time in Unix seconds; 0 means unknown */
	mtime?: number
}

export interface GunzipOptions {
	/** Ceiling on the total decompressed size */
	maxOutputSize?: number
}

/**
 * Header fields of one gzip member
 */
export interface GzipHeader {
	flags: number
	mtime: number
	extraFlags: number
	os: number
	extra: Uint8Array | null
	fileName: string | null
	comment: string | null
}

function malformed(reason: string): VgmError {
	return new VgmError({ kind: 'invalidDataFormat', field: 'gzip', reason })
}

function readZeroTerminated(reader: ByteReader): string {
	let text = ''
	for (let byte = reader.readU8(); byte !== 0; byte = reader.readU8()) {
		text += String.fromCharCode(byte)
	}
	return text
}

/**
 * Parse a member header, leaving the reader on the deflate stream
 */
export function readGzipHeader(reader: ByteReader): GzipHeader {
	const start = reader.position
	reader.require(10)
	const id1 = reader.readU8()
	const id2 = reader.readU8()
	if (id1 !== GZIP_ID1 || id2 !== GZIP_ID2) {
		throw new VgmError({
			kind: 'invalidMagicBytes',
			expected: '1F 8B',
			found: [id1, id2].map((b) => b.toString(16).toUpperCase().padStart(2, '0')).join(' '),
			offset: start,
		})
	}
	const method = reader.readU8()
	if (method !== CM_DEFLATE) {
		throw new VgmError({ kind: 'unsupportedCompression', algorithm: `gzip method ${method}` })
	}
	const flags = reader.readU8()
	if (flags & FRESERVED) throw malformed(`reserved flag bits set: 0x${flags.toString(16)}`)

	const mtime = reader.readU32LE()
	const extraFlags = reader.readU8()
	const os = reader.readU8()

	let extra: Uint8Array | null = null
	if (flags & FEXTRA) {
		const xlen = reader.readU16LE()
		extra = reader.readBytes(xlen)
	}
	const fileName = flags & FNAME ? readZeroTerminated(reader) : null
	const comment = flags & FCOMMENT ? readZeroTerminated(reader) : null

	if (flags & FHCRC) {
		const expected = crc32(reader.data, start, reader.position - start) & 0xffff
		const stored = reader.readU16LE()
		if (stored !== expected) {
			throw malformed(`header CRC mismatch: stored 0x${stored.toString(16)}, computed 0x${expected.toString(16)}`)
		}
	}

	return { flags, mtime, extraFlags, os, extra, fileName, comment }
}

/**
 * Decompress every member of a gzip stream and concatenate the output
 */
export function gunzip(data: Uint8Array, options: GunzipOptions = {}): Uint8Array {
	const maxOutputSize = options.maxOutputSize ?? Number.MAX_SAFE_INTEGER
	const reader = new ByteReader(data)
	const members: Uint8Array[] = []
	let total = 0

	do {
		const header = readGzipHeader(reader)
		if (header.fileName !== null) log.debug(`member ${members.length} name: ${header.fileName}`)

		const { output, nextOffset } = inflateRaw(data, reader.position, { maxOutputSize: maxOutputSize - total })
		reader.seek(nextOffset)

		const storedCrc = reader.readU32LE()
		const storedSize = reader.readU32LE()
		const actualCrc = crc32(output)
		if (storedCrc !== actualCrc) {
			throw malformed(`CRC32 mismatch: stored 0x${storedCrc.toString(16)}, computed 0x${actualCrc.toString(16)}`)
		}
		if (storedSize !== output.length % 0x1_0000_0000) {
			throw new VgmError({ kind: 'dataBlockSizeMismatch', headerSize: storedSize, actualSize: output.length })
		}

		members.push(output)
		total += output.length
	} while (reader.remaining() >= 2 && reader.data[reader.position] === GZIP_ID1 && reader.data[reader.position + 1] === GZIP_ID2)

	if (!reader.eof()) log.debug(`ignoring ${reader.remaining()} trailing bytes after gzip stream`)
	return members.length === 1 ? members[0]! : concatBytes(members)
}

/**
 * Compress into a single gzip member
 */
export function gzip(data: Uint8Array, options: GzipOptions = {}): Uint8Array {
	const compressed = deflateRaw(data, options)
	let flags = 0
	if (options.fileName !== undefined) flags |= FNAME

	const level = options.level ?? DEFAULT_LEVEL
	// XFL: 2 = maximum compression, 4 = fastest
	const extraFlags = level >= 9 ? 2 : level === 1 ? 4 : 0

	const out = new ByteWriter(compressed.length + 32)
	out.u8(GZIP_ID1).u8(GZIP_ID2).u8(CM_DEFLATE).u8(flags)
	out.u32LE(options.mtime ?? 0)
	out.u8(extraFlags).u8(OS_UNKNOWN)
	if (options.fileName !== undefined) out.ascii(options.fileName).u8(0)
	out.bytes(compressed)
	out.u32LE(crc32(data))
	out.u32LE(data.length)
	return out.toUint8Array()
}
