import type { Format } from './types'

interface MagicSignature {
	bytes: number[]
	offset?: number
}

/**
 * Magic bytes for format detection
 */
export const MAGIC_BYTES: Record<Format, MagicSignature> = {
	vgm: { bytes: [0x56, 0x67, 0x6d, 0x20] }, // "Vgm "
	vgz: { bytes: [0x1f, 0x8b] }, // gzip member
	gd3: { bytes: [0x47, 0x64, 0x33, 0x20] }, // "Gd3 "
}

/**
 * Check if bytes match magic signature
 */
export function matchMagic(data: Uint8Array, magic: MagicSignature, at = 0): boolean {
	const offset = at + (magic.offset ?? 0)
	if (data.length < offset + magic.bytes.length) return false

	for (let i = 0; i < magic.bytes.length; i++) {
		if (data[offset + i] !== magic.bytes[i]) return false
	}
	return true
}

/**
 * Detect format from binary data
 */
export function detectFormat(data: Uint8Array): Format | null {
	if (matchMagic(data, MAGIC_BYTES.vgm)) return 'vgm'
	if (matchMagic(data, MAGIC_BYTES.vgz)) return 'vgz'
	if (matchMagic(data, MAGIC_BYTES.gd3)) return 'gd3'
	return null
}

/**
 * Get format from a file path's extension
 */
export function formatFromPath(path: string): Format | null {
	const dot = path.lastIndexOf('.')
	if (dot < 0) return null
	const ext = path.slice(dot + 1).toLowerCase()
	if (ext === 'vgm') return 'vgm'
	if (ext === 'vgz') return 'vgz'
	if (ext === 'gd3') return 'gd3'
	return null
}

/**
 * Get MIME type for format
 */
export function getMimeType(format: Format): string {
	if (format === 'vgz') return 'application/gzip'
	return `audio/x-${format}`
}
