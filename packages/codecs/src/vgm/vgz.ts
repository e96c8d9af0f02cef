/**
 * VGZ transport: a gzip member whose payload is a VGM file
 */

import { MAGIC_BYTES, VgmError, createLogger, matchMagic } from '@vgmkit/core'
import { type GzipOptions, gunzip, gzip, isGzip } from '../gzip'

const log = createLogger('vgz')

/** Decompressed VGM larger than this is refused */
export const DEFAULT_MAX_VGZ_OUTPUT = 64 * 1024 * 1024

export interface UnwrapOptions {
	maxOutputSize?: number
}

export function isVgm(data: Uint8Array): boolean {
	return matchMagic(data, MAGIC_BYTES.vgm)
}

/**
 * A gzip stream (the payload is only checked by `unwrapVgz`)
 */
export function isVgz(data: Uint8Array): boolean {
	return !isVgm(data) && isGzip(data)
}

/**
 * Plain VGM passes through; gzip is inflated and must hold VGM
 */
export function unwrapVgz(data: Uint8Array, options: UnwrapOptions = {}): Uint8Array {
	if (isVgm(data)) return data

	if (isGzip(data)) {
		const inflated = gunzip(data, { maxOutputSize: options.maxOutputSize ?? DEFAULT_MAX_VGZ_OUTPUT })
		log.debug(`inflated ${data.length} -> ${inflated.length} bytes`)
		if (isVgm(inflated)) return inflated
	}

	throw new VgmError({ kind: 'invalidDataFormat', field: 'file', reason: 'File is neither a valid VGM nor VGZ' })
}

/**
 * Compress VGM bytes into a VGZ stream
 */
export function wrapVgz(data: Uint8Array, options: GzipOptions = {}): Uint8Array {
	return gzip(data, { level: 9, ...options })
}
