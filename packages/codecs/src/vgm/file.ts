/**
 * Filesystem entry points
 */

import { readFileSync } from 'node:fs'
import { VgmError } from '@vgmkit/core'
import { isGzip } from '../gzip'
import { decodeVgm } from './decoder'
import { HEADER_PREFIX_SIZE } from './header'
import type { VgmDecodeOptions, VgmFile } from './types'
import { unwrapVgz } from './vgz'

function errorCode(error: unknown): string | undefined {
	if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
		return error.code
	}
	return undefined
}

/**
 * Read a file, mapping fs failures to VgmError
 */
export function readBytes(path: string): Uint8Array {
	try {
		return new Uint8Array(readFileSync(path))
	} catch (error) {
		const code = errorCode(error)
		if (code === 'ENOENT') throw new VgmError({ kind: 'fileNotFound', path })
		if (code === 'EACCES' || code === 'EPERM') throw new VgmError({ kind: 'permissionDenied', path })
		throw new VgmError({ kind: 'fileReadError', path, reason: error instanceof Error ? error.message : String(error) })
	}
}

export interface LoadedVgm {
	/** Bytes as stored on disk */
	raw: Uint8Array
	/** Uncompressed VGM bytes */
	data: Uint8Array
	compressed: boolean
	file: VgmFile
}

/**
 * Read a .vgm or .vgz file, keeping the raw and uncompressed bytes
 */
export function loadVgmFile(path: string, options: VgmDecodeOptions = {}): LoadedVgm {
	const raw = readBytes(path)
	if (raw.length < HEADER_PREFIX_SIZE && !isGzip(raw)) {
		throw new VgmError({ kind: 'fileTooSmall', path, size: raw.length, minSize: HEADER_PREFIX_SIZE })
	}
	const data = unwrapVgz(raw)
	if (data.length < HEADER_PREFIX_SIZE) {
		throw new VgmError({ kind: 'fileTooSmall', path, size: data.length, minSize: HEADER_PREFIX_SIZE })
	}
	return { raw, data, compressed: data !== raw, file: decodeVgm(data, options) }
}

/**
 * Read and decode a .vgm or .vgz file
 */
export function readVgmFile(path: string, options: VgmDecodeOptions = {}): VgmFile {
	return loadVgmFile(path, options).file
}
