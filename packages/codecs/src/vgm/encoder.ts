/**
 * VGM file encoder
 */

import { concatBytes } from '@vgmkit/core'
import { encodeCommands } from './commands'
import { encodeGd3 } from './gd3'
import { GD3_OFFSET_BASE, dataStartOf, encodeHeader } from './header'
import type { VgmEncodeOptions, VgmFile } from './types'
import { wrapVgz } from './vgz'

/**
 * Serialize a file. `gd3Offset` and `endOfFileOffset` are recomputed from
 * the encoded layout; every other header field is written as given.
 */
export function encodeVgm(file: VgmFile, options: VgmEncodeOptions = {}): Uint8Array {
	const commandBytes = encodeCommands(file.commands)
	const gd3Bytes = file.metadata ? encodeGd3(file.metadata) : new Uint8Array(0)

	const dataStart = dataStartOf(file.header)
	const gd3Start = dataStart + commandBytes.length
	const total = gd3Start + gd3Bytes.length

	const headerBytes = encodeHeader({
		...file.header,
		gd3Offset: file.metadata ? gd3Start - GD3_OFFSET_BASE : 0,
		endOfFileOffset: total - 4,
	})

	const out = concatBytes([headerBytes, commandBytes, gd3Bytes])
	return options.compress ? wrapVgz(out) : out
}
