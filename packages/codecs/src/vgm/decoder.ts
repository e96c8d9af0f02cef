/**
 * VGM file decoder: header, command stream, then the optional GD3 tag
 */

import { VgmError, createLogger } from '@vgmkit/core'
import { decodeCommands } from './commands'
import { decodeGd3, isGd3 } from './gd3'
import { GD3_OFFSET_BASE, decodeHeader } from './header'
import { resolveSession } from './session'
import type { Gd3Metadata, VgmCommand, VgmDecodeOptions, VgmFile, VgmHeader } from './types'

const log = createLogger('vgm')

/**
 * Absolute GD3 position from the header, or null when the offset is 0
 */
export function gd3PositionOf(header: Pick<VgmHeader, 'gd3Offset'>): number | null {
	return header.gd3Offset === 0 ? null : header.gd3Offset + GD3_OFFSET_BASE
}

/**
 * Decode an uncompressed VGM file
 */
export function decodeVgm(data: Uint8Array, options: VgmDecodeOptions = {}): VgmFile {
	const session = resolveSession(options)
	const { header, dataStart } = decodeHeader(data, session)

	const gd3Position = gd3PositionOf(header)
	if (gd3Position !== null && gd3Position > data.length) {
		throw new VgmError({ kind: 'invalidOffset', field: 'gd3Offset', offset: header.gd3Offset, fileSize: data.length })
	}

	// A GD3 tag after the data start bounds the command stream
	const commandEnd = gd3Position !== null && gd3Position >= dataStart ? gd3Position : data.length
	const { value: commands, nextOffset } = decodeCommands(data.subarray(0, commandEnd), dataStart, session)

	let metadata: Gd3Metadata | null = null
	if (gd3Position !== null) {
		metadata = decodeGd3(data, gd3Position, session).value
	} else if (commands.at(-1)?.type === 'endOfSoundData' && isGd3(data, nextOffset)) {
		metadata = decodeGd3(data, nextOffset, session).value
	}

	log.debug(
		`decoded ${commands.length} commands, ${session.tracker.dataBlockCount} data blocks, metadata ${metadata ? 'present' : 'absent'}`
	)
	return { header, commands, metadata }
}

export function hasDataBlock(file: Pick<VgmFile, 'commands'>): boolean {
	return file.commands.some((command: VgmCommand) => command.type === 'dataBlock')
}

export function hasPcmWrite(file: Pick<VgmFile, 'commands'>): boolean {
	return file.commands.some((command: VgmCommand) => command.type === 'pcmRamWrite')
}
