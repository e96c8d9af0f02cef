import { type Codec, formatVersion } from '@vgmkit/core'
import { usedChips } from './chips'
import { decodeVgm } from './decoder'
import { encodeVgm } from './encoder'
import { decodeGd3, encodeGd3, isGd3 } from './gd3'
import { SAMPLE_RATE } from './validation'
import type { Gd3Metadata, VgmDecodeOptions, VgmEncodeOptions, VgmFile, VgmInfo } from './types'
import { isVgm, isVgz, unwrapVgz } from './vgz'

/**
 * VGM / VGZ codec. Decoding accepts either; encoding writes VGZ when `compress` is set.
 */
export class VgmCodec implements Codec<VgmFile, VgmDecodeOptions, VgmEncodeOptions> {
	readonly format = 'vgm' as const

	isFormat(data: Uint8Array): boolean {
		return isVgm(data) || isVgz(data)
	}

	decode(data: Uint8Array, options?: VgmDecodeOptions): VgmFile {
		return decodeVgm(unwrapVgz(data), options)
	}

	encode(file: VgmFile, options?: VgmEncodeOptions): Uint8Array {
		return encodeVgm(file, options)
	}

	/**
	 * Summary for display
	 */
	info(file: VgmFile): VgmInfo {
		const { header, commands, metadata } = file
		return {
			version: formatVersion(header.version),
			totalSamples: header.totalSamples,
			loopSamples: header.loopSamples,
			durationSeconds: header.totalSamples / SAMPLE_RATE,
			loopSeconds: header.loopSamples / SAMPLE_RATE,
			commandCount: commands.length,
			dataBlockCount: commands.filter((command) => command.type === 'dataBlock').length,
			chips: usedChips(header).map(({ chip, dual }) => (dual ? `${chip} x2` : chip)),
			hasMetadata: metadata !== null,
			title: metadata?.english.track ?? '',
			game: metadata?.english.game ?? '',
		}
	}
}

export const vgmCodec = new VgmCodec()

/**
 * Standalone GD3 tag codec
 */
export class Gd3Codec implements Codec<Gd3Metadata, VgmDecodeOptions> {
	readonly format = 'gd3' as const

	isFormat(data: Uint8Array): boolean {
		return isGd3(data)
	}

	decode(data: Uint8Array, options?: VgmDecodeOptions): Gd3Metadata {
		return decodeGd3(data, 0, options).value
	}

	encode(metadata: Gd3Metadata): Uint8Array {
		return encodeGd3(metadata)
	}
}

export const gd3Codec = new Gd3Codec()
