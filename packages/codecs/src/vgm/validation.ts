/**
 * Semantic checks on a decoded file, beyond what the decoder enforces
 *
 * Every check yields at most one issue. `validateVgmFile` throws the first
 * error; warnings are logged, or promoted to errors under `strictMode`.
 */

import { VgmError, createLogger, formatVersion } from '@vgmkit/core'
import { CLOCK_MASK, chipsInStream } from './chips'
import { dataBlockSize } from './data-block'
import { DATA_OFFSET_BASE, EXTRA_HEADER_OFFSET_BASE, GD3_OFFSET_BASE, LOOP_OFFSET_BASE } from './header'
import type { VgmFile, VgmHeader, VgmHeaderField } from './types'

const log = createLogger('validate')

export interface ValidationConfig {
	/** Decimal version, 100 = 1.00 */
	minVersion: number
	maxVersion: number
	maxFileSize: number
	maxCommands: number
	maxDataBlockSize: number
	/** Treat warnings as errors */
	strictMode: boolean
}

export const DEFAULT_VALIDATION_CONFIG: Readonly<ValidationConfig> = Object.freeze({
	minVersion: 100,
	maxVersion: 171,
	maxFileSize: 64 * 1024 * 1024,
	maxCommands: 1_000_000,
	maxDataBlockSize: 16 * 1024 * 1024,
	strictMode: false,
})

export function createValidationConfig(overrides: Partial<ValidationConfig> = {}): ValidationConfig {
	return { ...DEFAULT_VALIDATION_CONFIG, ...overrides }
}

export const SAMPLE_RATE = 44100
export const MAX_DURATION_SECONDS = 3600
export const MAX_VOLUME_MODIFIER = 64
/** Recording rate in Hz, usually 50 or 60 */
export const MAX_RATE = 1000
export const MAX_METADATA_STRING_LENGTH = 1024

interface ClockRange {
	chip: string
	field: VgmHeaderField
	min: number
	max: number
}

const CLOCK_RANGES: readonly ClockRange[] = [
	{ chip: 'SN76489', field: 'sn76489Clock', min: 1_000_000, max: 8_000_000 },
	{ chip: 'YM2612', field: 'ym2612Clock', min: 6_000_000, max: 8_000_000 },
	{ chip: 'YM2151', field: 'ym2151Clock', min: 3_000_000, max: 4_000_000 },
]

/** Chips whose writes require a header clock */
const CLOCK_REQUIRED = new Set([
	'SN76489',
	'YM2413',
	'YM2612',
	'YM2151',
	'YM2203',
	'YM2608',
	'YM2610',
	'YM3812',
	'YM3526',
	'Y8950',
	'YMF262',
	'AY8910',
])

export type IssueSeverity = 'error' | 'warning'

export interface ValidationIssue {
	severity: IssueSeverity
	error: VgmError
}

interface ValidationContext {
	file: VgmFile
	fileSize: number
	config: ValidationConfig
}

type Check = (context: ValidationContext) => VgmError | null

// ─────────────────────────────────────────────────────────────────────────────
// Header checks
// ─────────────────────────────────────────────────────────────────────────────

function versionError(header: VgmHeader, config: ValidationConfig): VgmError | null {
	const { version } = header
	if (version < config.minVersion) {
		return new VgmError({ kind: 'unsupportedVgmVersion', version, supportedRange: `${formatVersion(config.minVersion)}+` })
	}
	if (version > config.maxVersion) {
		return new VgmError({
			kind: 'unsupportedVgmVersion',
			version,
			supportedRange: `${formatVersion(config.minVersion)}-${formatVersion(config.maxVersion)}`,
		})
	}
	return null
}

function clockError(header: VgmHeader): VgmError | null {
	for (const { chip, field, min, max } of CLOCK_RANGES) {
		const clock = header[field] & CLOCK_MASK
		if (clock > 0 && (clock < min || clock > max)) {
			return new VgmError({
				kind: 'validationFailed',
				field: `${chip} clock`,
				reason: `Clock ${clock} Hz outside valid range ${min}-${max} Hz`,
			})
		}
	}
	return null
}

function volumeError(header: VgmHeader): VgmError | null {
	if (header.volumeModifier > MAX_VOLUME_MODIFIER) {
		return new VgmError({
			kind: 'validationFailed',
			field: 'volume_modifier',
			reason: `Volume modifier ${header.volumeModifier} exceeds maximum ${MAX_VOLUME_MODIFIER}`,
		})
	}
	return null
}

function rateError(header: VgmHeader): VgmError | null {
	const { rate } = header
	if (rate > MAX_RATE) {
		return new VgmError({
			kind: 'validationFailed',
			field: 'rate',
			reason: `Rate ${rate} Hz exceeds maximum ${MAX_RATE} Hz`,
		})
	}
	return null
}

const OFFSET_FIELDS: readonly { field: VgmHeaderField; base: number }[] = [
	{ field: 'gd3Offset', base: GD3_OFFSET_BASE },
	{ field: 'loopOffset', base: LOOP_OFFSET_BASE },
	{ field: 'vgmDataOffset', base: DATA_OFFSET_BASE },
	{ field: 'extraHeaderOffset', base: EXTRA_HEADER_OFFSET_BASE },
]

function offsetError(header: VgmHeader, fileSize: number): VgmError | null {
	for (const { field, base } of OFFSET_FIELDS) {
		const offset = header[field]
		if (offset > 0 && offset + base >= fileSize) {
			return new VgmError({ kind: 'invalidOffset', field, offset, fileSize })
		}
	}
	return null
}

// ─────────────────────────────────────────────────────────────────────────────
// File checks
// ─────────────────────────────────────────────────────────────────────────────

const ERROR_CHECKS: readonly Check[] = [
	({ fileSize, config }) =>
		fileSize > config.maxFileSize
			? new VgmError({ kind: 'dataSizeExceedsLimit', field: 'file_size', size: fileSize, limit: config.maxFileSize })
			: null,
	({ file, config }) => versionError(file.header, config),
	({ file }) => clockError(file.header),
	({ file }) => volumeError(file.header),
	({ file }) => rateError(file.header),
	({ file, fileSize }) => offsetError(file.header, fileSize),
	({ file }) => {
		const seconds = file.header.totalSamples / SAMPLE_RATE
		return seconds > MAX_DURATION_SECONDS
			? new VgmError({
					kind: 'validationFailed',
					field: 'total_samples',
					reason: `Duration ${seconds.toFixed(1)} s exceeds maximum ${MAX_DURATION_SECONDS} s`,
				})
			: null
	},
	({ file }) =>
		file.header.loopOffset > 0 && file.header.loopSamples === 0
			? new VgmError({ kind: 'inconsistentData', context: 'loop', reason: 'loopOffset is set but loopSamples is 0' })
			: null,
	({ file, config }) =>
		file.commands.length > config.maxCommands
			? new VgmError({
					kind: 'dataSizeExceedsLimit',
					field: 'commands',
					size: file.commands.length,
					limit: config.maxCommands,
				})
			: null,
	({ file, config }) => {
		for (const command of file.commands) {
			if (command.type !== 'dataBlock') continue
			const size = dataBlockSize(command.data)
			if (size > config.maxDataBlockSize) {
				return new VgmError({ kind: 'dataSizeExceedsLimit', field: 'data_block_size', size, limit: config.maxDataBlockSize })
			}
		}
		return null
	},
	({ file }) => metadataError(file),
	({ file }) => {
		for (const { chip, clockField } of chipsInStream(file.commands)) {
			if (CLOCK_REQUIRED.has(chip) && (file.header[clockField] & CLOCK_MASK) === 0) {
				return new VgmError({
					kind: 'inconsistentData',
					context: 'chip_usage',
					reason: `${chip} commands found but no clock configured`,
				})
			}
		}
		return null
	},
]

/** Reported as warnings unless strictMode is set */
const WARNING_CHECKS: readonly Check[] = [
	({ file }) =>
		file.commands.at(-1)?.type === 'endOfSoundData'
			? null
			: new VgmError({
					kind: 'inconsistentData',
					context: 'command_stream',
					reason: 'Command stream does not end with endOfSoundData',
				}),
	({ file, fileSize }) => {
		const { endOfFileOffset } = file.header
		if (endOfFileOffset === 0 || endOfFileOffset + 4 === fileSize) return null
		return new VgmError({
			kind: 'inconsistentData',
			context: 'end_of_file_offset',
			reason: `endOfFileOffset points to ${endOfFileOffset + 4}, file size is ${fileSize}`,
		})
	},
]

function metadataError({ metadata }: VgmFile): VgmError | null {
	if (!metadata) return null
	const fields: [string, string][] = [
		['english.track', metadata.english.track],
		['english.game', metadata.english.game],
		['english.system', metadata.english.system],
		['english.author', metadata.english.author],
		['japanese.track', metadata.japanese.track],
		['japanese.game', metadata.japanese.game],
		['japanese.system', metadata.japanese.system],
		['japanese.author', metadata.japanese.author],
		['releaseDate', metadata.releaseDate],
		['creator', metadata.creator],
		['notes', metadata.notes],
	]
	for (const [field, value] of fields) {
		if (value.length > MAX_METADATA_STRING_LENGTH) {
			return new VgmError({
				kind: 'validationFailed',
				field,
				reason: `String length ${value.length} exceeds maximum ${MAX_METADATA_STRING_LENGTH}`,
			})
		}
	}
	return null
}

// ─────────────────────────────────────────────────────────────────────────────
// Entry points
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Run every check and report all findings
 */
export function collectValidationIssues(
	file: VgmFile,
	fileSize: number,
	config: ValidationConfig = DEFAULT_VALIDATION_CONFIG
): ValidationIssue[] {
	const context: ValidationContext = { file, fileSize, config }
	const issues: ValidationIssue[] = []
	const warningSeverity: IssueSeverity = config.strictMode ? 'error' : 'warning'

	for (const check of ERROR_CHECKS) {
		const error = check(context)
		if (error) issues.push({ severity: 'error', error })
	}
	for (const check of WARNING_CHECKS) {
		const error = check(context)
		if (error) issues.push({ severity: warningSeverity, error })
	}
	return issues
}

/**
 * Throw the first error; log warnings
 */
export function validateVgmFile(
	file: VgmFile,
	fileSize: number,
	config: ValidationConfig = DEFAULT_VALIDATION_CONFIG
): void {
	const issues = collectValidationIssues(file, fileSize, config)
	const firstError = issues.find((issue) => issue.severity === 'error')
	if (firstError) throw firstError.error

	for (const issue of issues) log.warn(issue.error.message)
}

/**
 * Header-only checks that need neither the stream nor the file size
 */
export function quickValidateHeader(header: VgmHeader, config: ValidationConfig = DEFAULT_VALIDATION_CONFIG): void {
	const error = versionError(header, config) ?? clockError(header) ?? volumeError(header) ?? rateError(header)
	if (error) throw error
}
