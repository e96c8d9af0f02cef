/**
 * Structured errors for VGM parsing and serialization
 *
 * Every failure carries a discriminated `detail` record with the offset,
 * field, limit or observed value that caused it, plus a stable numeric code.
 */

/**
 * Error detail, discriminated by `kind`
 */
export type VgmErrorDetail =
	// File access
	| { kind: 'fileNotFound'; path: string }
	| { kind: 'fileReadError'; path: string; reason: string }
	| { kind: 'permissionDenied'; path: string }
	| { kind: 'fileTooSmall'; path: string; size: number; minSize: number }
	// Format framing
	| { kind: 'invalidMagicBytes'; expected: string; found: string; offset: number }
	| { kind: 'corruptedHeader'; reason: string; offset: number }
	| { kind: 'invalidOffset'; field: string; offset: number; fileSize: number }
	| { kind: 'truncatedFile'; expected: number; actual: number }
	// Raw data
	| { kind: 'invalidUtf16Encoding'; field: string; reason: string }
	| { kind: 'invalidBcdData'; field: string; data: readonly number[] }
	| { kind: 'bufferUnderflow'; offset: number; needed: number; available: number }
	| { kind: 'invalidDataLength'; field: string; expected: number; actual: number }
	| { kind: 'invalidDataFormat'; field: string; reason: string }
	// Command stream
	| { kind: 'unknownCommand'; opcode: number; position: number }
	| { kind: 'incompleteCommand'; opcode: number; position: number; expectedBytes: number; availableBytes: number }
	| { kind: 'invalidCommandParameters'; opcode: number; position: number; reason: string }
	| { kind: 'parseStackOverflow'; position: number; maxDepth: number }
	// Versions
	| { kind: 'unsupportedVgmVersion'; version: number; supportedRange: string }
	| { kind: 'unsupportedGd3Version'; version: number; supportedVersions: readonly number[] }
	| { kind: 'featureNotSupported'; feature: string; version: number; minVersion: number }
	// Resources
	| { kind: 'memoryAllocationFailed'; size: number; purpose: string }
	| { kind: 'integerOverflow'; operation: string; details: string }
	| { kind: 'dataSizeExceedsLimit'; field: string; size: number; limit: number }
	// Logical validation
	| { kind: 'inconsistentData'; context: string; reason: string }
	| { kind: 'validationFailed'; field: string; reason: string }
	// Data blocks
	| { kind: 'invalidDataBlockType'; blockType: number; offset: number }
	| { kind: 'dataBlockSizeMismatch'; headerSize: number; actualSize: number }
	| { kind: 'unsupportedCompression'; algorithm: string }

export type VgmErrorKind = VgmErrorDetail['kind']

/**
 * Error category, derived from the numeric code range
 */
export type VgmErrorCategory =
	| 'io'
	| 'format'
	| 'data'
	| 'command'
	| 'version'
	| 'resource'
	| 'validation'
	| 'dataBlock'

/**
 * Numeric code per error kind
 */
export const VGM_ERROR_CODES = {
	fileNotFound: 1001,
	fileReadError: 1002,
	permissionDenied: 1003,
	fileTooSmall: 1004,
	invalidMagicBytes: 2001,
	corruptedHeader: 2002,
	invalidOffset: 2003,
	truncatedFile: 2004,
	invalidUtf16Encoding: 3001,
	invalidBcdData: 3002,
	bufferUnderflow: 3003,
	invalidDataLength: 3004,
	invalidDataFormat: 3005,
	unknownCommand: 4001,
	incompleteCommand: 4002,
	invalidCommandParameters: 4003,
	parseStackOverflow: 4004,
	unsupportedVgmVersion: 5001,
	unsupportedGd3Version: 5002,
	featureNotSupported: 5003,
	memoryAllocationFailed: 6001,
	integerOverflow: 6002,
	dataSizeExceedsLimit: 6003,
	inconsistentData: 7001,
	validationFailed: 7002,
	invalidDataBlockType: 8001,
	dataBlockSizeMismatch: 8002,
	unsupportedCompression: 8003,
} as const satisfies Record<VgmErrorKind, number>

const CATEGORY_BY_THOUSAND: Record<number, VgmErrorCategory> = {
	1: 'io',
	2: 'format',
	3: 'data',
	4: 'command',
	5: 'version',
	6: 'resource',
	7: 'validation',
	8: 'dataBlock',
}

const RECOVERABLE_KINDS: ReadonlySet<VgmErrorKind> = new Set<VgmErrorKind>([
	'unknownCommand',
	'invalidCommandParameters',
	'unsupportedGd3Version',
	'featureNotSupported',
	'inconsistentData',
	'validationFailed',
	'invalidDataBlockType',
	'dataBlockSizeMismatch',
	'unsupportedCompression',
])

/**
 * Format a byte as 0xNN
 */
export function hex8(value: number): string {
	return `0x${value.toString(16).toUpperCase().padStart(2, '0')}`
}

function describe(detail: VgmErrorDetail): string {
	switch (detail.kind) {
		case 'fileNotFound':
			return `File not found: ${detail.path}`
		case 'fileReadError':
			return `Failed to read file ${detail.path}: ${detail.reason}`
		case 'permissionDenied':
			return `Permission denied accessing file: ${detail.path}`
		case 'fileTooSmall':
			return `File too small to be valid VGM: ${detail.path} (${detail.size} bytes, minimum ${detail.minSize} required)`
		case 'invalidMagicBytes':
			return `Invalid magic bytes: expected '${detail.expected}', found '${detail.found}' at offset ${detail.offset}`
		case 'corruptedHeader':
			return `Corrupted VGM header: ${detail.reason} at offset ${detail.offset}`
		case 'invalidOffset':
			return `Invalid offset in header: ${detail.field}=${detail.offset}, file size=${detail.fileSize}`
		case 'truncatedFile':
			return `Truncated VGM file: expected ${detail.expected} bytes, file ends at ${detail.actual}`
		case 'invalidUtf16Encoding':
			return `Invalid UTF-16 encoding in ${detail.field}: ${detail.reason}`
		case 'invalidBcdData':
			return `Invalid BCD data for ${detail.field}: [${detail.data.map(hex8).join(', ')}]`
		case 'bufferUnderflow':
			return `Buffer underflow at offset ${detail.offset}: needed ${detail.needed} bytes, only ${detail.available} available`
		case 'invalidDataLength':
			return `Invalid data length for ${detail.field}: expected ${detail.expected}, got ${detail.actual}`
		case 'invalidDataFormat':
			return `Invalid data format for ${detail.field}: ${detail.reason}`
		case 'unknownCommand':
			return `Unknown command opcode ${hex8(detail.opcode)} at position ${detail.position}`
		case 'incompleteCommand':
			return `Incomplete command ${hex8(detail.opcode)} at position ${detail.position}: expected ${detail.expectedBytes} bytes, only ${detail.availableBytes} available`
		case 'invalidCommandParameters':
			return `Invalid parameters for command ${hex8(detail.opcode)} at position ${detail.position}: ${detail.reason}`
		case 'parseStackOverflow':
			return `Parsing depth exceeded at position ${detail.position}: maximum depth ${detail.maxDepth}`
		case 'unsupportedVgmVersion':
			return `Unsupported VGM version ${detail.version}: supported versions are ${detail.supportedRange}`
		case 'unsupportedGd3Version':
			return `Unsupported GD3 version 0x${detail.version.toString(16).toUpperCase()}: supported versions are ${detail.supportedVersions.map((v) => `0x${v.toString(16).toUpperCase()}`).join(', ')}`
		case 'featureNotSupported':
			return `Feature '${detail.feature}' not supported in VGM version ${detail.version}: requires version ${detail.minVersion} or higher`
		case 'memoryAllocationFailed':
			return `Memory allocation failed: attempted to allocate ${detail.size} bytes for ${detail.purpose}`
		case 'integerOverflow':
			return `Integer overflow in ${detail.operation}: ${detail.details}`
		case 'dataSizeExceedsLimit':
			return `Data size exceeds limit for ${detail.field}: ${detail.size} bytes (limit: ${detail.limit})`
		case 'inconsistentData':
			return `Data inconsistency in ${detail.context}: ${detail.reason}`
		case 'validationFailed':
			return `Validation failed for ${detail.field}: ${detail.reason}`
		case 'invalidDataBlockType':
			return `Invalid data block type ${hex8(detail.blockType)} at offset ${detail.offset}`
		case 'dataBlockSizeMismatch':
			return `Data block size mismatch: header claims ${detail.headerSize} bytes, actual block is ${detail.actualSize} bytes`
		case 'unsupportedCompression':
			return `Unsupported compression algorithm in data block: ${detail.algorithm}`
	}
}

/**
 * Error thrown by every VGM primitive
 */
export class VgmError extends Error {
	readonly code: number
	readonly category: VgmErrorCategory

	constructor(public readonly detail: VgmErrorDetail) {
		super(describe(detail))
		this.name = 'VgmError'
		this.code = VGM_ERROR_CODES[detail.kind]
		this.category = CATEGORY_BY_THOUSAND[Math.floor(this.code / 1000)] ?? 'data'
	}

	get kind(): VgmErrorKind {
		return this.detail.kind
	}

	/**
	 * Whether a caller may skip the failing piece and keep going
	 */
	isRecoverable(): boolean {
		return RECOVERABLE_KINDS.has(this.detail.kind)
	}
}

/**
 * Narrow an unknown error to a VgmError of the given kind
 */
export function isVgmError<K extends VgmErrorKind>(
	error: unknown,
	kind?: K
): error is VgmError & { detail: Extract<VgmErrorDetail, { kind: K }> } {
	return error instanceof VgmError && (kind === undefined || error.detail.kind === kind)
}
