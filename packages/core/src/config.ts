/**
 * Parser resource limits and per-session tracking
 *
 * A ParserConfig is an immutable set of ceilings. A ResourceTracker counts what
 * one parse session has consumed; every `track*` call checks the ceiling first
 * and only increments when the check passes.
 */

import { VgmError } from './errors'

const KIB = 1024
const MIB = 1024 * 1024

/**
 * Bytes assumed per decoded command when estimating command-list memory
 */
export const ESTIMATED_BYTES_PER_COMMAND = 100

/**
 * Named configuration preset
 */
export type ParserPreset = 'default' | 'securityFocused' | 'permissive'

/**
 * Resource ceilings
 */
export interface ParserLimits {
	/** Maximum commands decoded per file */
	readonly maxCommands: number
	/** Maximum declared size of a single data block or PCM RAM write */
	readonly maxDataBlockSize: number
	/** Maximum cumulative data block bytes per file */
	readonly maxTotalDataBlockMemory: number
	/** Maximum GD3 metadata size */
	readonly maxMetadataSize: number
	readonly maxChipClockEntries: number
	readonly maxChipVolumeEntries: number
	/** Enforce the command-memory estimate */
	readonly strictResourceLimits: boolean
	readonly maxCommandMemory: number
	readonly maxParsingDepth: number
}

export const PARSER_PRESETS: Record<ParserPreset, ParserLimits> = {
	default: {
		maxCommands: 500_000,
		maxDataBlockSize: 4 * MIB,
		maxTotalDataBlockMemory: 32 * MIB,
		maxMetadataSize: 256 * KIB,
		maxChipClockEntries: 32,
		maxChipVolumeEntries: 32,
		strictResourceLimits: false,
		maxCommandMemory: 64 * MIB,
		maxParsingDepth: 16,
	},
	securityFocused: {
		maxCommands: 100_000,
		maxDataBlockSize: 1 * MIB,
		maxTotalDataBlockMemory: 8 * MIB,
		maxMetadataSize: 64 * KIB,
		maxChipClockEntries: 16,
		maxChipVolumeEntries: 16,
		strictResourceLimits: true,
		maxCommandMemory: 16 * MIB,
		maxParsingDepth: 8,
	},
	permissive: {
		maxCommands: 2_000_000,
		maxDataBlockSize: 16 * MIB,
		maxTotalDataBlockMemory: 128 * MIB,
		maxMetadataSize: 1 * MIB,
		maxChipClockEntries: 64,
		maxChipVolumeEntries: 64,
		strictResourceLimits: false,
		maxCommandMemory: 256 * MIB,
		maxParsingDepth: 32,
	},
}

function exceeds(field: string, size: number, limit: number): VgmError {
	return new VgmError({ kind: 'dataSizeExceedsLimit', field, size, limit })
}

/**
 * Immutable parser configuration
 */
export class ParserConfig implements ParserLimits {
	readonly maxCommands: number
	readonly maxDataBlockSize: number
	readonly maxTotalDataBlockMemory: number
	readonly maxMetadataSize: number
	readonly maxChipClockEntries: number
	readonly maxChipVolumeEntries: number
	readonly strictResourceLimits: boolean
	readonly maxCommandMemory: number
	readonly maxParsingDepth: number

	constructor(overrides: Partial<ParserLimits> = {}) {
		const limits = { ...PARSER_PRESETS.default, ...overrides }
		this.maxCommands = limits.maxCommands
		this.maxDataBlockSize = limits.maxDataBlockSize
		this.maxTotalDataBlockMemory = limits.maxTotalDataBlockMemory
		this.maxMetadataSize = limits.maxMetadataSize
		this.maxChipClockEntries = limits.maxChipClockEntries
		this.maxChipVolumeEntries = limits.maxChipVolumeEntries
		this.strictResourceLimits = limits.strictResourceLimits
		this.maxCommandMemory = limits.maxCommandMemory
		this.maxParsingDepth = limits.maxParsingDepth
		Object.freeze(this)
	}

	static default(): ParserConfig {
		return new ParserConfig()
	}

	static securityFocused(): ParserConfig {
		return new ParserConfig(PARSER_PRESETS.securityFocused)
	}

	static permissive(): ParserConfig {
		return new ParserConfig(PARSER_PRESETS.permissive)
	}

	static fromPreset(preset: ParserPreset, overrides: Partial<ParserLimits> = {}): ParserConfig {
		return new ParserConfig({ ...PARSER_PRESETS[preset], ...overrides })
	}

	/**
	 * Copy with some limits replaced
	 */
	with(overrides: Partial<ParserLimits>): ParserConfig {
		return new ParserConfig({ ...this.toLimits(), ...overrides })
	}

	toLimits(): ParserLimits {
		return {
			maxCommands: this.maxCommands,
			maxDataBlockSize: this.maxDataBlockSize,
			maxTotalDataBlockMemory: this.maxTotalDataBlockMemory,
			maxMetadataSize: this.maxMetadataSize,
			maxChipClockEntries: this.maxChipClockEntries,
			maxChipVolumeEntries: this.maxChipVolumeEntries,
			strictResourceLimits: this.strictResourceLimits,
			maxCommandMemory: this.maxCommandMemory,
			maxParsingDepth: this.maxParsingDepth,
		}
	}

	checkCommandCount(count: number): void {
		if (count > this.maxCommands) {
			throw exceeds('command_count', count, this.maxCommands)
		}
	}

	/**
	 * Only enforced under strict limits
	 */
	checkCommandMemory(count: number): void {
		if (!this.strictResourceLimits) return
		const estimated = estimateCommandMemory(count)
		if (estimated > this.maxCommandMemory) {
			throw exceeds('command_memory', estimated, this.maxCommandMemory)
		}
	}

	checkDataBlockSize(size: number): void {
		if (size > this.maxDataBlockSize) {
			throw exceeds('data_block_size', size, this.maxDataBlockSize)
		}
	}

	checkMetadataSize(size: number): void {
		if (size > this.maxMetadataSize) {
			throw exceeds('metadata_size', size, this.maxMetadataSize)
		}
	}

	checkChipEntries(clockEntries: number, volumeEntries: number): void {
		if (clockEntries > this.maxChipClockEntries) {
			throw exceeds('chip_clock_entries', clockEntries, this.maxChipClockEntries)
		}
		if (volumeEntries > this.maxChipVolumeEntries) {
			throw exceeds('chip_volume_entries', volumeEntries, this.maxChipVolumeEntries)
		}
	}
}

/**
 * Rough memory footprint of a decoded command list
 */
export function estimateCommandMemory(count: number): number {
	return count * ESTIMATED_BYTES_PER_COMMAND
}

/**
 * Snapshot of tracker counters
 */
export interface ResourceUsage {
	readonly commandCount: number
	readonly dataBlockMemory: number
	readonly dataBlockCount: number
	readonly parsingDepth: number
}

/**
 * Mutable per-session counters
 */
export class ResourceTracker {
	private commands = 0
	private blockMemory = 0
	private blocks = 0
	private depth = 0

	constructor(private readonly config: ParserConfig = ParserConfig.default()) {}

	get limits(): ParserConfig {
		return this.config
	}

	get commandCount(): number {
		return this.commands
	}

	get dataBlockMemory(): number {
		return this.blockMemory
	}

	get dataBlockCount(): number {
		return this.blocks
	}

	get parsingDepth(): number {
		return this.depth
	}

	/**
	 * Account for one more command, before it is decoded
	 */
	trackCommand(): void {
		const next = this.commands + 1
		this.config.checkCommandCount(next)
		this.config.checkCommandMemory(next)
		this.commands = next
	}

	/**
	 * Account for a data block of the declared size, before its payload is allocated
	 */
	trackDataBlock(size: number): void {
		this.config.checkDataBlockSize(size)
		const total = this.blockMemory + size
		if (total > this.config.maxTotalDataBlockMemory) {
			throw exceeds('total_data_block_memory', total, this.config.maxTotalDataBlockMemory)
		}
		this.blockMemory = total
		this.blocks++
	}

	enterParsingContext(position = 0): void {
		if (this.depth + 1 > this.config.maxParsingDepth) {
			throw new VgmError({ kind: 'parseStackOverflow', position, maxDepth: this.config.maxParsingDepth })
		}
		this.depth++
	}

	exitParsingContext(): void {
		if (this.depth > 0) this.depth--
	}

	/**
	 * Run `fn` one parsing level deeper
	 */
	withContext<T>(position: number, fn: () => T): T {
		this.enterParsingContext(position)
		try {
			return fn()
		} finally {
			this.exitParsingContext()
		}
	}

	usage(): ResourceUsage {
		return {
			commandCount: this.commands,
			dataBlockMemory: this.blockMemory,
			dataBlockCount: this.blocks,
			parsingDepth: this.depth,
		}
	}

	usageSummary(): string {
		const mb = (this.blockMemory / MIB).toFixed(1)
		return `Commands: ${this.commands}, DataBlocks: ${this.blocks} (${mb}MB), Depth: ${this.depth}`
	}

	reset(): void {
		this.commands = 0
		this.blockMemory = 0
		this.blocks = 0
		this.depth = 0
	}
}
