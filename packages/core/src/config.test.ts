import { describe, expect, it } from 'vitest'
import { estimateCommandMemory, ParserConfig, PARSER_PRESETS, ResourceTracker } from './config'
import { VgmError } from './errors'

function catchError(fn: () => void): VgmError {
	try {
		fn()
	} catch (e) {
		if (e instanceof VgmError) return e
		throw e
	}
	throw new Error('expected a VgmError')
}

describe('ParserConfig', () => {
	it('should expose the default preset', () => {
		const config = ParserConfig.default()
		expect(config.maxCommands).toBe(500_000)
		expect(config.maxDataBlockSize).toBe(4 * 1024 * 1024)
		expect(config.maxTotalDataBlockMemory).toBe(32 * 1024 * 1024)
		expect(config.maxMetadataSize).toBe(256 * 1024)
		expect(config.maxChipClockEntries).toBe(32)
		expect(config.strictResourceLimits).toBe(false)
		expect(config.maxParsingDepth).toBe(16)
	})

	it('should expose the security-focused preset', () => {
		const config = ParserConfig.securityFocused()
		expect(config.maxCommands).toBe(100_000)
		expect(config.maxDataBlockSize).toBe(1024 * 1024)
		expect(config.maxMetadataSize).toBe(64 * 1024)
		expect(config.maxChipVolumeEntries).toBe(16)
		expect(config.strictResourceLimits).toBe(true)
		expect(config.maxParsingDepth).toBe(8)
	})

	it('should expose the permissive preset', () => {
		const config = ParserConfig.permissive()
		expect(config.toLimits()).toEqual(PARSER_PRESETS.permissive)
	})

	it('should be immutable and copy with overrides', () => {
		const config = ParserConfig.default()
		const tight = config.with({ maxCommands: 3 })
		expect(tight.maxCommands).toBe(3)
		expect(config.maxCommands).toBe(500_000)
		expect(Object.isFrozen(config)).toBe(true)
		expect(ParserConfig.fromPreset('permissive', { maxParsingDepth: 2 }).maxParsingDepth).toBe(2)
	})

	it('should check sizes against limits', () => {
		const config = new ParserConfig({ maxDataBlockSize: 10, maxMetadataSize: 20 })
		expect(() => config.checkDataBlockSize(10)).not.toThrow()
		const err = catchError(() => config.checkDataBlockSize(11))
		expect(err.detail).toEqual({ kind: 'dataSizeExceedsLimit', field: 'data_block_size', size: 11, limit: 10 })
		expect(() => config.checkMetadataSize(21)).toThrow(VgmError)
	})

	it('should check chip entry counts', () => {
		const config = new ParserConfig({ maxChipClockEntries: 2, maxChipVolumeEntries: 1 })
		expect(() => config.checkChipEntries(2, 1)).not.toThrow()
		expect(catchError(() => config.checkChipEntries(3, 0)).detail).toMatchObject({ field: 'chip_clock_entries' })
		expect(catchError(() => config.checkChipEntries(0, 2)).detail).toMatchObject({ field: 'chip_volume_entries' })
	})

	it('should only enforce command memory when strict', () => {
		const lax = new ParserConfig({ maxCommandMemory: 1000 })
		expect(() => lax.checkCommandMemory(1_000_000)).not.toThrow()
		const strict = new ParserConfig({ maxCommandMemory: 1000, strictResourceLimits: true })
		expect(() => strict.checkCommandMemory(10)).not.toThrow()
		expect(catchError(() => strict.checkCommandMemory(11)).detail).toEqual({
			kind: 'dataSizeExceedsLimit',
			field: 'command_memory',
			size: 1100,
			limit: 1000,
		})
		expect(estimateCommandMemory(7)).toBe(700)
	})
})

describe('ResourceTracker', () => {
	it('should count commands and fail exactly past the ceiling', () => {
		const tracker = new ResourceTracker(new ParserConfig({ maxCommands: 3 }))
		tracker.trackCommand()
		tracker.trackCommand()
		tracker.trackCommand()
		expect(tracker.commandCount).toBe(3)
		const err = catchError(() => tracker.trackCommand())
		expect(err.detail).toEqual({ kind: 'dataSizeExceedsLimit', field: 'command_count', size: 4, limit: 3 })
		expect(tracker.commandCount).toBe(3)
	})

	it('should accumulate data block memory monotonically', () => {
		const tracker = new ResourceTracker(new ParserConfig({ maxDataBlockSize: 100, maxTotalDataBlockMemory: 150 }))
		tracker.trackDataBlock(100)
		tracker.trackDataBlock(50)
		expect(tracker.dataBlockMemory).toBe(150)
		expect(tracker.dataBlockCount).toBe(2)

		const err = catchError(() => tracker.trackDataBlock(1))
		expect(err.detail).toEqual({
			kind: 'dataSizeExceedsLimit',
			field: 'total_data_block_memory',
			size: 151,
			limit: 150,
		})
		expect(tracker.dataBlockMemory).toBe(150)
		expect(tracker.dataBlockCount).toBe(2)
	})

	it('should reject a single oversized block before counting it', () => {
		const tracker = new ResourceTracker(new ParserConfig({ maxDataBlockSize: 8 }))
		expect(catchError(() => tracker.trackDataBlock(9)).detail).toMatchObject({ field: 'data_block_size' })
		expect(tracker.dataBlockCount).toBe(0)
	})

	it('should bound parsing depth', () => {
		const tracker = new ResourceTracker(new ParserConfig({ maxParsingDepth: 2 }))
		tracker.enterParsingContext()
		tracker.enterParsingContext()
		const err = catchError(() => tracker.enterParsingContext(40))
		expect(err.detail).toEqual({ kind: 'parseStackOverflow', position: 40, maxDepth: 2 })
		expect(tracker.parsingDepth).toBe(2)
		tracker.exitParsingContext()
		tracker.exitParsingContext()
		tracker.exitParsingContext()
		expect(tracker.parsingDepth).toBe(0)
	})

	it('should restore depth after withContext, even on throw', () => {
		const tracker = new ResourceTracker()
		expect(tracker.withContext(0, () => tracker.parsingDepth)).toBe(1)
		expect(() =>
			tracker.withContext(0, () => {
				throw new Error('boom')
			})
		).toThrow('boom')
		expect(tracker.parsingDepth).toBe(0)
	})

	it('should summarize and reset usage', () => {
		const tracker = new ResourceTracker()
		tracker.trackCommand()
		tracker.trackCommand()
		tracker.trackDataBlock(1024 * 1024)
		tracker.enterParsingContext()
		expect(tracker.usageSummary()).toBe('Commands: 2, DataBlocks: 1 (1.0MB), Depth: 1')
		expect(tracker.usage()).toEqual({
			commandCount: 2,
			dataBlockMemory: 1024 * 1024,
			dataBlockCount: 1,
			parsingDepth: 1,
		})
		tracker.reset()
		expect(tracker.usageSummary()).toBe('Commands: 0, DataBlocks: 0 (0.0MB), Depth: 0')
	})
})
