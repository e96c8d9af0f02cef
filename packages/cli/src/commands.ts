/**
 * vgmkit commands
 * `run` parses argv, executes one command and returns the exit code
 */

import { writeFileSync } from 'node:fs'
import {
	type LogLevel,
	ParserConfig,
	type ParserPreset,
	VgmError,
	firstDifference,
	formatFromPath,
	formatVersion,
	getLogLevel,
	setLogLevel,
} from '@vgmkit/core'
import {
	SAMPLE_RATE,
	type LoadedVgm,
	type VgmFile,
	collectValidationIssues,
	commandStatistics,
	createValidationConfig,
	encodeVgm,
	loadVgmFile,
	usedChips,
	wrapVgz,
} from '@vgmkit/codecs'

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type CommandName = 'info' | 'validate' | 'stats' | 'roundtrip' | 'convert'

export interface CliOptions {
	preset?: ParserPreset
	strict?: boolean
	verbose?: boolean
	quiet?: boolean
	help?: boolean
	version?: boolean
}

/**
 * Where command output goes; defaults to the console
 */
export interface CliOutput {
	log(message: string): void
	error(message: string): void
}

interface ParsedArgs {
	inputs: string[]
	options: CliOptions
	/** First argument that could not be parsed */
	error?: string
}

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

export const VERSION = '0.1.0'

const COMMANDS: readonly CommandName[] = ['info', 'validate', 'stats', 'roundtrip', 'convert']

const PRESET_NAMES: Record<string, ParserPreset> = {
	default: 'default',
	security: 'securityFocused',
	securityFocused: 'securityFocused',
	permissive: 'permissive',
}

export const HELP = `
vgmkit - VGM / VGZ toolkit

USAGE:
  vgmkit info <file>                  Show header, chips and GD3 tag
  vgmkit validate <file>              Check the file for consistency
  vgmkit stats <file>                 Command histogram
  vgmkit roundtrip <file>             Decode, re-encode and compare bytes
  vgmkit convert <in> <out>           Rewrite .vgm <-> .vgz (by output extension)

OPTIONS:
  --preset <name>       Parser limits: default, security, permissive
  --strict              Treat validation warnings as errors
  -v, --verbose         Debug logging
  --quiet               Only report errors
  --help                Show this help
  --version             Show version

EXAMPLES:
  vgmkit info song.vgz
  vgmkit validate --strict song.vgm
  vgmkit convert song.vgm song.vgz
`

const consoleOutput: CliOutput = {
	log: (message) => console.log(message),
	error: (message) => console.error(message),
}

// ─────────────────────────────────────────────────────────────────────────────
// Argument Parser
// ─────────────────────────────────────────────────────────────────────────────

export function parseArgs(args: string[]): ParsedArgs {
	const inputs: string[] = []
	const options: CliOptions = {}

	let i = 0
	while (i < args.length) {
		const arg = args[i]!

		if (arg === '--help' || arg === '-?') {
			options.help = true
		} else if (arg === '--version' || arg === '-V') {
			options.version = true
		} else if (arg === '--verbose' || arg === '-v') {
			options.verbose = true
		} else if (arg === '--quiet') {
			options.quiet = true
		} else if (arg === '--strict') {
			options.strict = true
		} else if (arg === '--preset' && args[i + 1]) {
			const name = args[++i]!
			const preset = PRESET_NAMES[name]
			if (!preset) return { inputs, options, error: `Unknown preset: ${name}` }
			options.preset = preset
		} else if (!arg.startsWith('-')) {
			inputs.push(arg)
		} else {
			return { inputs, options, error: `Unknown option: ${arg}` }
		}

		i++
	}

	return { inputs, options }
}

function isCommandName(value: string | undefined): value is CommandName {
	return COMMANDS.some((name) => name === value)
}

// ─────────────────────────────────────────────────────────────────────────────
// Formatting
// ─────────────────────────────────────────────────────────────────────────────

export function formatBytes(bytes: number): string {
	if (bytes < 1024) return `${bytes} B`
	if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
	return `${(bytes / 1024 / 1024).toFixed(1)} MB`
}

/**
 * Sample count as m:ss.cc at 44100 Hz
 */
export function formatDuration(samples: number): string {
	const centis = Math.round((samples * 100) / SAMPLE_RATE)
	const minutes = Math.floor(centis / 6000)
	const rest = centis % 6000
	const seconds = String(Math.floor(rest / 100)).padStart(2, '0')
	const fraction = String(rest % 100).padStart(2, '0')
	return `${minutes}:${seconds}.${fraction}`
}

function metadataLines(file: VgmFile): string[] {
	const { metadata } = file
	if (!metadata) return []
	const fields: [string, string][] = [
		['Title', metadata.english.track],
		['Title (JP)', metadata.japanese.track],
		['Game', metadata.english.game],
		['Game (JP)', metadata.japanese.game],
		['System', metadata.english.system],
		['System (JP)', metadata.japanese.system],
		['Author', metadata.english.author],
		['Author (JP)', metadata.japanese.author],
		['Released', metadata.releaseDate],
		['Ripped by', metadata.creator],
		['Notes', metadata.notes],
	]
	return fields.filter(([, value]) => value !== '').map(([label, value]) => `${label}: ${value}`)
}

// ─────────────────────────────────────────────────────────────────────────────
// Commands
// ─────────────────────────────────────────────────────────────────────────────

interface CommandContext {
	inputs: string[]
	options: CliOptions
	out: CliOutput
	load(path: string): LoadedVgm
}

function showInfo(path: string, ctx: CommandContext): number {
	const { raw, data, compressed, file } = ctx.load(path)
	const { header } = file
	const stats = commandStatistics(file.commands)

	ctx.out.log(`File: ${path}`)
	ctx.out.log(`Size: ${formatBytes(raw.length)}${compressed ? ` (${formatBytes(data.length)} uncompressed)` : ''}`)
	ctx.out.log(`Format: ${compressed ? 'vgz' : 'vgm'}`)
	ctx.out.log(`Version: ${formatVersion(header.version)}`)
	ctx.out.log(`Duration: ${formatDuration(header.totalSamples)} (${header.totalSamples} samples)`)
	ctx.out.log(
		header.loopSamples > 0
			? `Loop: ${formatDuration(header.loopSamples)} (${header.loopSamples} samples)`
			: 'Loop: none'
	)
	ctx.out.log(`Commands: ${stats.total}`)
	ctx.out.log(`Data blocks: ${stats.byType.get('dataBlock') ?? 0}`)

	const chips = usedChips(header)
	if (chips.length === 0) {
		ctx.out.log('Chips: none')
	} else {
		ctx.out.log('Chips:')
		for (const { chip, clock, dual } of chips) {
			ctx.out.log(`  ${dual ? `${chip} x2` : chip} @ ${clock} Hz`)
		}
	}

	for (const line of metadataLines(file)) ctx.out.log(line)
	return 0
}

function validate(path: string, ctx: CommandContext): number {
	const { data, file } = ctx.load(path)
	const config = createValidationConfig({ strictMode: ctx.options.strict ?? false })
	const issues = collectValidationIssues(file, data.length, config)

	for (const issue of issues) {
		const line = `${issue.severity}: ${issue.error.message}`
		if (issue.severity === 'error') ctx.out.error(line)
		else if (!ctx.options.quiet) ctx.out.log(line)
	}

	const errors = issues.filter((issue) => issue.severity === 'error').length
	if (errors > 0) {
		ctx.out.error(`${path}: ${errors} error(s)`)
		return 1
	}
	if (!ctx.options.quiet) ctx.out.log(`${path}: OK`)
	return 0
}

function showStats(path: string, ctx: CommandContext): number {
	const { file } = ctx.load(path)
	const stats = commandStatistics(file.commands)
	const rows = [...stats.byType].sort((a, b) => b[1] - a[1])

	for (const [type, count] of rows) {
		ctx.out.log(`${String(count).padStart(8)}  ${type}`)
	}
	ctx.out.log(`Total: ${stats.total}`)
	ctx.out.log(`Wait samples: ${stats.waitSamples}`)
	ctx.out.log(`Data block bytes: ${stats.dataBlockBytes}`)
	return 0
}

function roundtrip(path: string, ctx: CommandContext): number {
	const { data, file } = ctx.load(path)
	const encoded = encodeVgm(file)
	const at = firstDifference(data, encoded)

	if (at >= 0) {
		ctx.out.error(
			`${path}: mismatch at offset 0x${at.toString(16)} (original ${data.length} bytes, encoded ${encoded.length} bytes)`
		)
		return 1
	}
	if (!ctx.options.quiet) ctx.out.log(`${path}: round trip OK (${data.length} bytes)`)
	return 0
}

function convert(input: string, output: string, ctx: CommandContext): number {
	const target = formatFromPath(output)
	if (target !== 'vgm' && target !== 'vgz') {
		ctx.out.error(`Cannot determine output format from ${output} (expected .vgm or .vgz)`)
		return 1
	}

	const { data } = ctx.load(input)
	const bytes = target === 'vgz' ? wrapVgz(data) : data
	writeFileSync(output, bytes)

	if (!ctx.options.quiet) ctx.out.log(`${input} → ${output} (${formatBytes(bytes.length)})`)
	return 0
}

function execute(command: CommandName, ctx: CommandContext): number {
	const [first, second] = ctx.inputs
	if (!first || (command === 'convert' && !second)) {
		ctx.out.error(command === 'convert' ? 'Usage: vgmkit convert <in> <out>' : `Usage: vgmkit ${command} <file>`)
		return 1
	}

	switch (command) {
		case 'info':
			return showInfo(first, ctx)
		case 'validate':
			return validate(first, ctx)
		case 'stats':
			return showStats(first, ctx)
		case 'roundtrip':
			return roundtrip(first, ctx)
		case 'convert':
			return convert(first, second ?? '', ctx)
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Entry
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Run one CLI invocation. VgmErrors are reported and give exit code 1; anything else propagates.
 */
export function run(args: string[], out: CliOutput = consoleOutput): number {
	const { inputs, options, error } = parseArgs(args)
	if (error) {
		out.error(error)
		return 1
	}

	if (options.help) {
		out.log(HELP)
		return 0
	}
	if (options.version) {
		out.log(`vgmkit ${VERSION}`)
		return 0
	}

	const [command, ...rest] = inputs
	if (!isCommandName(command)) {
		if (command === undefined) {
			out.log(HELP)
		} else {
			out.error(`Unknown command: ${command}`)
		}
		return 1
	}

	const previousLevel: LogLevel = getLogLevel()
	if (options.verbose) setLogLevel('debug')
	else if (options.quiet) setLogLevel('error')

	const config = ParserConfig.fromPreset(options.preset ?? 'default')
	const ctx: CommandContext = {
		inputs: rest,
		options,
		out,
		load: (path) => loadVgmFile(path, { config }),
	}

	try {
		return execute(command, ctx)
	} catch (err) {
		if (err instanceof VgmError) {
			out.error(`Error: ${err.message}`)
			return 1
		}
		throw err
	} finally {
		setLogLevel(previousLevel)
	}
}
