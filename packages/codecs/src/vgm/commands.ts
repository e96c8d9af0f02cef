/**
 * VGM command stream codec
 *
 * One opcode byte, then a payload whose layout the opcode fixes. Two dual-chip
 * schemes exist: a parallel opcode for chip 1 (PSG, YM family) and bit 7 of the
 * register byte (AY8910, Game Boy, NES APU, ...).
 */

import { ByteReader, ByteWriter, VgmError, createLogger, hex8 } from '@vgmkit/core'
import type { Decoded, ResourceTracker } from '@vgmkit/core'
import { decodeDataBlock, encodeDataBlock } from './data-block'
import { resolveSession } from './session'
import type {
	ChipIndex,
	OffsetWriteBEType,
	OffsetWriteType,
	PortWriteType,
	Register16WriteType,
	RegisterBitWriteType,
	RegisterWriteType,
	VgmCommand,
	VgmCommandType,
	VgmDecodeOptions,
	YmWriteType,
} from './types'

const log = createLogger('commands')

/**
 * Escape byte that follows 0x67 and 0x68
 */
export const COMPATIBILITY_BYTE = 0x66

/**
 * 0x68 size field value 0 stands for this many bytes
 */
export const PCM_RAM_WRITE_FULL_SIZE = 0x01000000

/**
 * Two-way opcode lookup for one family of commands
 */
class OpcodeMap<T extends VgmCommandType> {
	private readonly byType = new Map<string, number>()
	private readonly byOpcode = new Map<number, T>()

	constructor(entries: readonly (readonly [T, number])[]) {
		for (const [type, opcode] of entries) {
			this.byType.set(type, opcode)
			this.byOpcode.set(opcode, type)
		}
	}

	typeOf(opcode: number): T | undefined {
		return this.byOpcode.get(opcode)
	}

	matches(command: VgmCommand): command is Extract<VgmCommand, { type: T }> {
		return this.byType.has(command.type)
	}

	opcodeOf(command: Extract<VgmCommand, { type: T }>): number {
		const opcode = this.byType.get(command.type)
		if (opcode === undefined) {
			throw new VgmError({ kind: 'invalidDataFormat', field: 'type', reason: `No opcode for ${command.type}` })
		}
		return opcode
	}
}

/** Chip 0 opcodes; chip 1 adds 0x50 */
const YM_WRITES = new OpcodeMap<YmWriteType>([
	['ym2413Write', 0x51],
	['ym2612Port0Write', 0x52],
	['ym2612Port1Write', 0x53],
	['ym2151Write', 0x54],
	['ym2203Write', 0x55],
	['ym2608Port0Write', 0x56],
	['ym2608Port1Write', 0x57],
	['ym2610Port0Write', 0x58],
	['ym2610Port1Write', 0x59],
	['ym3812Write', 0x5a],
	['ym3526Write', 0x5b],
	['y8950Write', 0x5c],
	['ymz280bWrite', 0x5d],
	['ymf262Port0Write', 0x5e],
	['ymf262Port1Write', 0x5f],
])

const YM_SECOND_CHIP_DELTA = 0x50

const REGISTER_BIT_WRITES = new OpcodeMap<RegisterBitWriteType>([
	['ay8910Write', 0xa0],
	['gameBoyDmgWrite', 0xb3],
	['nesApuWrite', 0xb4],
	['multiPcmWrite', 0xb5],
	['upd7759Write', 0xb6],
	['okim6258Write', 0xb7],
	['okim6295Write', 0xb8],
	['huc6280Write', 0xb9],
	['k053260Write', 0xba],
	['pokeyWrite', 0xbb],
	['wonderSwanWrite', 0xbc],
	['saa1099Write', 0xbd],
	['es5506Write', 0xbe],
	['ga20Write', 0xbf],
])

const REGISTER_WRITES = new OpcodeMap<RegisterWriteType>([
	['rf5c68Write', 0xb0],
	['rf5c164Write', 0xb1],
])

const OFFSET_WRITES = new OpcodeMap<OffsetWriteType>([
	['segaPcmWrite', 0xc0],
	['rf5c68WriteOffset', 0xc1],
	['rf5c164WriteOffset', 0xc2],
])

const OFFSET_WRITES_BE = new OpcodeMap<OffsetWriteBEType>([
	['scspWrite', 0xc5],
	['wonderSwanWrite16', 0xc6],
	['vsuWrite', 0xc7],
	['x1010Write', 0xc8],
])

const PORT_WRITES = new OpcodeMap<PortWriteType>([
	['ymf278bWrite', 0xd0],
	['ymf271Write', 0xd1],
	['scc1Write', 0xd2],
])

const REGISTER16_WRITES = new OpcodeMap<Register16WriteType>([
	['k054539Write', 0xd3],
	['c140Write', 0xd4],
	['es5503Write', 0xd5],
])

// ─────────────────────────────────────────────────────────────────────────────
// Decoding
// ─────────────────────────────────────────────────────────────────────────────

function expectCompatibilityByte(reader: ByteReader, opcode: number, position: number): void {
	const found = reader.readU8()
	if (found !== COMPATIBILITY_BYTE) {
		throw new VgmError({
			kind: 'invalidCommandParameters',
			opcode,
			position,
			reason: `Expected compatibility byte 0x66, found ${hex8(found)}`,
		})
	}
}

function bit7ChipIndex(raw: number): ChipIndex {
	return (raw & 0x80) !== 0 ? 1 : 0
}

/**
 * Decode one command whose opcode is at `position`
 */
function readCommand(reader: ByteReader, position: number, tracker: ResourceTracker): VgmCommand {
	tracker.trackCommand()
	const opcode = reader.readU8()

	const ymType =
		opcode >= 0xa1 && opcode <= 0xaf ? YM_WRITES.typeOf(opcode - YM_SECOND_CHIP_DELTA) : YM_WRITES.typeOf(opcode)
	if (ymType) {
		return { type: ymType, register: reader.readU8(), value: reader.readU8(), chipIndex: opcode >= 0xa1 ? 1 : 0 }
	}

	const bitType = REGISTER_BIT_WRITES.typeOf(opcode)
	if (bitType) {
		const raw = reader.readU8()
		return { type: bitType, register: raw & 0x7f, value: reader.readU8(), chipIndex: bit7ChipIndex(raw) }
	}

	const registerType = REGISTER_WRITES.typeOf(opcode)
	if (registerType) {
		return { type: registerType, register: reader.readU8(), value: reader.readU8() }
	}

	const offsetType = OFFSET_WRITES.typeOf(opcode)
	if (offsetType) {
		return { type: offsetType, offset: reader.readU16LE(), value: reader.readU8() }
	}

	const offsetBEType = OFFSET_WRITES_BE.typeOf(opcode)
	if (offsetBEType) {
		return { type: offsetBEType, offset: reader.readU16BE(), value: reader.readU8() }
	}

	const portType = PORT_WRITES.typeOf(opcode)
	if (portType) {
		return { type: portType, port: reader.readU8(), register: reader.readU8(), value: reader.readU8() }
	}

	const register16Type = REGISTER16_WRITES.typeOf(opcode)
	if (register16Type) {
		return { type: register16Type, register: reader.readU16BE(), value: reader.readU8() }
	}

	if (opcode >= 0x70 && opcode <= 0x7f) {
		return { type: 'waitNSamplesPlus1', n: opcode - 0x70 }
	}
	if (opcode >= 0x80 && opcode <= 0x8f) {
		return { type: 'ym2612Port0Address2AWriteWait', n: opcode - 0x80 }
	}

	switch (opcode) {
		case 0x4f:
		case 0x3f:
			return { type: 'gameGearPsgStereo', value: reader.readU8(), chipIndex: opcode === 0x3f ? 1 : 0 }
		case 0x50:
		case 0x30:
			return { type: 'psgWrite', value: reader.readU8(), chipIndex: opcode === 0x30 ? 1 : 0 }
		case 0x31:
			return { type: 'ay8910StereoMask', value: reader.readU8() }
		case 0x61:
			return { type: 'waitNSamples', n: reader.readU16LE() }
		case 0x62:
			return { type: 'wait735Samples' }
		case 0x63:
			return { type: 'wait882Samples' }
		case 0x66:
			return { type: 'endOfSoundData' }

		case 0x67: {
			expectCompatibilityByte(reader, opcode, position)
			const blockType = reader.readU8()
			const dataSize = reader.readU32LE()
			tracker.trackDataBlock(dataSize)
			reader.require(dataSize)
			const block = decodeDataBlock(blockType, dataSize, reader.data, reader.position)
			reader.seek(block.nextOffset)
			return { type: 'dataBlock', blockType, data: block.value }
		}

		case 0x68: {
			expectCompatibilityByte(reader, opcode, position)
			const chipType = reader.readU8()
			const readOffset = reader.readU24LE()
			const writeOffset = reader.readU24LE()
			const size = reader.readU24LE() || PCM_RAM_WRITE_FULL_SIZE
			tracker.trackDataBlock(size)
			const data = reader.readBytes(size)
			return { type: 'pcmRamWrite', chipType, readOffset, writeOffset, size, data }
		}

		case 0x90: {
			const streamId = reader.readU8()
			const rawChip = reader.readU8()
			return {
				type: 'dacStreamSetupControl',
				streamId,
				chipType: rawChip & 0x7f,
				port: reader.readU8(),
				command: reader.readU8(),
				chipIndex: bit7ChipIndex(rawChip),
			}
		}
		case 0x91:
			return {
				type: 'dacStreamSetData',
				streamId: reader.readU8(),
				dataBankId: reader.readU8(),
				stepSize: reader.readU8(),
				stepBase: reader.readU8(),
			}
		case 0x92:
			return { type: 'dacStreamSetFrequency', streamId: reader.readU8(), frequency: reader.readU32LE() }
		case 0x93:
			return {
				type: 'dacStreamStart',
				streamId: reader.readU8(),
				dataStartOffset: reader.readU32LE(),
				lengthMode: reader.readU8(),
				dataLength: reader.readU32LE(),
			}
		case 0x94:
			return { type: 'dacStreamStop', streamId: reader.readU8() }
		case 0x95:
			return {
				type: 'dacStreamStartFast',
				streamId: reader.readU8(),
				blockId: reader.readU16LE(),
				flags: reader.readU8(),
			}

		case 0xb2: {
			const high = reader.readU8()
			const low = reader.readU8()
			return { type: 'pwmWrite', register: high >> 4, value: ((high & 0x0f) << 8) | low }
		}
		case 0xc3:
			return { type: 'multiPcmSetBank', channel: reader.readU8(), offset: reader.readU16LE() }
		case 0xc4: {
			const value = reader.readU16BE()
			return { type: 'qsoundWrite', register: reader.readU8(), value }
		}
		case 0xd6:
			return { type: 'es5506Write16', register: reader.readU8(), value: reader.readU16BE() }
		case 0xe0:
			return { type: 'seekPcm', offset: reader.readU32LE() }
		case 0xe1:
			return { type: 'c352Write', register: reader.readU16BE(), value: reader.readU16BE() }

		default:
			throw new VgmError({ kind: 'unknownCommand', opcode, position })
	}
}

/**
 * Decode exactly one command at `offset`, counted against the session limits
 */
export function decodeCommand(data: Uint8Array, offset: number, options: VgmDecodeOptions = {}): Decoded<VgmCommand> {
	const { tracker } = resolveSession(options)
	const reader = new ByteReader(data, offset)
	const value = readCommand(reader, offset, tracker)
	return { value, nextOffset: reader.position }
}

/**
 * Decode commands until endOfSoundData (kept) or the end of `data`.
 * Every command is counted against the session limits before it is decoded.
 */
export function decodeCommands(
	data: Uint8Array,
	offset = 0,
	options: VgmDecodeOptions = {}
): Decoded<VgmCommand[]> {
	const { tracker } = resolveSession(options)
	const reader = new ByteReader(data, offset)
	const commands: VgmCommand[] = []

	while (!reader.eof()) {
		const command = readCommand(reader, reader.position, tracker)
		commands.push(command)
		if (command.type === 'endOfSoundData') break
	}

	return { value: commands, nextOffset: reader.position }
}

/**
 * Lenient variant: logs the failure and yields no commands
 */
export function parseCommands(data: Uint8Array): VgmCommand[] {
	try {
		return decodeCommands(data).value
	} catch (error) {
		log.warn(`Command parsing failed: ${error instanceof Error ? error.message : String(error)}`)
		return []
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Encoding
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Range-checked field writer for a single command
 */
class CommandWriter {
	private opcode = 0

	constructor(
		private readonly out: ByteWriter,
		private readonly position: number
	) {}

	op(opcode: number): this {
		this.opcode = opcode
		this.out.u8(opcode)
		return this
	}

	u8(field: string, value: number): this {
		this.check(field, value, 0xff)
		this.out.u8(value)
		return this
	}

	u16LE(field: string, value: number): this {
		this.check(field, value, 0xffff)
		this.out.u16LE(value)
		return this
	}

	u16BE(field: string, value: number): this {
		this.check(field, value, 0xffff)
		this.out.u16BE(value)
		return this
	}

	u24LE(field: string, value: number): this {
		this.check(field, value, 0xffffff)
		this.out.u24LE(value)
		return this
	}

	u32LE(field: string, value: number): this {
		this.check(field, value, 0xffffffff)
		this.out.u32LE(value)
		return this
	}

	/**
	 * Opcode that carries a 4-bit argument in its low nibble
	 */
	opNibble(base: number, field: string, value: number): this {
		this.opcode = base
		this.check(field, value, 0x0f)
		this.out.u8(base + value)
		return this
	}

	bytes(data: Uint8Array): this {
		this.out.bytes(data)
		return this
	}

	check(field: string, value: number, max: number): void {
		if (!Number.isInteger(value) || value < 0 || value > max) {
			throw new VgmError({
				kind: 'invalidCommandParameters',
				opcode: this.opcode,
				position: this.position,
				reason: `${field} ${value} out of range 0-${max}`,
			})
		}
	}
}

function chip(index: number): ChipIndex {
	if (index !== 0 && index !== 1) {
		throw new VgmError({ kind: 'invalidDataFormat', field: 'chip_index', reason: `Chip index must be 0 or 1, got ${index}` })
	}
	return index
}

function writeCommand(out: ByteWriter, command: VgmCommand, position: number): void {
	const w = new CommandWriter(out, position)

	if (YM_WRITES.matches(command)) {
		const base = YM_WRITES.opcodeOf(command)
		w.op(chip(command.chipIndex) === 1 ? base + YM_SECOND_CHIP_DELTA : base)
			.u8('register', command.register)
			.u8('value', command.value)
		return
	}

	if (REGISTER_BIT_WRITES.matches(command)) {
		w.op(REGISTER_BIT_WRITES.opcodeOf(command))
		w.check('register', command.register, 0x7f)
		w.u8('register', command.register | (chip(command.chipIndex) === 1 ? 0x80 : 0)).u8('value', command.value)
		return
	}

	if (REGISTER_WRITES.matches(command)) {
		w.op(REGISTER_WRITES.opcodeOf(command)).u8('register', command.register).u8('value', command.value)
		return
	}

	if (OFFSET_WRITES.matches(command)) {
		w.op(OFFSET_WRITES.opcodeOf(command)).u16LE('offset', command.offset).u8('value', command.value)
		return
	}

	if (OFFSET_WRITES_BE.matches(command)) {
		w.op(OFFSET_WRITES_BE.opcodeOf(command)).u16BE('offset', command.offset).u8('value', command.value)
		return
	}

	if (PORT_WRITES.matches(command)) {
		w.op(PORT_WRITES.opcodeOf(command))
			.u8('port', command.port)
			.u8('register', command.register)
			.u8('value', command.value)
		return
	}

	if (REGISTER16_WRITES.matches(command)) {
		w.op(REGISTER16_WRITES.opcodeOf(command)).u16BE('register', command.register).u8('value', command.value)
		return
	}

	switch (command.type) {
		case 'gameGearPsgStereo':
			w.op(chip(command.chipIndex) === 1 ? 0x3f : 0x4f).u8('value', command.value)
			return
		case 'psgWrite':
			w.op(chip(command.chipIndex) === 1 ? 0x30 : 0x50).u8('value', command.value)
			return
		case 'ay8910StereoMask':
			w.op(0x31).u8('value', command.value)
			return
		case 'waitNSamples':
			w.op(0x61).u16LE('n', command.n)
			return
		case 'wait735Samples':
			w.op(0x62)
			return
		case 'wait882Samples':
			w.op(0x63)
			return
		case 'endOfSoundData':
			w.op(0x66)
			return
		case 'dataBlock': {
			w.op(0x67).u8('compatibility', COMPATIBILITY_BYTE).u8('blockType', command.blockType)
			const payload = encodeDataBlock(command.blockType, command.data)
			w.u32LE('dataSize', payload.length).bytes(payload)
			return
		}
		case 'pcmRamWrite':
			throw new VgmError({
				kind: 'featureNotSupported',
				feature: 'PCM RAM write serialization',
				version: 0,
				minVersion: 160,
			})
		case 'waitNSamplesPlus1':
			w.opNibble(0x70, 'n', command.n)
			return
		case 'ym2612Port0Address2AWriteWait':
			w.opNibble(0x80, 'n', command.n)
			return
		case 'dacStreamSetupControl':
			w.op(0x90).u8('streamId', command.streamId)
			w.check('chipType', command.chipType, 0x7f)
			w.u8('chipType', command.chipType | (chip(command.chipIndex) === 1 ? 0x80 : 0))
				.u8('port', command.port)
				.u8('command', command.command)
			return
		case 'dacStreamSetData':
			w.op(0x91)
				.u8('streamId', command.streamId)
				.u8('dataBankId', command.dataBankId)
				.u8('stepSize', command.stepSize)
				.u8('stepBase', command.stepBase)
			return
		case 'dacStreamSetFrequency':
			w.op(0x92).u8('streamId', command.streamId).u32LE('frequency', command.frequency)
			return
		case 'dacStreamStart':
			w.op(0x93)
				.u8('streamId', command.streamId)
				.u32LE('dataStartOffset', command.dataStartOffset)
				.u8('lengthMode', command.lengthMode)
				.u32LE('dataLength', command.dataLength)
			return
		case 'dacStreamStop':
			w.op(0x94).u8('streamId', command.streamId)
			return
		case 'dacStreamStartFast':
			w.op(0x95).u8('streamId', command.streamId).u16LE('blockId', command.blockId).u8('flags', command.flags)
			return
		case 'pwmWrite':
			w.op(0xb2)
			w.check('register', command.register, 0x0f)
			w.check('value', command.value, 0x0fff)
			w.u8('value', (command.register << 4) | (command.value >> 8)).u8('value', command.value & 0xff)
			return
		case 'multiPcmSetBank':
			w.op(0xc3).u8('channel', command.channel).u16LE('offset', command.offset)
			return
		case 'qsoundWrite':
			w.op(0xc4).u16BE('value', command.value).u8('register', command.register)
			return
		case 'es5506Write16':
			w.op(0xd6).u8('register', command.register).u16BE('value', command.value)
			return
		case 'seekPcm':
			w.op(0xe0).u32LE('offset', command.offset)
			return
		case 'c352Write':
			w.op(0xe1).u16BE('register', command.register).u16BE('value', command.value)
			return
	}
}

/**
 * Serialize one command. `position` is only used in error details.
 */
export function encodeCommand(command: VgmCommand, position = 0): Uint8Array {
	const out = new ByteWriter(16)
	writeCommand(out, command, position)
	return out.toUint8Array()
}

/**
 * Serialize a command list back to back
 */
export function encodeCommands(commands: readonly VgmCommand[]): Uint8Array {
	const out = new ByteWriter(commands.length * 3 + 16)
	for (const command of commands) {
		writeCommand(out, command, out.length)
	}
	return out.toUint8Array()
}
