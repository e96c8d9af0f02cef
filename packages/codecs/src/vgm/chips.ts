/**
 * Chip inventory: which chips a header declares and which a stream drives
 */

import { dataBlockSize } from './data-block'
import type { VgmCommand, VgmCommandType, VgmHeader, VgmHeaderField } from './types'

/** Bits 0-29 of a clock field hold the frequency */
export const CLOCK_MASK = 0x3fffffff
/** Bit 30 marks a second instance of the chip */
export const DUAL_CHIP_BIT = 0x40000000

export interface ChipDescriptor {
	chip: string
	clockField: VgmHeaderField
	commands: readonly VgmCommandType[]
}

export const CHIP_TABLE: readonly ChipDescriptor[] = [
	{ chip: 'SN76489', clockField: 'sn76489Clock', commands: ['psgWrite', 'gameGearPsgStereo'] },
	{ chip: 'YM2413', clockField: 'ym2413Clock', commands: ['ym2413Write'] },
	{
		chip: 'YM2612',
		clockField: 'ym2612Clock',
		commands: ['ym2612Port0Write', 'ym2612Port1Write', 'ym2612Port0Address2AWriteWait'],
	},
	{ chip: 'YM2151', clockField: 'ym2151Clock', commands: ['ym2151Write'] },
	{ chip: 'SegaPCM', clockField: 'segaPcmClock', commands: ['segaPcmWrite'] },
	{ chip: 'RF5C68', clockField: 'rf5c68Clock', commands: ['rf5c68Write', 'rf5c68WriteOffset'] },
	{ chip: 'YM2203', clockField: 'ym2203Clock', commands: ['ym2203Write'] },
	{ chip: 'YM2608', clockField: 'ym2608Clock', commands: ['ym2608Port0Write', 'ym2608Port1Write'] },
	{ chip: 'YM2610', clockField: 'ym2610Clock', commands: ['ym2610Port0Write', 'ym2610Port1Write'] },
	{ chip: 'YM3812', clockField: 'ym3812Clock', commands: ['ym3812Write'] },
	{ chip: 'YM3526', clockField: 'ym3526Clock', commands: ['ym3526Write'] },
	{ chip: 'Y8950', clockField: 'y8950Clock', commands: ['y8950Write'] },
	{ chip: 'YMF262', clockField: 'ymf262Clock', commands: ['ymf262Port0Write', 'ymf262Port1Write'] },
	{ chip: 'YMF278B', clockField: 'ymf278bClock', commands: ['ymf278bWrite'] },
	{ chip: 'YMF271', clockField: 'ymf271Clock', commands: ['ymf271Write'] },
	{ chip: 'YMZ280B', clockField: 'ymz280bClock', commands: ['ymz280bWrite'] },
	{ chip: 'RF5C164', clockField: 'rf5c164Clock', commands: ['rf5c164Write', 'rf5c164WriteOffset'] },
	{ chip: 'PWM', clockField: 'pwmClock', commands: ['pwmWrite'] },
	{ chip: 'AY8910', clockField: 'ay8910Clock', commands: ['ay8910Write', 'ay8910StereoMask'] },
	{ chip: 'GameBoy DMG', clockField: 'gbDmgClock', commands: ['gameBoyDmgWrite'] },
	{ chip: 'NES APU', clockField: 'nesApuClock', commands: ['nesApuWrite'] },
	{ chip: 'MultiPCM', clockField: 'multiPcmClock', commands: ['multiPcmWrite', 'multiPcmSetBank'] },
	{ chip: 'uPD7759', clockField: 'upd7759Clock', commands: ['upd7759Write'] },
	{ chip: 'OKIM6258', clockField: 'okim6258Clock', commands: ['okim6258Write'] },
	{ chip: 'OKIM6295', clockField: 'okim6295Clock', commands: ['okim6295Write'] },
	{ chip: 'K051649', clockField: 'k051649Clock', commands: ['scc1Write'] },
	{ chip: 'K054539', clockField: 'k054539Clock', commands: ['k054539Write'] },
	{ chip: 'HuC6280', clockField: 'huc6280Clock', commands: ['huc6280Write'] },
	{ chip: 'C140', clockField: 'c140Clock', commands: ['c140Write'] },
	{ chip: 'K053260', clockField: 'k053260Clock', commands: ['k053260Write'] },
	{ chip: 'Pokey', clockField: 'pokeyClock', commands: ['pokeyWrite'] },
	{ chip: 'QSound', clockField: 'qsoundClock', commands: ['qsoundWrite'] },
	{ chip: 'SCSP', clockField: 'scspClock', commands: ['scspWrite'] },
	{ chip: 'WonderSwan', clockField: 'wonderSwanClock', commands: ['wonderSwanWrite', 'wonderSwanWrite16'] },
	{ chip: 'VSU', clockField: 'vsuClock', commands: ['vsuWrite'] },
	{ chip: 'SAA1099', clockField: 'saa1099Clock', commands: ['saa1099Write'] },
	{ chip: 'ES5503', clockField: 'es5503Clock', commands: ['es5503Write'] },
	{ chip: 'ES5506', clockField: 'es5506Clock', commands: ['es5506Write', 'es5506Write16'] },
	{ chip: 'X1-010', clockField: 'x1010Clock', commands: ['x1010Write'] },
	{ chip: 'C352', clockField: 'c352Clock', commands: ['c352Write'] },
	{ chip: 'GA20', clockField: 'ga20Clock', commands: ['ga20Write'] },
]

const CHIP_BY_COMMAND = new Map<VgmCommandType, ChipDescriptor>(
	CHIP_TABLE.flatMap((descriptor) => descriptor.commands.map((type) => [type, descriptor] as const))
)

export interface UsedChip {
	chip: string
	/** Frequency in Hz with the flag bits removed */
	clock: number
	dual: boolean
}

/**
 * Chips with a nonzero clock, in header order
 */
export function usedChips(header: VgmHeader): UsedChip[] {
	const chips: UsedChip[] = []
	for (const { chip, clockField } of CHIP_TABLE) {
		const raw = header[clockField]
		const clock = raw & CLOCK_MASK
		if (clock !== 0) chips.push({ chip, clock, dual: (raw & DUAL_CHIP_BIT) !== 0 })
	}
	return chips
}

/**
 * Chip driven by a command, if the command addresses one
 */
export function chipForCommand(command: VgmCommand): ChipDescriptor | undefined {
	return CHIP_BY_COMMAND.get(command.type)
}

/**
 * Distinct chips the stream writes to, in first-use order
 */
export function chipsInStream(commands: readonly VgmCommand[]): ChipDescriptor[] {
	const seen = new Set<ChipDescriptor>()
	for (const command of commands) {
		const descriptor = chipForCommand(command)
		if (descriptor) seen.add(descriptor)
	}
	return [...seen]
}

/**
 * Samples a command waits (0 for non-wait commands)
 */
export function waitSamples(command: VgmCommand): number {
	switch (command.type) {
		case 'waitNSamples':
			return command.n
		case 'wait735Samples':
			return 735
		case 'wait882Samples':
			return 882
		case 'waitNSamplesPlus1':
			return command.n + 1
		case 'ym2612Port0Address2AWriteWait':
			return command.n
		default:
			return 0
	}
}

export interface CommandStatistics {
	total: number
	/** Count per command type, in first-seen order */
	byType: Map<VgmCommandType, number>
	waitSamples: number
	/** Sum of declared data block sizes */
	dataBlockBytes: number
}

export function commandStatistics(commands: readonly VgmCommand[]): CommandStatistics {
	const byType = new Map<VgmCommandType, number>()
	let wait = 0
	let dataBlockBytes = 0

	for (const command of commands) {
		byType.set(command.type, (byType.get(command.type) ?? 0) + 1)
		wait += waitSamples(command)
		if (command.type === 'dataBlock') dataBlockBytes += dataBlockSize(command.data)
	}

	return { total: commands.length, byType, waitSamples: wait, dataBlockBytes }
}
