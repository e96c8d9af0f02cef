#!/usr/bin/env tsx
/**
 * vgmkit CLI - inspect, validate and convert VGM / VGZ files
 */

import { run } from './commands'

async function main(): Promise<void> {
	process.exitCode = run(process.argv.slice(2))
}

main().catch((err) => {
	console.error('Fatal error:', err)
	process.exit(1)
})
