import { ParserConfig, ResourceTracker } from '@vgmkit/core'
import type { VgmDecodeOptions } from './types'

/**
 * Limits and counters for one parse
 */
export interface ParseSession {
	config: ParserConfig
	tracker: ResourceTracker
}

/**
 * Fill in a default config and a fresh tracker where the caller gave none.
 * A caller-supplied tracker brings its own limits, which replace `options.config`.
 */
export function resolveSession(options: VgmDecodeOptions = {}): ParseSession {
	if (options.tracker) {
		return { config: options.tracker.limits, tracker: options.tracker }
	}
	const config = options.config ?? ParserConfig.default()
	const tracker = new ResourceTracker(config)
	return { config, tracker }
}
