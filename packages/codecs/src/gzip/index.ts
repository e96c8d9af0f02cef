export * from './gzip'
export { inflateRaw, type InflateOptions, type InflateResult } from './inflate'
export { deflateRaw, DEFAULT_LEVEL, type DeflateOptions } from './deflate'
