/**
 * VGM, VGZ and GD3 codecs
 */

export * from './vgm'
export * from './gzip'
