/**
 * @figpaint/render - Renders figures to canvases and PNG files
 */

export * from './types'
export * from './render'
