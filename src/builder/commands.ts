/**
 * RIAPI command names and values understood by the image server
 *
 * These strings are the wire contract; see https://imageresizing.net/docs/reference
 */

export const ResizeCommands = {
  width: 'width',
  height: 'height',
  maxWidth: 'maxwidth',
  maxHeight: 'maxheight',
  zoom: 'zoom',
  fitMode: 'mode',
  scale: 'scale',
  anchor: 'anchor',
} as const;

export const FitModes = {
  max: 'max',
  pad: 'pad',
  crop: 'crop',
  stretch: 'stretch',
} as const;

export const ScaleModes = {
  up: 'upscaleonly',
  down: 'downscaleonly',
  both: 'both',
  canvas: 'upscalecanvas',
} as const;

export const AnchorPositions = [
  'topleft',
  'topcenter',
  'topright',
  'middleleft',
  'middlecenter',
  'middleright',
  'bottomleft',
  'bottomcenter',
  'bottomright',
] as const;

export type AnchorPosition = typeof AnchorPositions[number];
