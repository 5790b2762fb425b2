/**
 * Fluent image URL building
 */

export { ImageUrlBuilder } from './ImageUrlBuilder';
export type { ImageUrlBuilderOptions } from './ImageUrlBuilder';
export { ImageUrlBuilderExpression } from './ImageUrlBuilderExpression';
export { ResizeExpression } from './ResizeExpression';
export { AlignmentExpression } from './AlignmentExpression';
export { resize } from './resize';
export type { ResizeConfigurator } from './resize';
export { createImageUrlBuilder } from './factory';
export { ResizeCommands, FitModes, ScaleModes, AnchorPositions } from './commands';
export type { AnchorPosition } from './commands';
