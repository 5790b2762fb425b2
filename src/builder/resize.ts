/**
 * Entry point attaching a resize configuration to an ImageUrlBuilder
 */

import { defaultLogger } from '../utils/logging';
import type { ImageUrlBuilder } from './ImageUrlBuilder';
import { ResizeExpression } from './ResizeExpression';
import { requireArgument } from './validation';

export type ResizeConfigurator = (img: ResizeExpression) => unknown;

/**
 * Adds resize options to the builder and returns it for further chaining.
 * Throws InvalidArgumentError if the builder or configure callback is absent.
 *
 * @example
 * // crops the image to 200x100
 * resize(builder, img => img.width(200).height(100).crop());
 */
export function resize(
  builder: ImageUrlBuilder | null | undefined,
  configure: ResizeConfigurator | null | undefined
): ImageUrlBuilder {
  const target = requireArgument('builder', builder, defaultLogger);
  const callback = requireArgument('configure', configure, target.logger);

  target.logger.breadcrumb('Applying resize configuration', undefined, { path: target.path });
  callback(new ResizeExpression(target));

  return target;
}
