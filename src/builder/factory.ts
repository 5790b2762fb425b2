/**
 * Builder Factory
 *
 * Creates ImageUrlBuilder instances from loaded configuration
 */

import { loadConfig } from '../config';
import type { FluentImageConfig } from '../config';
import { createLogger } from '../utils/logging';
import type { Logger } from '../utils/logging';
import { ImageUrlBuilder } from './ImageUrlBuilder';

/**
 * Create an image URL builder for a path
 *
 * @param path Image path, relative to the configured base URL when there is one
 * @param config Configuration, loaded from the environment by default
 * @param logger Logger overriding the one built from the configuration
 */
export function createImageUrlBuilder(
  path: string,
  config: FluentImageConfig = loadConfig(),
  logger?: Logger
): ImageUrlBuilder {
  return new ImageUrlBuilder(path, {
    baseUrl: config.url.baseUrl,
    logger: logger || createLogger(config, 'ImageUrlBuilder')
  });
}
