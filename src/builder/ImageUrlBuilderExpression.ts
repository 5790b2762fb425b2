/**
 * Base class for fluent expressions over an ImageUrlBuilder
 */

import type { Logger } from '../utils/logging';
import type { ImageUrlBuilder } from './ImageUrlBuilder';

export abstract class ImageUrlBuilderExpression {
  protected readonly builder: ImageUrlBuilder;

  constructor(builder: ImageUrlBuilder) {
    this.builder = builder;
  }

  protected get logger(): Logger {
    return this.builder.logger;
  }
}
