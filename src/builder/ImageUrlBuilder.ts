/**
 * Image URL Builder
 *
 * Owns the parameter store that expressions write into and serializes it
 * into the query string of an image URL.
 */

import { defaultLogger } from '../utils/logging';
import type { Logger } from '../utils/logging';
import { resize } from './resize';
import type { ResizeConfigurator } from './resize';
import { parseArgument, pathSchema } from './validation';

export interface ImageUrlBuilderOptions {
  /**
   * Absolute URL the path is appended to, e.g. `https://images.example.com`
   */
  baseUrl?: string;
  logger?: Logger;
}

export class ImageUrlBuilder {
  readonly path: string;
  readonly baseUrl?: string;
  readonly logger: Logger;
  private readonly parameters = new Map<string, string>();

  constructor(path: string, options: ImageUrlBuilderOptions = {}) {
    this.logger = options.logger || defaultLogger;
    this.path = parseArgument(pathSchema, 'path', path, 'Path must be a non-empty string.', this.logger);
    this.baseUrl = options.baseUrl;
  }

  /**
   * Set a query parameter, replacing any earlier value for the same key
   */
  setParameter(key: string, value: string): void {
    this.logger.debug('Setting image parameter', {
      parameter: key,
      value,
      replaced: this.parameters.has(key)
    });
    this.parameters.set(key, value);
  }

  /**
   * Snapshot of the parameters in first-insertion order
   */
  getParameters(): Record<string, string> {
    return Object.fromEntries(this.parameters);
  }

  /**
   * Configure resize parameters
   *
   * @example
   * builder.resize(img => img.width(200).height(100).crop())
   */
  resize(configure: ResizeConfigurator): this {
    resize(this, configure);
    return this;
  }

  toQueryString(): string {
    return new URLSearchParams([...this.parameters]).toString();
  }

  toUrl(): string {
    const location = this.baseUrl
      ? `${this.baseUrl.replace(/\/+$/, '')}/${this.path.replace(/^\/+/, '')}`
      : this.path;
    const query = this.toQueryString();

    return query ? `${location}?${query}` : location;
  }

  toString(): string {
    return this.toUrl();
  }
}
