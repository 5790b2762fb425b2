import { describe, it, expect } from 'vitest';
import { createImageUrlBuilder } from '../../src/builder/factory';
import { ImageUrlBuilder } from '../../src/builder/ImageUrlBuilder';
import type { FluentImageConfig } from '../../src/config';
import { createMockLogger } from '../mocks/logging';

describe('createImageUrlBuilder', () => {
  const config: FluentImageConfig = {
    environment: 'development',
    url: { baseUrl: 'https://images.example.com' }
  };

  it('should use the configured base URL', () => {
    const builder = createImageUrlBuilder('/photos/cat.jpg', config, createMockLogger());

    builder.resize(img => img.maxWidth(1024));

    expect(builder).toBeInstanceOf(ImageUrlBuilder);
    expect(builder.toUrl()).toBe('https://images.example.com/photos/cat.jpg?maxwidth=1024');
  });

  it('should pass the supplied logger to the builder', () => {
    const logger = createMockLogger();
    const builder = createImageUrlBuilder('/photos/cat.jpg', config, logger);

    builder.setParameter('zoom', '2');

    expect(logger.debug).toHaveBeenCalledWith('Setting image parameter', {
      parameter: 'zoom',
      value: '2',
      replaced: false
    });
  });

  it('should build a logger from the configuration when none is given', () => {
    const builder = createImageUrlBuilder('photos/cat.jpg', { environment: 'production', url: {} });

    expect(typeof builder.logger.breadcrumb).toBe('function');
    expect(builder.toUrl()).toBe('photos/cat.jpg');
  });
});
