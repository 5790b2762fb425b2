/**
 * Resize Expression
 *
 * Fluent setters for the resize family of image parameters. Each call
 * validates its input and writes straight into the builder's parameters.
 */

import { AlignmentExpression } from './AlignmentExpression';
import { FitModes, ResizeCommands, ScaleModes } from './commands';
import { ImageUrlBuilderExpression } from './ImageUrlBuilderExpression';
import { multiplierSchema, parseArgument, pixelSchema } from './validation';

export class ResizeExpression extends ImageUrlBuilderExpression {
  /**
   * Sets both width and height. Whitespace is added to keep the aspect ratio.
   */
  dimensions(width: number, height: number): ResizeExpression {
    return this.width(width).height(height);
  }

  /**
   * Sets the width in pixels. Aspect ratio is kept by default.
   */
  width(width: number): ResizeExpression {
    return this.setPixels(ResizeCommands.width, 'width', width, 'Width must be greater than 0.');
  }

  /**
   * Sets the height in pixels. Aspect ratio is kept by default.
   */
  height(height: number): ResizeExpression {
    return this.setPixels(ResizeCommands.height, 'height', height, 'Height must be greater than 0.');
  }

  /**
   * Upper bound for the width; keeps the aspect ratio without padding.
   */
  maxWidth(maxWidth: number): ResizeExpression {
    return this.setPixels(ResizeCommands.maxWidth, 'maxWidth', maxWidth, 'Max Width must be greater than 0.');
  }

  /**
   * Upper bound for the height; keeps the aspect ratio without padding.
   */
  maxHeight(maxHeight: number): ResizeExpression {
    return this.setPixels(ResizeCommands.maxHeight, 'maxHeight', maxHeight, 'Max Height must be greater than 0.');
  }

  /**
   * Fit mode `max`, behaving like maxWidth/maxHeight.
   */
  max(): ResizeExpression {
    this.builder.setParameter(ResizeCommands.fitMode, FitModes.max);
    return this;
  }

  /**
   * Fit mode `pad`: whitespace resolves aspect-ratio conflicts.
   */
  pad(): AlignmentExpression {
    this.builder.setParameter(ResizeCommands.fitMode, FitModes.pad);
    return new AlignmentExpression(this.builder);
  }

  /**
   * Fit mode `crop`: the image is cropped to fill the requested box.
   */
  crop(): AlignmentExpression {
    this.builder.setParameter(ResizeCommands.fitMode, FitModes.crop);
    return new AlignmentExpression(this.builder);
  }

  /**
   * Fit mode `stretch`: the image fills the box and loses its aspect ratio.
   * Nothing is left over to align, so no anchor operations follow.
   */
  stretch(): ResizeExpression {
    this.builder.setParameter(ResizeCommands.fitMode, FitModes.stretch);
    return this;
  }

  scaleUp(): ResizeExpression {
    this.builder.setParameter(ResizeCommands.scale, ScaleModes.up);
    return this;
  }

  /**
   * Only scale down. This is the server default.
   */
  scaleDown(): ResizeExpression {
    this.builder.setParameter(ResizeCommands.scale, ScaleModes.down);
    return this;
  }

  scaleBoth(): ResizeExpression {
    this.builder.setParameter(ResizeCommands.scale, ScaleModes.both);
    return this;
  }

  /**
   * Scales the image down and pads the canvas instead of scaling up.
   */
  scaleCanvas(): AlignmentExpression {
    this.builder.setParameter(ResizeCommands.scale, ScaleModes.canvas);
    return new AlignmentExpression(this.builder);
  }

  /**
   * Scales the image by a multiplier: 0.5 halves it, 2 doubles it.
   */
  zoom(multiplier: number): ResizeExpression {
    const value = parseArgument(
      multiplierSchema,
      'multiplier',
      multiplier,
      'The zoom multiplier must be greater than 0.',
      this.logger
    );
    this.builder.setParameter(ResizeCommands.zoom, String(value));
    return this;
  }

  private setPixels(command: string, argument: string, pixels: number, message: string): ResizeExpression {
    const value = parseArgument(pixelSchema, argument, pixels, message, this.logger);
    this.builder.setParameter(command, value.toString(10));
    return this;
  }
}
