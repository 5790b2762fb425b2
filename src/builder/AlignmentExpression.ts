/**
 * Alignment Expression
 *
 * Anchor setters available after choosing a fit or scale mode that leaves
 * room to position the image (pad, crop, scaleCanvas).
 */

import { ResizeCommands } from './commands';
import type { AnchorPosition } from './commands';
import { ImageUrlBuilderExpression } from './ImageUrlBuilderExpression';
import { anchorSchema, parseArgument } from './validation';

export class AlignmentExpression extends ImageUrlBuilderExpression {
  /**
   * Sets the anchor to any supported position
   */
  anchor(position: AnchorPosition): AlignmentExpression {
    const value = parseArgument(
      anchorSchema,
      'position',
      position,
      `Unknown anchor position "${String(position)}".`,
      this.logger
    );
    this.builder.setParameter(ResizeCommands.anchor, value);
    return this;
  }

  topLeft(): AlignmentExpression {
    return this.anchor('topleft');
  }

  topCenter(): AlignmentExpression {
    return this.anchor('topcenter');
  }

  topRight(): AlignmentExpression {
    return this.anchor('topright');
  }

  middleLeft(): AlignmentExpression {
    return this.anchor('middleleft');
  }

  /**
   * Centers the image. This is the server default.
   */
  middleCenter(): AlignmentExpression {
    return this.anchor('middlecenter');
  }

  middleRight(): AlignmentExpression {
    return this.anchor('middleright');
  }

  bottomLeft(): AlignmentExpression {
    return this.anchor('bottomleft');
  }

  bottomCenter(): AlignmentExpression {
    return this.anchor('bottomcenter');
  }

  bottomRight(): AlignmentExpression {
    return this.anchor('bottomright');
  }
}
