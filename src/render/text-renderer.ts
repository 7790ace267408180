/**
 * Text Renderer
 *
 * Turns cue content into artifacts using an external text rasterizer.
 * Styled cues are rasterized word by word and laid out on one line.
 */

import type { MaskFrame, PixelFrame, Placement, RenderArtifact, Renderer, TextRasterizer, TextStyle } from '../shared/types/render';
import type { WordStyle } from '../shared/types/subtitle';
import { DEFAULT_TEXT_STYLE } from '../shared/utils/constants';
import { createValidationError } from '../shared/utils/error-handler';
import { blitFrame, blitMask, createFrame, createMask } from './pixel-buffer';

// ============================================================================
// Horizontal Composite
// ============================================================================

/**
 * Artifact made of several parts placed side by side
 */
export interface CompositeArtifact extends RenderArtifact {
  readonly parts: readonly RenderArtifact[];
  readonly placements: readonly Placement[];
}

class HorizontalComposite implements CompositeArtifact {
  readonly width: number;
  readonly height: number;
  readonly placements: readonly Placement[];
  readonly maskAt?: (t: number) => MaskFrame;

  constructor(readonly parts: readonly RenderArtifact[]) {
    const placements: Placement[] = [];
    let x = 0;
    for (const part of parts) {
      placements.push({ x, y: 0 });
      x += part.width;
    }

    this.placements = placements;
    this.width = x;
    this.height = parts[0].height;

    if (parts.some((part) => part.maskAt)) {
      this.maskAt = (t) => this.composeMask(t);
    }
  }

  frameAt(t: number): PixelFrame {
    const frame = createFrame(this.width, this.height);
    this.parts.forEach((part, i) => {
      blitFrame(frame, part.frameAt(t), this.placements[i].x, this.placements[i].y);
    });
    return frame;
  }

  private composeMask(t: number): MaskFrame {
    const mask = createMask(this.width, this.height);
    this.parts.forEach((part, i) => {
      // Parts without a mask channel are opaque
      const partMask = part.maskAt ? part.maskAt(t) : createMask(part.width, part.height, 1);
      blitMask(mask, partMask, this.placements[i].x, this.placements[i].y);
    });
    return mask;
  }
}

/**
 * Place parts left to right on a shared top edge. The composite is as wide
 * as all parts together and as tall as the first part.
 */
export function composeHorizontally(parts: readonly RenderArtifact[]): CompositeArtifact {
  if (parts.length === 0) {
    throw createValidationError('Cannot compose an empty word list');
  }
  return new HorizontalComposite(parts);
}

// ============================================================================
// Renderer Factory
// ============================================================================

/**
 * Rasterizer style for one styled word
 */
export function wordTextStyle(word: WordStyle): TextStyle {
  return {
    font: word.font,
    size: word.size,
    color: word.color,
    strokeColor: word.strokeColor,
    strokeWidth: word.strokeWidth,
    bgColor: word.bgColor,
  };
}

export interface TextRendererOptions {
  /** Style for plain cues (default: DEFAULT_TEXT_STYLE) */
  plainStyle?: TextStyle;
}

/**
 * Build a renderer from a text rasterizer: plain content becomes one line in
 * `plainStyle`, styled content one composite of per-word rasterizations.
 */
export function createTextRenderer(
  rasterize: TextRasterizer,
  options: TextRendererOptions = {}
): Renderer {
  const plainStyle = options.plainStyle ?? DEFAULT_TEXT_STYLE;

  return (content) => {
    if (content.kind === 'plain') {
      return rasterize(content.text, plainStyle);
    }
    return composeHorizontally(content.words.map((word) => rasterize(word.text, wordTextStyle(word))));
  };
}
