/**
 * Frame Resolver
 *
 * Answers "what does the subtitle layer look like at time t": resolves the
 * active cue, renders it through the cache on first use and returns its
 * frame or mask. Times without an active cue get one-pixel sentinels.
 */

import type { Cue, StyleTable, WordStyle } from '../shared/types/subtitle';
import { styledContent } from '../shared/types/subtitle';
import type { MaskFrame, PixelFrame, RenderArtifact, Renderer } from '../shared/types/render';
import type { RenderCache } from '../shared/cache/render-cache';
import { serializeCueKey } from '../shared/cache/cache-utils';
import { StyleLookupError } from '../shared/utils/error-handler';
import { blankFrame, blankMask, createMask } from '../render/pixel-buffer';
import type { CueTimeline } from './timeline';

export class FrameResolver {
  constructor(
    private readonly timeline: CueTimeline,
    private readonly cache: RenderCache<RenderArtifact>,
    private readonly renderer: Renderer,
    /** Word styles per cue; present only in styled sessions */
    private readonly styles?: StyleTable
  ) {}

  /**
   * Cue shown at `t`, preferring one that is already rendered
   */
  activeCue(t: number): Cue | null {
    return this.timeline.resolveActive(t, (cue) => this.cache.has(cue));
  }

  frameAt(t: number): PixelFrame {
    const artifact = this.artifactAt(t);
    return artifact ? artifact.frameAt(t) : blankFrame();
  }

  maskAt(t: number): MaskFrame {
    const artifact = this.artifactAt(t);
    if (!artifact) {
      return blankMask();
    }
    // An artifact without a mask channel is fully opaque
    return artifact.maskAt ? artifact.maskAt(t) : createMask(artifact.width, artifact.height, 1);
  }

  private artifactAt(t: number): RenderArtifact | null {
    const cue = this.activeCue(t);
    if (!cue) {
      return null;
    }

    if (!this.styles || this.cache.has(cue)) {
      return this.cache.getOrRender(cue, this.renderer);
    }

    // Look styles up before rendering so a broken table is not reported as a render failure
    const words = this.lookupStyles(this.styles, cue);
    return this.cache.getOrRender(cue, () => this.renderer(styledContent(words)));
  }

  private lookupStyles(styles: StyleTable, cue: Cue): readonly WordStyle[] {
    const key = serializeCueKey(cue);
    const words = styles.get(key);
    if (!words) {
      throw new StyleLookupError(key);
    }
    return words;
  }
}
