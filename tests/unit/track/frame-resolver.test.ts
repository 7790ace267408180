/**
 * Frame Resolver Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { FrameResolver } from '@track/frame-resolver';
import { CueTimeline } from '@track/timeline';
import { RenderCache } from '@shared/cache/render-cache';
import { serializeCueKey } from '@shared/cache/cache-utils';
import { RenderFailureError, StyleLookupError } from '@shared/utils/error-handler';
import { DEFAULT_TEXT_STYLE } from '@shared/utils/constants';
import { cueText, styledContent, type WordStyle } from '@shared/types/subtitle';
import type { RenderArtifact } from '@shared/types/render';
import { createTextRenderer } from '@render/text-renderer';
import { blankFrame, blankMask, createMask } from '@render/pixel-buffer';
import { CHAR_WIDTH, createFakeRasterizer, fakeArtifact } from '../../fixtures/fake-rasterizer';

function setup(timeline: CueTimeline, rasterizer = createFakeRasterizer()) {
  const cache = new RenderCache<RenderArtifact>();
  const renderer = vi.fn(createTextRenderer(rasterizer));
  return { cache, renderer, rasterizer, resolver: new FrameResolver(timeline, cache, renderer) };
}

describe('FrameResolver', () => {
  describe('frameAt', () => {
    it('should return the blank sentinel when no cue is active', () => {
      const { resolver, renderer } = setup(CueTimeline.fromEntries([[[2, 4], 'only']]));

      expect(resolver.frameAt(0)).toEqual(blankFrame());
      expect(resolver.frameAt(5)).toEqual(blankFrame());
      expect(resolver.frameAt(4)).toEqual(blankFrame());
      expect(renderer).not.toHaveBeenCalled();
    });

    it('should render the active cue', () => {
      const { resolver } = setup(CueTimeline.fromEntries([[[2, 4], 'hi']]));

      const frame = resolver.frameAt(3);

      expect(frame.width).toBe(2 * CHAR_WIDTH);
      expect(frame.height).toBe(DEFAULT_TEXT_STYLE.size);
      expect(frame.data[0]).toBe(255);
    });

    it('should render each cue once across queries', () => {
      const { resolver, renderer, cache } = setup(
        CueTimeline.fromEntries([
          [[0, 2], 'one'],
          [[2, 4], 'two'],
        ])
      );

      resolver.frameAt(0.5);
      resolver.frameAt(1.5);
      resolver.frameAt(2.5);
      resolver.frameAt(3.5);
      resolver.frameAt(1);

      expect(renderer).toHaveBeenCalledTimes(2);
      expect(cache.size).toBe(2);
    });

    it('should prefer an already rendered overlapping cue', () => {
      const { resolver, renderer } = setup(
        CueTimeline.fromEntries([
          [[0, 10], 'first'],
          [[5, 15], 'second'],
        ])
      );

      resolver.frameAt(12);
      const active = resolver.activeCue(7);

      expect(active && cueText(active.content)).toBe('second');
      expect(resolver.frameAt(7).width).toBe('second'.length * CHAR_WIDTH);
      expect(renderer).toHaveBeenCalledTimes(1);
    });

    it('should propagate render failures and retry on the next query', () => {
      const timeline = CueTimeline.fromEntries([[[0, 1], 'x']]);
      const cache = new RenderCache<RenderArtifact>();
      const renderer = vi
        .fn<() => RenderArtifact>()
        .mockImplementationOnce(() => {
          throw new Error('engine offline');
        })
        .mockImplementation(() => fakeArtifact(4, 4));
      const resolver = new FrameResolver(timeline, cache, renderer);

      expect(() => resolver.frameAt(0.5)).toThrow(RenderFailureError);
      expect(cache.size).toBe(0);
      expect(resolver.frameAt(0.5).width).toBe(4);
    });
  });

  describe('maskAt', () => {
    it('should return the blank mask sentinel when no cue is active', () => {
      const { resolver } = setup(CueTimeline.fromEntries([[[2, 4], 'only']]));

      expect(resolver.maskAt(0)).toEqual(blankMask());
      expect(resolver.maskAt(5)).toEqual(blankMask());
    });

    it('should return the artifact mask', () => {
      const { resolver } = setup(CueTimeline.fromEntries([[[0, 1], 'ab']]));

      expect(resolver.maskAt(0.5)).toEqual(createMask(2 * CHAR_WIDTH, DEFAULT_TEXT_STYLE.size, 1));
    });

    it('should treat artifacts without a mask channel as opaque', () => {
      const { resolver } = setup(CueTimeline.fromEntries([[[0, 1], 'ab']]), createFakeRasterizer({ mask: false }));

      expect(resolver.maskAt(0.5)).toEqual(createMask(2 * CHAR_WIDTH, DEFAULT_TEXT_STYLE.size, 1));
    });

    it('should share the cached artifact with frameAt', () => {
      const { resolver, renderer } = setup(CueTimeline.fromEntries([[[0, 1], 'ab']]));

      resolver.frameAt(0.2);
      resolver.maskAt(0.4);

      expect(renderer).toHaveBeenCalledTimes(1);
    });
  });

  describe('styled sessions', () => {
    const words: WordStyle[] = [
      { text: 'Big ', font: 'Impact', size: 40, color: 'red', strokeWidth: 1, bgColor: 'transparent' },
      { text: 'news ', font: 'Impact', size: 20, color: 'white', strokeWidth: 1, bgColor: 'transparent' },
    ];
    const timeline = CueTimeline.fromEntries([[[0, 2], 'Big news ']]);

    const stylesFor = (source: CueTimeline) => {
      const styles = new Map<string, readonly WordStyle[]>();
      for (const cue of source) {
        styles.set(serializeCueKey(cue), words);
      }
      return styles;
    };

    it('should render the words registered for the cue', () => {
      const rasterizer = createFakeRasterizer();
      const renderer = vi.fn(createTextRenderer(rasterizer));
      const resolver = new FrameResolver(timeline, new RenderCache<RenderArtifact>(), renderer, stylesFor(timeline));

      const frame = resolver.frameAt(1);

      expect(renderer).toHaveBeenCalledWith(styledContent(words));
      expect(frame.width).toBe(('Big '.length + 'news '.length) * CHAR_WIDTH);
      expect(frame.height).toBe(40);
    });

    it('should not look styles up again for a cached cue', () => {
      const styles = stylesFor(timeline);
      const get = vi.spyOn(styles, 'get');
      const resolver = new FrameResolver(
        timeline,
        new RenderCache<RenderArtifact>(),
        createTextRenderer(createFakeRasterizer()),
        styles
      );

      resolver.frameAt(0.5);
      resolver.frameAt(1.5);

      expect(get).toHaveBeenCalledTimes(1);
    });

    it('should fail loudly when the style table has no entry for the cue', () => {
      const cache = new RenderCache<RenderArtifact>();
      const renderer = vi.fn(createTextRenderer(createFakeRasterizer()));
      const resolver = new FrameResolver(timeline, cache, renderer, new Map());

      expect(() => resolver.frameAt(1)).toThrow(StyleLookupError);
      expect(renderer).not.toHaveBeenCalled();
      expect(cache.size).toBe(0);
    });

    it('should still return sentinels outside every cue', () => {
      const resolver = new FrameResolver(
        timeline,
        new RenderCache<RenderArtifact>(),
        createTextRenderer(createFakeRasterizer()),
        new Map()
      );

      expect(resolver.frameAt(3)).toEqual(blankFrame());
    });
  });
});
