/**
 * Render artifact and renderer contracts
 *
 * The rasterization engine itself lives outside this package; these types are
 * the boundary it has to satisfy.
 */

import type { CueContent } from './subtitle';

/**
 * RGB pixel buffer, 3 bytes per pixel, row-major
 */
export interface PixelFrame {
  width: number;
  height: number;
  data: Uint8ClampedArray;
}

/**
 * Single-channel opacity buffer, values in [0, 1], row-major
 */
export interface MaskFrame {
  width: number;
  height: number;
  data: Float32Array;
}

/**
 * Rendered representation of a cue, queryable by time
 */
export interface RenderArtifact {
  readonly width: number;
  readonly height: number;
  frameAt(t: number): PixelFrame;
  maskAt?(t: number): MaskFrame;
}

/**
 * Renders a cue's content into an artifact
 */
export type Renderer<A = RenderArtifact> = (content: CueContent) => A;

/**
 * Renderer whose rasterization completes asynchronously
 */
export type AsyncRenderer<A = RenderArtifact> = (content: CueContent) => Promise<A>;

/**
 * Text appearance handed to a rasterizer
 */
export interface TextStyle {
  font: string;
  size: number;
  color: string;
  strokeColor?: string;
  strokeWidth: number;
  bgColor: string;
}

/**
 * External text engine: rasterizes one run of text in one style
 */
export type TextRasterizer = (text: string, style: TextStyle) => RenderArtifact;

/**
 * Where a part sits inside a composite artifact
 */
export interface Placement {
  x: number;
  y: number;
}
