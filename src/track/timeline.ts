/**
 * Cue Timeline
 *
 * Ordered, immutable list of cues with time lookup, clamped sub-ranges,
 * pattern filtering and text export. Derived timelines are new instances.
 */

import type { Cue, CueContent, CueEntry } from '../shared/types/subtitle';
import { cueText, isActiveAt, plainContent, styledContent } from '../shared/types/subtitle';
import { AppError, ErrorCodes, createValidationError } from '../shared/utils/error-handler';
import { generateTextRepresentation } from '../shared/utils/srt-generator';

// ============================================================================
// Types
// ============================================================================

/**
 * Cue selection for filter(): a regular expression (or its source), matched
 * against the cue text, or a predicate on the content
 */
export type CuePattern = RegExp | string | ((content: CueContent, cue: Cue) => boolean);

/**
 * Tells the lookup which cues already have a rendered artifact
 */
export type RenderedCheck = (cue: Cue) => boolean;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Number of entries in `order` whose cue starts at or before `t`
 */
function countStartsAtOrBefore(order: readonly number[], cues: readonly Cue[], t: number): number {
  let lo = 0;
  let hi = order.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (cues[order[mid]].start <= t) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

/**
 * Detached, deeply frozen copy of a cue; later edits to the caller's word
 * list or word objects do not reach the timeline or its cache keys
 */
function freezeCue(cue: Cue): Cue {
  const content = cue.content.kind === 'plain'
    ? plainContent(cue.content.text)
    : styledContent(Object.freeze(cue.content.words.map((word) => Object.freeze({ ...word }))));

  return Object.freeze({ start: cue.start, end: cue.end, content: Object.freeze(content) });
}

function toPredicate(pattern: CuePattern): (content: CueContent, cue: Cue) => boolean {
  if (typeof pattern === 'function') {
    return pattern;
  }

  const regex = typeof pattern === 'string' ? new RegExp(pattern) : pattern;
  // search() ignores lastIndex, so global/sticky expressions stay stateless
  return (content) => cueText(content).search(regex) !== -1;
}

// ============================================================================
// Cue Timeline
// ============================================================================

export class CueTimeline implements Iterable<Cue> {
  readonly cues: readonly Cue[];
  readonly duration: number;

  /** Cue indices sorted by start time (ties keep timeline order) */
  private readonly order: readonly number[];
  /** Largest end time among order[0..i] */
  private readonly runningMaxEnd: readonly number[];

  constructor(cues: readonly Cue[]) {
    if (cues.length === 0) {
      throw new AppError(ErrorCodes.TIMELINE_EMPTY, 'A timeline needs at least one cue', {
        category: 'validation',
      });
    }

    cues.forEach((cue, index) => {
      if (Number.isNaN(cue.start) || Number.isNaN(cue.end)) {
        throw createValidationError(`Cue ${index} has a non-numeric boundary`, { index });
      }
    });

    this.cues = Object.freeze(cues.map(freezeCue));
    this.duration = this.cues.reduce((max, cue) => Math.max(max, cue.end), -Infinity);

    const order = this.cues.map((_, index) => index);
    order.sort((a, b) => this.cues[a].start - this.cues[b].start || a - b);
    this.order = order;

    const runningMaxEnd: number[] = [];
    let maxEnd = -Infinity;
    for (const index of order) {
      maxEnd = Math.max(maxEnd, this.cues[index].end);
      runningMaxEnd.push(maxEnd);
    }
    this.runningMaxEnd = runningMaxEnd;
  }

  /**
   * Build a timeline from literal `[[start, end], text | words]` entries
   */
  static fromEntries(entries: readonly CueEntry[]): CueTimeline {
    return new CueTimeline(
      entries.map(([[start, end], value]) => ({
        start,
        end,
        content: typeof value === 'string' ? plainContent(value) : styledContent(value),
      }))
    );
  }

  /** Timelines always start at 0 */
  get start(): number {
    return 0;
  }

  get end(): number {
    return this.duration;
  }

  get length(): number {
    return this.cues.length;
  }

  at(index: number): Cue | undefined {
    return this.cues.at(index);
  }

  [Symbol.iterator](): Iterator<Cue> {
    return this.cues[Symbol.iterator]();
  }

  /**
   * Find the cue shown at time `t` (`start <= t < end`), or null.
   *
   * When several cues contain `t`, the first one (timeline order) that
   * `isRendered` accepts wins; otherwise the first one in timeline order.
   */
  resolveActive(t: number, isRendered?: RenderedCheck): Cue | null {
    if (Number.isNaN(t)) {
      return null;
    }

    const matches: number[] = [];
    for (let i = countStartsAtOrBefore(this.order, this.cues, t) - 1; i >= 0; i--) {
      if (this.runningMaxEnd[i] <= t) {
        break;
      }
      const index = this.order[i];
      if (isActiveAt(this.cues[index], t)) {
        matches.push(index);
      }
    }

    if (matches.length === 0) {
      return null;
    }

    matches.sort((a, b) => a - b);

    if (isRendered) {
      const rendered = matches.find((index) => isRendered(this.cues[index]));
      if (rendered !== undefined) {
        return this.cues[rendered];
      }
    }

    return this.cues[matches[0]];
  }

  /**
   * Cues overlapping `[start, end)`, clamped to it. A cue (t1, t2) overlaps
   * when `start <= t1 < end` or `start < t2 <= end`. An omitted bound is
   * open on its side and does not clamp.
   */
  subRange(start?: number, end?: number): Cue[] {
    const lower = start ?? -Infinity;
    const upper = end ?? Infinity;

    return this.cues
      .filter((cue) => (lower <= cue.start && cue.start < upper) || (lower < cue.end && cue.end <= upper))
      .map((cue) => ({
        start: start === undefined ? cue.start : Math.max(cue.start, start),
        end: end === undefined ? cue.end : Math.min(cue.end, end),
        content: cue.content,
      }));
  }

  /**
   * New timeline with the cues whose content matches, in timeline order
   */
  filter(pattern: CuePattern): CueTimeline {
    const matches = toPredicate(pattern);
    return new CueTimeline(this.cues.filter((cue) => matches(cue.content, cue)));
  }

  /**
   * `HH:MM:SS,mmm - HH:MM:SS,mmm\n<text>` blocks separated by a blank line
   */
  toTextRepresentation(): string {
    return generateTextRepresentation(this.cues);
  }

  toString(): string {
    return this.toTextRepresentation();
  }
}
