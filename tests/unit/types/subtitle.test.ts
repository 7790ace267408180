/**
 * Subtitle type helper tests
 */

import { describe, it, expect } from 'vitest';
import { cueText, isActiveAt, plainContent, styledContent, type Cue } from '@shared/types/subtitle';

const cue = (start: number, end: number): Cue => ({ start, end, content: plainContent('x') });

describe('cueText', () => {
  it('should return plain text as is', () => {
    expect(cueText(plainContent('Hello\nthere'))).toBe('Hello\nthere');
  });

  it('should concatenate styled word texts', () => {
    const content = styledContent([
      { text: 'One ', font: 'Arial', size: 10, color: 'white', strokeWidth: 1, bgColor: 'transparent' },
      { text: 'two ', font: 'Arial', size: 10, color: 'white', strokeWidth: 1, bgColor: 'transparent' },
    ]);

    expect(cueText(content)).toBe('One two ');
  });
});

describe('isActiveAt', () => {
  it('should use a right-open interval', () => {
    expect(isActiveAt(cue(10, 20), 10)).toBe(true);
    expect(isActiveAt(cue(10, 20), 19.999)).toBe(true);
    expect(isActiveAt(cue(10, 20), 20)).toBe(false);
  });

  it('should never match a zero-length cue', () => {
    expect(isActiveAt(cue(5, 5), 5)).toBe(false);
  });
});
