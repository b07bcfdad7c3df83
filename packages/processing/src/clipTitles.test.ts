import { describe, it, expect } from 'vitest';
import { ClipTitleRegistry } from './clipTitles.js';

describe('ClipTitleRegistry', () => {
  it('should number repeated titles', () => {
    const titles = new ClipTitleRegistry();

    expect(titles.claim('Intro')).toBe('Intro');
    expect(titles.claim('Intro')).toBe('Intro (2)');
    expect(titles.claim('Intro (2)')).toBe('Intro (2) (2)');
    expect(titles.claim('Intro')).toBe('Intro (3)');
  });

  it('should fall back to the generic title', () => {
    const titles = new ClipTitleRegistry('part');

    expect(titles.claim(null)).toBe('part');
    expect(titles.claim('')).toBe('part (2)');
  });

  it('should make titles safe as file names', () => {
    expect(new ClipTitleRegistry().claim('a/b: c')).toBe('a_b_ c');
  });

  it('should forget titles on reset', () => {
    const titles = new ClipTitleRegistry();
    titles.claim('Intro');
    titles.reset();
    expect(titles.claim('Intro')).toBe('Intro');
  });
});
