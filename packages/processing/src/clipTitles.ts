import { sanitizeFilename } from '@reelkeeper/utils';

/**
 * Hands out unique clip titles for one run. A title already issued gets a
 * ' (N)' suffix; an empty title falls back to the generic one.
 */
export class ClipTitleRegistry {
  private readonly issued = new Set<string>();

  constructor(private readonly genericTitle: string = 'clip') {}

  claim(title: string | null): string {
    const base = sanitizeFilename(title ?? '') || this.genericTitle;

    let candidate = base;
    for (let n = 2; this.issued.has(candidate); n++) {
      candidate = `${base} (${n})`;
    }

    this.issued.add(candidate);
    return candidate;
  }

  reset(): void {
    this.issued.clear();
  }
}
