/**
 * Index of the first item in `a` whose start is not below `x`, which is where
 * an item starting at `x` goes to keep `a` sorted
 */
export function binarySearchOf<T>(
  a: readonly T[],
  x: number,
  start: (item: T) => number
): number {
  let lo = 0, hi = a.length;

  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (start(a[mid]) < x) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }

  return lo;
}

/**
 * Sorted copy of `a`. Equal keys keep their original order.
 */
export function sortedBy<T>(a: readonly T[], key: (item: T) => number): T[] {
  return a.slice().sort((x, y) => key(x) - key(y));
}

export function sum(a: readonly number[]): number {
  let total = 0;
  for (const n of a) total += n;
  return total;
}

/**
 * Mean of the finite, non-negative values in `a`, or null if there are none
 */
export function meanOfKnown(a: readonly number[]): number | null {
  let total = 0, count = 0;
  for (const n of a) {
    if (Number.isFinite(n) && n >= 0) {
      total += n;
      count += 1;
    }
  }
  return count ? total / count : null;
}

export interface TreeLogOptions {
  contributions?: boolean;
  lineNames?: boolean;
}

const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';
const RESET = '\x1b[0m';

/**
 * Collects indented text for the log() methods and prints it on flush()
 */
export class Logger {
  buffer: string;
  indents: string[];
  atLineStart: boolean;

  constructor() {
    this.buffer = '';
    this.indents = [];
    this.atLineStart = false;
  }

  bold() {
    this.buffer += BOLD;
  }

  dim() {
    this.buffer += DIM;
  }

  reset() {
    this.buffer += RESET;
  }

  flush() {
    console.log(this.buffer);
    this.buffer = '';
  }

  text(str: string | number) {
    const lines = String(str).split('\n');

    for (let i = 0; i < lines.length; i++) {
      if (i > 0) {
        this.buffer += '\n';
        this.atLineStart = true;
      }

      if (lines[i]) {
        if (this.atLineStart) this.buffer += this.indents.join('');
        this.buffer += lines[i];
        this.atLineStart = false;
      }
    }
  }

  /**
   * What has been written since the last flush, without the escapes
   */
  plain() {
    return this.buffer.replace(/\x1b\[\d+m/g, '');
  }

  pushIndent(indent = '  ') {
    this.indents.push(indent);
  }

  popIndent() {
    this.indents.pop();
  }
}
