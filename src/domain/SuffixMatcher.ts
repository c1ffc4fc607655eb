/**
 * True when `recordedPath` ends with `candidate` on a whole-segment boundary:
 * `pkg/a/file.go` matches `/build/pkg/a/file.go` but `bc.go` does not match `/x/abc.go`.
 */
export function isSegmentSuffix(recordedPath: string, candidate: string): boolean {
  if (candidate === '' || !recordedPath.endsWith(candidate)) {
    return false;
  }
  const boundary = recordedPath.length - candidate.length - 1;
  return boundary < 0 || recordedPath[boundary] === '/';
}

/** Orders a deeper (longer) match first, then by code units so ties are deterministic. */
export function compareMatches(a: string, b: string): number {
  if (a.length !== b.length) {
    return b.length - a.length;
  }
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

export class SuffixMatcher {
  private best: string | undefined;

  constructor(private readonly recordedPath: string) {}

  offer(candidate: string): void {
    if (!isSegmentSuffix(this.recordedPath, candidate)) {
      return;
    }
    if (this.best === undefined || compareMatches(candidate, this.best) < 0) {
      this.best = candidate;
    }
  }

  get match(): string | undefined {
    return this.best;
  }
}
