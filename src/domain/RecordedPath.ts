export interface VersionMarker {
  index: number;
  module: string; // segment text before the last "@"
  revision: string;
}

const DRIVE_ROOT = /^[A-Za-z]:\//;

/**
 * A build-time file path split into "/" segments.
 */
export class RecordedPath {
  constructor(
    public readonly raw: string,
    public readonly segments: readonly string[],
    public readonly rooted: boolean,
  ) {}

  static parse(raw: string): RecordedPath {
    const segments = raw.split('/').filter((segment) => segment !== '');
    const rooted = raw.startsWith('/') || DRIVE_ROOT.test(raw);
    return new RecordedPath(raw, segments, rooted);
  }

  get length(): number {
    return this.segments.length;
  }

  findVersionMarker(from = 0): VersionMarker | undefined {
    for (let index = Math.max(from, 0); index < this.segments.length; index++) {
      const segment = this.segments[index];
      const at = segment.lastIndexOf('@');
      if (at >= 0) {
        return { index, module: segment.slice(0, at), revision: segment.slice(at + 1) };
      }
    }
    return undefined;
  }

  lastIndexOfSegment(name: string): number {
    return this.segments.lastIndexOf(name);
  }

  slice(from: number, to?: number): string[] {
    return this.segments.slice(from, to);
  }

  /** Trailing `count` segments joined; the whole path when it is shorter. */
  tail(count: number): string {
    const start = Math.max(this.segments.length - count, 0);
    return this.segments.slice(start).join('/');
  }

  /** Segments `[0, index]` with the marker segment cut down to its module part. */
  moduleSegments(marker: VersionMarker): string[] {
    return [...this.segments.slice(0, marker.index), marker.module];
  }
}
