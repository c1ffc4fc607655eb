import { SourceLocation } from './entities';
import { AmbiguousInputError } from './errors';
import { RecordedPath, VersionMarker } from './RecordedPath';
import { SymbolPath } from './SymbolPath';

// module caches nested inside module caches, e.g. a vendored GOPATH
const MAX_MARKER_DEPTH = 8;
// hosting service / organization / project
const REPOSITORY_QUALIFIERS = 3;

/**
 * Works out which repository, revision and file a (symbol, recorded path)
 * pair points at. Pure: no filesystem access, same inputs give the same result.
 */
export class PathSpecResolver {
  resolve(symbol: string, rawPath: string): SourceLocation {
    const path = RecordedPath.parse(rawPath);
    const marker = this.scanVersionMarkers(path);

    // `module@revision/relative/file` needs no symbol at all
    if (marker && !path.rooted) {
      return this.fromModuleVersionPath(path, marker);
    }

    const symbolPath = SymbolPath.parse(symbol);
    if (symbolPath.isEmpty) {
      throw new AmbiguousInputError(
        rawPath,
        'a symbol is required unless the path reads module@revision/file',
      );
    }

    if (symbolPath.isStandardLibrary) {
      return this.fromStandardLibrary(path, symbolPath);
    }

    const { repository, packageDepth } = this.splitRepository(symbolPath, path, marker);
    const afterMarker = marker ? path.slice(marker.index + 1).join('/') : '';
    // the package path plus the file name itself
    const relativePath = requireFile(path, afterMarker || path.tail(packageDepth + 1));

    return { repository, revision: marker?.revision ?? '', relativePath };
  }

  /** First marker wins for relative paths; rooted paths take the innermost one. */
  private scanVersionMarkers(path: RecordedPath): VersionMarker | undefined {
    let marker = path.findVersionMarker();
    if (!marker || !path.rooted) {
      return marker;
    }

    for (let depth = 1; depth < MAX_MARKER_DEPTH; depth++) {
      const inner = path.findVersionMarker(marker.index + 1);
      if (!inner) {
        break;
      }
      marker = inner;
    }
    return marker;
  }

  private fromModuleVersionPath(path: RecordedPath, marker: VersionMarker): SourceLocation {
    const relativePath = path.slice(marker.index + 1).join('/');
    if (relativePath === '') {
      throw new AmbiguousInputError(path.raw, 'no file follows the module version');
    }

    return {
      repository: path.moduleSegments(marker).join('/'),
      revision: marker.revision,
      relativePath,
    };
  }

  private fromStandardLibrary(path: RecordedPath, symbolPath: SymbolPath): SourceLocation {
    const start = path.lastIndexOfSegment(symbolPath.root);
    const relativePath = requireFile(
      path,
      start >= 0 ? path.slice(start).join('/') : path.tail(symbolPath.qualifiers.length + 1),
    );

    return { repository: '', revision: '', relativePath };
  }

  private splitRepository(
    symbolPath: SymbolPath,
    path: RecordedPath,
    marker: VersionMarker | undefined,
  ): { repository: string; packageDepth: number } {
    const { qualifiers } = symbolPath;
    const cached = marker ? this.matchCachedModule(qualifiers, path.moduleSegments(marker)) : 0;
    const take = cached > 0 ? cached : Math.min(qualifiers.length, REPOSITORY_QUALIFIERS);

    return {
      repository: qualifiers.slice(0, take).join('/'),
      packageDepth: qualifiers.length - take,
    };
  }

  /**
   * Length of the longest qualifier prefix that the module cache directory
   * ends with, or 0 when the cache layout does not name the symbol's module.
   */
  private matchCachedModule(qualifiers: readonly string[], moduleSegments: string[]): number {
    const decoded = moduleSegments.map(decodeCaseEncoding);

    for (let count = Math.min(qualifiers.length, decoded.length); count > 0; count--) {
      const trailing = decoded.slice(decoded.length - count);
      if (trailing.every((segment, i) => segment === qualifiers[i])) {
        return count;
      }
    }
    return 0;
  }
}

function requireFile(path: RecordedPath, relativePath: string): string {
  if (relativePath === '') {
    throw new AmbiguousInputError(path.raw, 'the path names no file');
  }
  return relativePath;
}

/** Module caches store upper-case letters as "!" followed by the lower-case letter. */
export function decodeCaseEncoding(segment: string): string {
  return segment.replace(/!([a-z])/g, (_, letter: string) => letter.toUpperCase());
}
