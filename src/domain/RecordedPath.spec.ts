import { RecordedPath } from './RecordedPath';

describe('RecordedPath', () => {
  describe('parse', () => {
    it('should split an absolute path into segments', () => {
      const path = RecordedPath.parse('/home/runner/work/app/main.go');
      expect(path.rooted).toBe(true);
      expect(path.segments).toEqual(['home', 'runner', 'work', 'app', 'main.go']);
    });

    it('should treat a drive letter as a root', () => {
      expect(RecordedPath.parse('C:/Users/build/go/pkg/mod/x@v1/a.go').rooted).toBe(true);
    });

    it('should keep relative paths unrooted', () => {
      const path = RecordedPath.parse('github.com/aws/aws-sdk-go@v1.44.163/aws/defaults.go');
      expect(path.rooted).toBe(false);
      expect(path.length).toBe(5);
    });

    it('should drop empty segments', () => {
      expect(RecordedPath.parse('/a//b/').segments).toEqual(['a', 'b']);
    });
  });

  describe('findVersionMarker', () => {
    it('should split module and revision on the last "@"', () => {
      const path = RecordedPath.parse('/cache/mod/example.com/tool@v1@v2.0.0/main.go');
      expect(path.findVersionMarker()).toEqual({
        index: 3,
        module: 'tool@v1',
        revision: 'v2.0.0',
      });
    });

    it('should start scanning at the given index', () => {
      const path = RecordedPath.parse('/a/b@v1/vendor/c@v2/d.go');
      expect(path.findVersionMarker(2)).toEqual({ index: 3, module: 'c', revision: 'v2' });
    });

    it('should return undefined without a marker', () => {
      expect(RecordedPath.parse('/src/runtime/proc.go').findVersionMarker()).toBeUndefined();
    });
  });

  describe('tail', () => {
    const path = RecordedPath.parse('/home/runner/work/phlare/pkg/phlaredb/profile_store.go');

    it('should join the trailing segments', () => {
      expect(path.tail(3)).toBe('pkg/phlaredb/profile_store.go');
    });

    it('should return the whole path when asked for more segments than it has', () => {
      expect(path.tail(20)).toBe('home/runner/work/phlare/pkg/phlaredb/profile_store.go');
    });
  });

  describe('moduleSegments', () => {
    it('should end with the marker segment cut at the version', () => {
      const path = RecordedPath.parse('/go/pkg/mod/github.com/felixge/httpsnoop@v1.0.3/doc.go');
      const marker = path.findVersionMarker();
      expect(marker).toBeDefined();
      if (marker) {
        expect(path.moduleSegments(marker)).toEqual([
          'go',
          'pkg',
          'mod',
          'github.com',
          'felixge',
          'httpsnoop',
        ]);
      }
    });
  });

  it('should find the last segment with a given name', () => {
    const path = RecordedPath.parse('/usr/local/go/src/runtime/internal/runtime/x.go');
    expect(path.lastIndexOfSegment('runtime')).toBe(6);
    expect(path.lastIndexOfSegment('missing')).toBe(-1);
  });
});
