import { SymbolPath } from './SymbolPath';

describe('SymbolPath', () => {
  describe('parse', () => {
    it('should strip the function name from a standard library symbol', () => {
      const symbol = SymbolPath.parse('runtime.gopark');
      expect(symbol.qualifiers).toEqual(['runtime']);
      expect(symbol.isStandardLibrary).toBe(true);
    });

    it('should strip receiver and method from the last part only', () => {
      const symbol = SymbolPath.parse('compress/gzip.(*Writer).Reset');
      expect(symbol.qualifiers).toEqual(['compress', 'gzip']);
    });

    it('should keep domain-like qualifiers intact', () => {
      const symbol = SymbolPath.parse(
        'sigs.k8s.io/controller-runtime/pkg/internal/controller.(*Controller).processNextWorkItem',
      );
      expect(symbol.qualifiers).toEqual([
        'sigs.k8s.io',
        'controller-runtime',
        'pkg',
        'internal',
        'controller',
      ]);
      expect(symbol.isStandardLibrary).toBe(false);
      expect(symbol.root).toBe('sigs.k8s.io');
    });

    it('should drop type arguments that carry other import paths', () => {
      const symbol = SymbolPath.parse('github.com/acme/lib/cache.Get[go.shape.*github.com/acme/lib/v2.Item]');
      expect(symbol.qualifiers).toEqual(['github.com', 'acme', 'lib', 'cache']);
    });

    it('should handle closures', () => {
      expect(SymbolPath.parse('net/http.(*Server).Serve.func1').qualifiers).toEqual(['net', 'http']);
    });

    it('should parse an empty symbol to no qualifiers', () => {
      const symbol = SymbolPath.parse('');
      expect(symbol.isEmpty).toBe(true);
      expect(symbol.isStandardLibrary).toBe(false);
      expect(symbol.root).toBe('');
    });
  });

  describe('toString', () => {
    it('should join the qualifiers', () => {
      expect(SymbolPath.parse('github.com/felixge/httpsnoop.Wrap').toString()).toBe(
        'github.com/felixge/httpsnoop',
      );
    });
  });
});
