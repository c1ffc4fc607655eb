import { OperationContext } from './OperationContext';

export interface IStandardLibraryRootProvider {
  /** Absolute directory holding the toolchain's bundled library sources. */
  root(ctx?: OperationContext): Promise<string>;
}
