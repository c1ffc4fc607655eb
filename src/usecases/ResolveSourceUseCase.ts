import { SourceLocation } from '../domain/entities';
import { PathSpecResolver } from '../domain/PathSpecResolver';

export class ResolveSourceUseCase {
  constructor(private readonly resolver: PathSpecResolver) {}

  execute(symbol: string | undefined, path: string): SourceLocation {
    return this.resolver.resolve(symbol ?? '', path);
  }
}
