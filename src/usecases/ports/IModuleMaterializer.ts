import { ModuleSnapshot } from '../../domain/entities';
import { OperationContext } from './OperationContext';

export interface IModuleMaterializer {
  materialize(repository: string, revision: string, ctx?: OperationContext): Promise<ModuleSnapshot>;
}
