import { ResolvedTree } from '../../domain/tree';

export interface ITreeRepository {
  load(treePath: string): Promise<ResolvedTree>;
}
