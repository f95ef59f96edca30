import { InvalidTreeError, TreeNotFoundError } from '../../domain/errors';
import { ResolvedTree } from '../../domain/tree';
import { IFileRepository } from '../../usecases/ports/IFileRepository';
import { ITreeRepository } from '../../usecases/ports/ITreeRepository';
import { parseResolvedTree } from './ResolvedTreeParser';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class JsonTreeRepository implements ITreeRepository {
  constructor(private readonly fileRepo: IFileRepository) {}

  async load(treePath: string): Promise<ResolvedTree> {
    let content: string;
    try {
      content = await this.fileRepo.readFile(treePath);
    } catch (error) {
      if (isMissingFile(error)) {
        throw new TreeNotFoundError(treePath);
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new InvalidTreeError(treePath, reason);
    }

    return parseResolvedTree(json, treePath);
  }
}
