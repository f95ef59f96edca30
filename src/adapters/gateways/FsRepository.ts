import * as fs from 'fs/promises';
import * as path from 'path';
import { IFileRepository } from '../../usecases/ports/IFileRepository';

export class FsRepository implements IFileRepository {
  // Relative tree paths are resolved against the directory the daemon runs in.
  constructor(private readonly rootDir: string = process.cwd()) {}

  async readFile(filePath: string): Promise<string> {
    return fs.readFile(path.resolve(this.rootDir, filePath), 'utf-8');
  }
}
