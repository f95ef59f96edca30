import * as path from 'path';
import { InvalidTreeError, TreeNotFoundError } from '../../domain/errors';
import { IFileRepository } from '../../usecases/ports/IFileRepository';
import { FsRepository } from './FsRepository';
import { JsonTreeRepository } from './JsonTreeRepository';

describe('JsonTreeRepository', () => {
  let fileRepo: jest.Mocked<IFileRepository>;
  let repository: JsonTreeRepository;

  beforeEach(() => {
    fileRepo = { readFile: jest.fn() };
    repository = new JsonTreeRepository(fileRepo);
  });

  it('should parse the tree file', async () => {
    fileRepo.readFile.mockResolvedValue(JSON.stringify({ mainFile: 'a.cpp', text: 'int x;', nodes: [] }));

    const tree = await repository.load('a.tree.json');

    expect(fileRepo.readFile).toHaveBeenCalledWith('a.tree.json');
    expect(tree.mainFile).toBe('a.cpp');
    expect(tree.nodes).toEqual([]);
  });

  it('should map a missing file to TreeNotFoundError', async () => {
    fileRepo.readFile.mockRejectedValue(Object.assign(new Error('no such file'), { code: 'ENOENT' }));

    await expect(repository.load('missing.json')).rejects.toThrow(TreeNotFoundError);
  });

  it('should pass other read errors through', async () => {
    const error = Object.assign(new Error('permission denied'), { code: 'EACCES' });
    fileRepo.readFile.mockRejectedValue(error);

    await expect(repository.load('locked.json')).rejects.toBe(error);
  });

  it('should map malformed JSON to InvalidTreeError', async () => {
    fileRepo.readFile.mockResolvedValue('{ "mainFile": ');

    await expect(repository.load('broken.json')).rejects.toThrow(InvalidTreeError);
  });

  it('should load a tree from disk', async () => {
    const fromDisk = new JsonTreeRepository(new FsRepository(path.join(__dirname, '../../__fixtures__')));

    const tree = await fromDisk.load('class-use.tree.json');

    expect(tree.mainFile).toBe('widget.cpp');
    expect(tree.nodes.map((node) => node.shape)).toEqual(['declaration', 'declaration']);
  });

  it('should report a missing file on disk as not found', async () => {
    const fromDisk = new JsonTreeRepository(new FsRepository(path.join(__dirname, '../../__fixtures__')));

    await expect(fromDisk.load('absent.tree.json')).rejects.toThrow('Resolved tree not found: absent.tree.json');
  });
});
