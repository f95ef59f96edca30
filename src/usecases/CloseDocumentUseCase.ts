import { DocumentNotOpenError } from '../domain/errors';
import { DocumentQueue } from './DocumentQueue';
import { ISnapshotStore } from './ports/ISnapshotStore';

export class CloseDocumentUseCase {
  constructor(
    private readonly snapshots: ISnapshotStore,
    private readonly queue: DocumentQueue,
  ) {}

  /** Forgets a document once the highlights already queued for it are done. */
  async execute(uri: string): Promise<void> {
    await this.queue.run(uri, async () => {
      if (!this.snapshots.delete(uri)) {
        throw new DocumentNotOpenError(uri);
      }
    });
  }
}
