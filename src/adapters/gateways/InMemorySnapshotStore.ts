import { DocumentSnapshot } from '../../domain/entities';
import { ISnapshotStore } from '../../usecases/ports/ISnapshotStore';

export class InMemorySnapshotStore implements ISnapshotStore {
  private readonly snapshots = new Map<string, DocumentSnapshot>();

  get(uri: string): DocumentSnapshot | undefined {
    return this.snapshots.get(uri);
  }

  set(uri: string, snapshot: DocumentSnapshot): void {
    this.snapshots.set(uri, snapshot);
  }

  delete(uri: string): boolean {
    return this.snapshots.delete(uri);
  }
}
