import { DocumentSnapshot } from '../../domain/entities';

// Owned by a single writer per document; see HighlightDocumentUseCase.
export interface ISnapshotStore {
  get(uri: string): DocumentSnapshot | undefined;
  set(uri: string, snapshot: DocumentSnapshot): void;
  delete(uri: string): boolean;
}
