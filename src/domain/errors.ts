export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class InvalidTreeError extends DomainError {
  constructor(
    public readonly path: string,
    public readonly reason: string,
  ) {
    super(`Invalid resolved tree ${path}: ${reason}`);
  }
}

export class TreeNotFoundError extends DomainError {
  constructor(public readonly path: string) {
    super(`Resolved tree not found: ${path}`);
  }
}

export class DocumentNotOpenError extends DomainError {
  constructor(public readonly uri: string) {
    super(`Document not open: ${uri}`);
  }
}

export class StaleVersionError extends DomainError {
  constructor(
    public readonly uri: string,
    public readonly version: number,
    public readonly currentVersion: number,
  ) {
    super(`Stale version ${version} for ${uri}, current version is ${currentVersion}`);
  }
}
