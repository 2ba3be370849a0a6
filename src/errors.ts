export class InvalidSnapshotError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(message);
    this.name = "InvalidSnapshotError";
  }
}

export class ScrapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ScrapeError";
  }
}

export class TimeoutError extends Error {
  constructor(
    readonly operation: string,
    readonly ms: number
  ) {
    super(`${operation} timed out after ${ms}ms`);
    this.name = "TimeoutError";
  }
}

export class UnknownClassError extends Error {
  constructor(readonly classKey: string) {
    super(`No state recorded for ${classKey}; check the class before subscribing`);
    this.name = "UnknownClassError";
  }
}
