export class SourceUnreachableError extends Error {
  readonly source: string;
  readonly url: string;
  readonly status?: number;

  constructor(source: string, url: string, detail: string, status?: number) {
    super(`${source}: ${detail} (${url})`);
    this.name = 'SourceUnreachableError';
    this.source = source;
    this.url = url;
    this.status = status;
  }
}

/** One unusable source row. Caught and counted by the row runners; never fatal. */
export class MalformedRowError extends Error {
  readonly reason: string;

  constructor(reason: string, detail?: string) {
    super(detail ? `${reason}: ${detail}` : reason);
    this.name = 'MalformedRowError';
    this.reason = reason;
  }
}

export class ArtifactError extends Error {
  readonly file: string;

  constructor(file: string, detail: string) {
    super(`${file}: ${detail}`);
    this.name = 'ArtifactError';
    this.file = file;
  }
}

export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function countReason(reasons: Record<string, number>, reason: string, n = 1): void {
  reasons[reason] = (reasons[reason] ?? 0) + n;
}
