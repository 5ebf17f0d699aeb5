export class CorpusCountError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Bad or contradictory options, raised before any input is read.
export class ConfigurationError extends CorpusCountError {
  readonly option?: string;

  constructor(message: string, option?: string) {
    super(message);
    this.option = option;
  }
}

export class IoError extends CorpusCountError {
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(`${message}: ${path}${describeCause(cause)}`, { cause });
    this.path = path;
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error && cause.message) return ` (${cause.message})`;
  return "";
}

export function exitCodeFor(err: unknown): number {
  if (err instanceof ConfigurationError) return 2;
  return 1;
}
