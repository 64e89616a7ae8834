/**
 * Fatal conditions raised while turning a session file into Markdown.
 * The CLI reports `message` as a one-line diagnostic and exits non-zero.
 */

export class SessionExportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SessionExportError';
  }
}

/** A JSONL line that is not valid JSON. */
export class MalformedRecordError extends SessionExportError {
  constructor(
    public readonly lineNumber: number,
    public readonly reason: string,
  ) {
    super(`Invalid JSON on line ${lineNumber}: ${reason}`);
    this.name = 'MalformedRecordError';
  }
}

/** Branch export could not pick a leaf to walk back from. */
export class LeafNotFoundError extends SessionExportError {
  constructor(public readonly leafId?: string) {
    super(leafId ? `Leaf id not found: ${leafId}` : 'Could not resolve leaf id (is the input empty?)');
    this.name = 'LeafNotFoundError';
  }
}

export class InvalidModeError extends SessionExportError {
  constructor(public readonly mode: unknown) {
    super(`Invalid mode: ${String(mode)} (expected "all" or "branch")`);
    this.name = 'InvalidModeError';
  }
}

/** An explicit `--config` file that is missing or cannot be parsed. */
export class ConfigFileError extends SessionExportError {
  constructor(
    public readonly filePath: string,
    public readonly reason: string,
  ) {
    super(`Cannot load config ${filePath}: ${reason}`);
    this.name = 'ConfigFileError';
  }
}
