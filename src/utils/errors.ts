/**
 * Errors that abort a run. Each one names the offending path and carries a
 * short hint the CLI prints under the message.
 */
export class MediaSortError extends Error {
  constructor(
    readonly title: string,
    readonly detail: string,
    readonly hint: string,
    options?: { cause?: unknown }
  ) {
    super(`${title}: ${detail}`, options);
    this.name = new.target.name;
  }

  format(): string {
    return [
      `ERROR: ${this.title}`,
      '',
      `   ${this.detail}`,
      '',
      `   Hint: ${this.hint}`,
    ].join('\n');
  }
}

export class UnreadableFileError extends MediaSortError {
  constructor(readonly path: string, cause: unknown) {
    super(
      'Unreadable file',
      `Could not read "${path}": ${describeCause(cause)}`,
      'Check the file permissions or remove the file from the input directories. Nothing was copied.',
      { cause }
    );
  }
}

export class InvalidDirectoryError extends MediaSortError {
  constructor(readonly path: string, reason: 'missing' | 'not-a-directory') {
    super(
      reason === 'missing' ? 'Directory not found' : 'Not a directory',
      reason === 'missing'
        ? `The path "${path}" does not exist.`
        : `The path "${path}" exists but is not a directory.`,
      'Inputs must be directories. The output and the folders inside it must be directories or new paths.'
    );
  }
}

export class DestinationConflictError extends MediaSortError {
  constructor(readonly paths: string[]) {
    super(
      'Destination already exists',
      paths.length === 1
        ? `"${paths[0]}" already exists with different content.`
        : `${paths.length} destinations already exist with different content:\n${paths.map(p => `     - ${p}`).join('\n')}`,
      'Choose an empty output directory, or rerun with --on-conflict skip or --on-conflict overwrite.'
    );
  }
}

export class ConfigError extends MediaSortError {
  constructor(readonly path: string, detail: string, cause?: unknown) {
    super(
      'Invalid configuration',
      `${path}: ${detail}`,
      'Fix the file or delete it and run "mediasort init" to write the defaults.',
      { cause }
    );
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}
