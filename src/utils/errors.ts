/**
 * Failures the prep run reports before exiting.
 * Write-phase fs errors are not wrapped; they propagate as thrown by fs.
 */

export class PrepError extends Error {
  readonly exitCode: number = 1;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class UsageError extends PrepError {}

export class InputNotFoundError extends PrepError {
  constructor(readonly inputPath: string) {
    super(`Input file not found: ${inputPath}`);
  }
}

export class EmptyInputError extends PrepError {
  constructor(readonly source: string) {
    super(`Input file appears to be empty: ${source}`);
  }
}

function formatNames(names: readonly string[]): string {
  return `[${names.map((name) => JSON.stringify(name)).join(', ')}]`;
}

export class MissingColumnsError extends PrepError {
  constructor(
    readonly missing: readonly string[],
    readonly found: readonly string[],
  ) {
    super(
      "GBIF file must contain columns named 'species', 'genus', and 'kingdom' (case-insensitive).\n" +
        `  Missing: ${formatNames(missing)}\n` +
        `  Found: ${formatNames(found)}`,
    );
  }
}
