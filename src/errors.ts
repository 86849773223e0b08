/**
 * Error taxonomy for the conversion pipeline.
 *
 * Parse and resolve errors are fatal and raised before any output is written.
 * Biography errors are recoverable and end up as warnings.
 */

export class GedcomError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GedcomError';
  }
}

export class MalformedLineError extends GedcomError {
  constructor(public readonly line: number, reason: string, public readonly text: string) {
    super(`Line ${line}: ${reason}: '${text}'`);
    this.name = 'MalformedLineError';
  }
}

export class StructuralError extends GedcomError {
  constructor(public readonly line: number, reason: string) {
    super(`Line ${line}: ${reason}`);
    this.name = 'StructuralError';
  }
}

export class DanglingReferenceError extends GedcomError {
  constructor(public readonly pointer: string, public readonly line: number, reason = 'does not resolve to any record') {
    super(`Line ${line}: pointer ${pointer} ${reason}`);
    this.name = 'DanglingReferenceError';
  }
}

export class AmbiguousBiographyMatchError extends GedcomError {
  constructor(public readonly individualId: string, public readonly candidates: string[]) {
    super(`Biography for ${individualId} is ambiguous: ${candidates.join(', ')}`);
    this.name = 'AmbiguousBiographyMatchError';
  }
}

export class BiographyReadError extends GedcomError {
  constructor(public readonly filePath: string, reason: string) {
    super(`Cannot read biography ${filePath}: ${reason}`);
    this.name = 'BiographyReadError';
  }
}

export class WriteError extends GedcomError {
  constructor(public readonly filePath: string, reason: string) {
    super(`Cannot write ${filePath}: ${reason}`);
    this.name = 'WriteError';
  }
}

export class ConfigError extends GedcomError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
