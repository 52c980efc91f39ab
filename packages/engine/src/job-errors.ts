import { ValidationError } from '@vclip/settings';

export class ParseError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'ParseError';
  }
}

export const isParseError = (error: unknown): error is ParseError => error instanceof ParseError;

export class MissingFileError extends Error {
  constructor(public readonly path: string, message = `missing video file: ${path}`) {
    super(message);
    this.name = 'MissingFileError';
  }
}

export const isMissingFileError = (error: unknown): error is MissingFileError =>
  error instanceof MissingFileError;

export class ExecutionFailureError extends Error {
  constructor(
    public readonly command: readonly string[],
    public readonly exitCode: number | null,
    message = `command failed with exit code ${exitCode ?? 'unknown'}: ${command.join(' ')}`
  ) {
    super(message);
    this.name = 'ExecutionFailureError';
  }
}

export const isExecutionFailureError = (error: unknown): error is ExecutionFailureError =>
  error instanceof ExecutionFailureError;
