import { ValidationError } from '@vclip/settings';
import { describe, expect, it } from 'vitest';

import {
  ExecutionFailureError,
  isExecutionFailureError,
  isMissingFileError,
  isParseError,
  MissingFileError,
  ParseError
} from './job-errors';

describe('job error helpers', () => {
  it('treats parse errors as validation errors', () => {
    const error = new ParseError('bad duration');
    expect(error).toBeInstanceOf(ValidationError);
    expect(isParseError(error)).toBe(true);
    expect(isParseError(new ValidationError('nope'))).toBe(false);
  });

  it('reports the missing path', () => {
    const error = new MissingFileError('/videos/a.mkv');
    expect(error.path).toBe('/videos/a.mkv');
    expect(error.message).toBe('missing video file: /videos/a.mkv');
    expect(isMissingFileError(error)).toBe(true);
    expect(isMissingFileError(new Error('nope'))).toBe(false);
  });

  it('reports the failed command and exit code', () => {
    const error = new ExecutionFailureError(['ffmpeg', '-i', 'a.mkv'], 1);
    expect(error.exitCode).toBe(1);
    expect(error.message).toBe('command failed with exit code 1: ffmpeg -i a.mkv');
    expect(isExecutionFailureError(error)).toBe(true);
    expect(isExecutionFailureError(new Error('nope'))).toBe(false);
  });

  it('reports an unknown exit code', () => {
    expect(new ExecutionFailureError(['ffmpeg'], null).message).toBe(
      'command failed with exit code unknown: ffmpeg'
    );
  });
});
