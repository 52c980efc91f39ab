import { execa, ExecaError } from 'execa';

import { ExecutionFailureError } from '../job-errors';
import type { ClipExtractor, ExtractionRequest, JobLogger } from '../types';

export interface StreamCopyOptions {
  ffmpegPath?: string | null;
  logger?: JobLogger;
}

export const getFFmpegPath = (): string => process.env.VCLIP_FFMPEG_PATH ?? 'ffmpeg';

/** Arguments cutting one clip with both audio and video copied as-is. */
export const buildStreamCopyArgs = (request: ExtractionRequest): string[] => [
  '-ss',
  String(request.start),
  '-i',
  request.source,
  '-c:a',
  'copy',
  '-c:v',
  'copy',
  '-map',
  '0:v',
  '-map',
  '0:a',
  '-t',
  String(request.duration),
  request.destination
];

export const createStreamCopyExtractor = (options: StreamCopyOptions = {}): ClipExtractor => {
  const ffmpegPath = options.ffmpegPath ?? getFFmpegPath();

  return {
    async extract(request: ExtractionRequest): Promise<void> {
      const args = buildStreamCopyArgs(request);
      try {
        await execa(ffmpegPath, args, {
          stdin: 'ignore',
          stdout: 'inherit',
          stderr: 'inherit'
        });
      } catch (error) {
        if (error instanceof ExecaError) {
          options.logger?.error?.(`ffmpeg failed for ${request.destination}`, error.shortMessage);
          throw new ExecutionFailureError([ffmpegPath, ...args], error.exitCode ?? null);
        }
        throw error;
      }
    }
  };
};
