/* c8 ignore file */
export { Clip } from './clip';
export type { ClipInit } from './clip';
export { Video } from './video';
export type { VideoInit } from './video';
export { Job } from './job';
export type { JobInit } from './job';
export { addClipToJobFile } from './add-clip';
export type { AddClipOptions, AddedClip } from './add-clip';
export {
  ExecutionFailureError,
  isExecutionFailureError,
  isMissingFileError,
  isParseError,
  MissingFileError,
  ParseError
} from './job-errors';
export {
  addDuration,
  durationBetween,
  formatDurationForClock,
  formatDurationForPath,
  formatTimestamp,
  parseDuration,
  parseTimestamp,
  wallClockNow
} from './time';
export type { Duration } from './time';
export { buildStreamCopyArgs, createStreamCopyExtractor, getFFmpegPath } from './ffmpeg/stream-copy';
export type { StreamCopyOptions } from './ffmpeg/stream-copy';
export type {
  ClipExtractor,
  ExtractionRequest,
  FilenameContext,
  JobLogger,
  JobRunSummary,
  JobRuntime,
  RunContext,
  SourceContext
} from './types';
