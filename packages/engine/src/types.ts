import type { ResolvedConfig } from '@vclip/settings';

import type { Duration } from './time';

/** Settings clip filenames are derived from. */
export type FilenameContext = Pick<ResolvedConfig, 'filenameReplace' | 'outputExt'>;

/** Settings source recording filenames are derived from. */
export type SourceContext = Pick<ResolvedConfig, 'filenameReplace' | 'videoExt' | 'videoFilenameFormat'>;

export type RunContext = FilenameContext & SourceContext;

export type JobLogger = Pick<Console, 'info' | 'warn' | 'error'>;

export interface ExtractionRequest {
  /** Absolute path of the source recording. */
  source: string;
  start: Duration;
  duration: Duration;
  destination: string;
}

/** Produces a clip by stream copy, without re-encoding. */
export interface ClipExtractor {
  extract(request: ExtractionRequest): Promise<void>;
}

export interface JobRuntime {
  extractor: ClipExtractor;
  logger?: JobLogger;
}

export interface JobRunSummary {
  extracted: string[];
  skipped: string[];
}
