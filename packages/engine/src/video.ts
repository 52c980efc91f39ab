import path from 'node:path';

import { formatValue, readText, requireMapping, ValidationError } from '@vclip/settings';

import { Clip } from './clip';
import { isRegularFile, pathExists } from './files';
import { isParseError, MissingFileError } from './job-errors';
import { Duration, formatDurationForPath, formatTimestamp, parseDuration, parseTimestamp } from './time';
import type { JobRunSummary, JobRuntime, RunContext, SourceContext } from './types';

export interface VideoInit {
  date: Date;
  title: string;
  clips?: readonly Clip[];
  epoch?: Duration;
}

const decodeField = <T>(data: unknown, field: string, decode: () => T): T => {
  try {
    return decode();
  } catch (error) {
    if (isParseError(error)) {
      throw new ValidationError(`bad video ${field}: ${error.message}: ${formatValue(data)}`);
    }
    throw error;
  }
};

/** One source recording and the clips to cut from it. */
export class Video {
  readonly clips: readonly Clip[];

  private constructor(
    private readonly startedAt: Date,
    readonly title: string,
    clips: readonly Clip[],
    readonly epoch: Duration
  ) {
    this.clips = [...clips];
  }

  static create({ date, title, clips = [], epoch = 0 }: VideoInit): Video {
    return new Video(new Date(date.getTime()), title, clips, epoch);
  }

  static fromUntyped(data: unknown): Video {
    const mapping = requireMapping(data, 'video entry');

    const rawClips = mapping.has('clips') ? mapping.get('clips') : [];
    if (!Array.isArray(rawClips)) {
      throw new ValidationError(`invalid clips: ${formatValue(rawClips)}`);
    }

    const date = readText(mapping, 'date');
    const title = readText(mapping, 'title');
    if (date === undefined || title === undefined) {
      throw new ValidationError(`bad video data: 'date' and 'title' are required: ${formatValue(data)}`);
    }

    return new Video(
      decodeField(data, 'date', () => parseTimestamp(date)),
      title,
      rawClips.map(clip => Clip.fromUntyped(clip)),
      decodeField(data, 'epoch', () => parseDuration(readText(mapping, 'epoch') ?? '0'))
    );
  }

  /** Recording start, wall-clock. */
  get date(): Date {
    return new Date(this.startedAt.getTime());
  }

  /**
   * The replacement map rewrites the format string rather than the formatted
   * name, so locale-specific tokens can be swapped per user.
   */
  sourceFilename(context: SourceContext): string {
    const format = context.filenameReplace.apply(context.videoFilenameFormat);
    return `${formatTimestamp(this.startedAt, format)}.${context.videoExt}`;
  }

  async sourcePath(context: SourceContext, sourceDir: string): Promise<string> {
    const source = path.resolve(sourceDir, this.sourceFilename(context));
    if (!(await isRegularFile(source))) {
      throw new MissingFileError(source);
    }
    return source;
  }

  destinationPath(clip: Clip, context: RunContext, destDir: string): string {
    return path.resolve(destDir, clip.destinationFilename(context, this.startedAt, this.epoch, this.title));
  }

  /** Extracts every clip in declared order, skipping clips already on disk. */
  async runClips(
    context: RunContext,
    sourceDir: string,
    destDir: string,
    runtime: JobRuntime
  ): Promise<JobRunSummary> {
    const summary: JobRunSummary = { extracted: [], skipped: [] };
    const source = await this.sourcePath(context, sourceDir);
    for (const clip of this.clips) {
      const destination = this.destinationPath(clip, context, destDir);
      if (await pathExists(destination)) {
        runtime.logger?.info?.(`skip (exists): ${destination}`);
        summary.skipped.push(destination);
        continue;
      }

      runtime.logger?.info?.(
        `extract: ${path.basename(source)} T+${formatDurationForPath(clip.start)} -> ${destination}`
      );
      await runtime.extractor.extract({
        source,
        start: clip.start,
        duration: clip.duration,
        destination
      });
      summary.extracted.push(destination);
    }
    return summary;
  }
}
