import fs from 'node:fs/promises';

import {
  formatValue,
  parseYamlDocument,
  requireMapping,
  ResolvedConfig,
  UntypedMapping,
  ValidationError
} from '@vclip/settings';

import { MissingFileError } from './job-errors';
import type { JobRunSummary, JobRuntime, RunContext } from './types';
import { Video } from './video';

export interface JobInit {
  outputDir: string;
  videoDir: string;
  videos: readonly Video[];
}

const readDirectory = (mapping: UntypedMapping, key: string, fallback: string): string => {
  const value = mapping.get(key);
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'string' || value.length === 0) {
    throw new ValidationError(`'${key}' must be a non-empty string: ${formatValue(value)}`);
  }
  return value;
};

/** The full batch: every recording to cut and where clips go. */
export class Job {
  readonly videos: readonly Video[];

  private constructor(
    readonly outputDir: string,
    readonly videoDir: string,
    videos: readonly Video[]
  ) {
    this.videos = [...videos];
  }

  static create({ outputDir, videoDir, videos }: JobInit): Job {
    return new Job(outputDir, videoDir, videos);
  }

  /** Directories missing from the document fall back to the config. */
  static fromUntyped(config: Pick<ResolvedConfig, 'outputDir' | 'videoDir'>, data: unknown): Job {
    const mapping = requireMapping(data, 'job');

    const videos = mapping.get('videos');
    if (!Array.isArray(videos)) {
      throw new ValidationError(`invalid videos: ${formatValue(videos)}`);
    }

    return new Job(
      readDirectory(mapping, 'output-dir', config.outputDir),
      readDirectory(mapping, 'video-dir', config.videoDir),
      videos.map(video => Video.fromUntyped(video))
    );
  }

  static async fromYamlFile(
    config: Pick<ResolvedConfig, 'outputDir' | 'videoDir'>,
    filePath: string
  ): Promise<Job> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        throw new MissingFileError(filePath, `missing job file: ${filePath}`);
      }
      throw error;
    }
    return Job.fromUntyped(config, parseYamlDocument(raw, filePath));
  }

  get clipCount(): number {
    return this.videos.reduce((count, video) => count + video.clips.length, 0);
  }

  /** Runs every video in declared order and stops at the first failure. */
  async run(context: RunContext, runtime: JobRuntime): Promise<JobRunSummary> {
    const summary: JobRunSummary = { extracted: [], skipped: [] };
    for (const video of this.videos) {
      const result = await video.runClips(context, this.videoDir, this.outputDir, runtime);
      summary.extracted.push(...result.extracted);
      summary.skipped.push(...result.skipped);
    }
    return summary;
  }
}
