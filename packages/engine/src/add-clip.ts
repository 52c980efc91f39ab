import fs from 'node:fs/promises';
import path from 'node:path';

import { ValidationError } from '@vclip/settings';
import { isMap, isSeq, parseDocument, YAMLSeq } from 'yaml';

import { Clip } from './clip';
import { Job } from './job';
import { Duration, durationBetween, formatDurationForClock, wallClockNow } from './time';
import type { JobLogger } from './types';

const DEFAULT_CLIP_LENGTH: Duration = 30;
const JOB_TEMPLATE = 'videos: []\n';

export interface AddClipOptions {
  /** Wall-clock instant the clip ends at; defaults to the local time. */
  now?: Date;
  length?: Duration;
  title?: string;
  logger?: JobLogger;
}

export interface AddedClip {
  videoTitle: string;
  time: string;
  title: string;
}

async function readJobText(filePath: string, logger?: JobLogger): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      logger?.info?.(`creating job file: ${filePath}`);
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, JOB_TEMPLATE, 'utf-8');
      return JOB_TEMPLATE;
    }
    throw error;
  }
}

/**
 * Appends a clip ending "now" to the latest video in the job file that
 * started before now. Comments and layout of the file are kept.
 */
export async function addClipToJobFile(filePath: string, options: AddClipOptions = {}): Promise<AddedClip> {
  const now = options.now ?? wallClockNow();
  const length = options.length ?? DEFAULT_CLIP_LENGTH;

  const doc = parseDocument(await readJobText(filePath, options.logger));
  if (doc.errors.length > 0) {
    throw new ValidationError(`invalid YAML in ${filePath}: ${doc.errors[0].message}`);
  }

  // Only directories fall back to the config, and they play no part here.
  const job = Job.fromUntyped({ outputDir: '.', videoDir: '.' }, doc.toJS({ mapAsMap: true }));

  let target = -1;
  job.videos.forEach((video, index) => {
    if (video.date.getTime() < now.getTime() && (target < 0 || video.date.getTime() > job.videos[target].date.getTime())) {
      target = index;
    }
  });
  if (target < 0) {
    throw new ValidationError(`no video in ${filePath} started before ${now.toISOString().slice(0, 19)}`);
  }

  const video = job.videos[target];
  const end = durationBetween(video.date, now);
  if (end < 1) {
    throw new ValidationError(`video '${video.title}' started less than a second before ${now.toISOString().slice(0, 19)}`);
  }
  const start = Math.max(0, end - length);
  const clip = Clip.create({
    start,
    end,
    title: options.title ?? `clip ${video.clips.length + 1}`
  });

  const videos = doc.get('videos');
  const videoNode = isSeq(videos) ? videos.items[target] : null;
  if (!isMap(videoNode)) {
    throw new ValidationError(`invalid video entry at index ${target} in ${filePath}`);
  }

  const existing = videoNode.get('clips');
  const clips = isSeq(existing) ? existing : new YAMLSeq(doc.schema);
  if (clips !== existing) {
    videoNode.set('clips', clips);
  }

  const added: AddedClip = {
    videoTitle: video.title,
    time: `${formatDurationForClock(clip.start)} - ${formatDurationForClock(clip.end)}`,
    title: clip.title
  };
  clips.flow = false;
  clips.add(doc.createNode({ time: added.time, title: added.title }));

  await fs.writeFile(filePath, doc.toString(), 'utf-8');
  return added;
}
