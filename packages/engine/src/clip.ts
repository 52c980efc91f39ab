import { formatValue, readText, requireMapping, ValidationError } from '@vclip/settings';

import { isParseError } from './job-errors';
import { addDuration, Duration, formatDurationForPath, formatTimestamp, parseDuration } from './time';
import type { FilenameContext } from './types';

const FORBIDDEN_FILENAME_CHARACTERS = /["*/:?\\|<>]/g;
const SEGMENT_SEPARATOR = ' - ';
const DATE_FORMAT = '%Y-%m-%d %H:%M:%S';

// Dotless i has no lower-case partner of its own; upper-casing it would merge it with `i`.
const FOLD_INVARIANT = new Set(['\u0131']);

/**
 * Full case folding: each code point is upper-cased then lower-cased on its
 * own, so `ß` becomes `ss` and a final `ς` folds to `σ` like any other sigma.
 */
export const caseFold = (text: string): string =>
  Array.from(text, (char) => (FOLD_INVARIANT.has(char) ? char : char.toUpperCase().toLowerCase())).join('');

export interface ClipInit {
  start: Duration;
  end: Duration;
  title: string;
}

/** One requested extraction, timed relative to the start of its recording. */
export class Clip {
  private constructor(
    readonly start: Duration,
    readonly end: Duration,
    readonly title: string
  ) {}

  static create({ start, end, title }: ClipInit): Clip {
    return Clip.validated({ start, end, title });
  }

  /** `source` is the decoded entry quoted in errors, when there is one. */
  private static validated({ start, end, title }: ClipInit, source?: string): Clip {
    if (end <= start) {
      throw new ValidationError(`bad clip start/end: ${source ?? `${start}s - ${end}s`}`);
    }
    if (!title.trim()) {
      throw new ValidationError(`bad clip title: ${source ?? formatValue(title)}`);
    }
    return new Clip(start, end, title);
  }

  /** Decodes a `{ time: "<start> - <end>", title }` document entry. */
  static fromUntyped(data: unknown): Clip {
    const mapping = requireMapping(data, 'clips entry');
    const time = readText(mapping, 'time');
    const title = readText(mapping, 'title');
    if (time === undefined || title === undefined) {
      throw new ValidationError(`bad clip data: 'time' and 'title' are required: ${formatValue(data)}`);
    }

    const separator = time.indexOf('-');
    if (separator < 0) {
      throw new ValidationError(`bad clip time, expected '<start> - <end>': ${formatValue(data)}`);
    }

    const parseBound = (text: string): Duration => {
      try {
        return parseDuration(text);
      } catch (error) {
        if (isParseError(error)) {
          throw new ValidationError(`bad clip data: ${error.message}: ${formatValue(data)}`);
        }
        throw error;
      }
    };

    const start = parseBound(time.slice(0, separator));
    const end = parseBound(time.slice(separator + 1));
    return Clip.validated({ start, end, title }, formatValue(data));
  }

  get duration(): Duration {
    return this.end - this.start;
  }

  /**
   * Builds `<date+epoch> - T+<start-epoch> - <video title> - <clip title>`,
   * case-folded, with forbidden characters turned into `-` before the user
   * replacements run. The extension is appended last.
   */
  destinationFilename(
    context: FilenameContext,
    videoDate: Date,
    videoEpoch: Duration,
    videoTitle: string
  ): string {
    const name = [
      formatTimestamp(addDuration(videoDate, videoEpoch), DATE_FORMAT),
      `T+${formatDurationForPath(this.start - videoEpoch)}`,
      videoTitle,
      this.title
    ].join(SEGMENT_SEPARATOR);

    const sanitized = caseFold(name).replace(FORBIDDEN_FILENAME_CHARACTERS, '-');
    return `${context.filenameReplace.apply(sanitized)}.${context.outputExt}`;
  }
}
