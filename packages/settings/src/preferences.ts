import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { ValidationError } from './errors';
import { ReplacementMap } from './replace';
import { formatValue, parseYamlDocument, requireMapping, UntypedMapping } from './untyped';

const PREFERENCES_DIRECTORY_NAME = '.vclip';
const PREFERENCES_FILE_NAME = 'prefs.yaml';

/** User preferences choosing the default behavior of every run. */
export interface Preferences {
  /** String replacement map for source and clip filenames. */
  readonly filenameReplace: ReplacementMap;
  /** Path to the job file. */
  readonly jobPath: string;
  /** Directory clips are written to. */
  readonly outputDir: string;
  readonly outputExt: string;
  /** Directory source recordings are read from. */
  readonly videoDir: string;
  readonly videoExt: string;
  /** strftime format a recording's start time is named with. */
  readonly videoFilenameFormat: string;
}

export const PREFERENCE_KEYS = {
  filenameReplace: 'filename-replace',
  jobPath: 'job-path',
  outputDir: 'output-dir',
  outputExt: 'output-ext',
  videoDir: 'video-dir',
  videoExt: 'video-ext',
  videoFilenameFormat: 'video-filename-format'
} as const satisfies Record<keyof Preferences, string>;

type TextPreference = Exclude<keyof Preferences, 'filenameReplace'>;

export const defaultPreferences = (): Preferences => ({
  filenameReplace: new ReplacementMap(),
  jobPath: 'clip.yaml',
  outputDir: '.',
  outputExt: 'mkv',
  videoDir: '.',
  videoExt: 'mkv',
  videoFilenameFormat: '%Y-%m-%d %H-%M-%S'
});

export const getPreferencesFilePath = (): string =>
  process.env.VCLIP_PREFS_FILE ??
  path.join(os.homedir(), PREFERENCES_DIRECTORY_NAME, PREFERENCES_FILE_NAME);

const readTextPreference = (mapping: UntypedMapping, key: string): string | undefined => {
  const value = mapping.get(key);
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string' || value.length === 0) {
    throw new ValidationError(`preference '${key}' must be a non-empty string: ${formatValue(value)}`);
  }
  return value;
};

export function preferencesFromUntyped(data: unknown): Preferences {
  const mapping = requireMapping(data, 'preferences');

  const knownKeys = new Set<unknown>(Object.values(PREFERENCE_KEYS));
  const unknownKeys = [...mapping.keys()].filter(key => !knownKeys.has(key));
  if (unknownKeys.length > 0) {
    throw new ValidationError(`unknown preferences: ${unknownKeys.map(key => formatValue(key)).join(', ')}`);
  }

  const defaults = defaultPreferences();
  const read = (field: TextPreference): string =>
    readTextPreference(mapping, PREFERENCE_KEYS[field]) ?? defaults[field];

  const rawReplace = mapping.get(PREFERENCE_KEYS.filenameReplace);
  return {
    filenameReplace:
      rawReplace === undefined ? defaults.filenameReplace : ReplacementMap.fromUntyped(rawReplace),
    jobPath: read('jobPath'),
    outputDir: read('outputDir'),
    outputExt: read('outputExt'),
    videoDir: read('videoDir'),
    videoExt: read('videoExt'),
    videoFilenameFormat: read('videoFilenameFormat')
  };
}

async function readPreferencesFile(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/** Loads preferences, falling back to the defaults when no file exists. */
export async function loadPreferences(filePath = getPreferencesFilePath()): Promise<Preferences> {
  const raw = await readPreferencesFile(filePath);
  if (raw === null) {
    return defaultPreferences();
  }

  const data = parseYamlDocument(raw, filePath);
  if (data === null || data === undefined) {
    return defaultPreferences();
  }
  return preferencesFromUntyped(data);
}
