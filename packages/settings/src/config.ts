import { Command, CommanderError } from 'commander';

import { ValidationError } from './errors';
import { defaultPreferences, Preferences } from './preferences';
import { ReplacementMap } from './replace';

export type Subcommand = 'add-clip' | 'show-help' | 'run-job';

const SUBCOMMAND_TOKENS: Record<string, Subcommand> = {
  clip: 'add-clip',
  help: 'show-help',
  run: 'run-job'
};

/** Settings for a single invocation: preferences overridden by the command line. */
export interface ResolvedConfig extends Preferences {
  readonly subcommand: Subcommand;
}

type ArgvOptions = {
  help?: boolean;
  videoDir?: string;
  jobPath?: string;
  outputDir?: string;
  filenameReplace: string[];
  outputExt?: string;
  videoExt?: string;
  videoFilenameFormat?: string;
};

const collect = (value: string, previous: string[]): string[] => [...previous, value];

const createArgvParser = (): Command =>
  new Command()
    .name('vclip')
    .helpOption(false)
    .exitOverride()
    .configureOutput({
      writeOut: () => undefined,
      writeErr: () => undefined
    })
    .allowExcessArguments()
    .argument('[subcommand]', 'clip | help | run')
    .option('-h, --help', 'Show usage and exit')
    .option('-i, --video-dir <path>', 'Directory holding the source recordings')
    .option('-j, --job-path <path>', 'Path to the job file')
    .option('-o, --output-dir <path>', 'Directory clips are written to')
    .option(
      '-r, --filename-replace <mapping>',
      'Add a key=value filename replacement, or reset them with an empty value',
      collect,
      []
    )
    .option('--output-ext <ext>', 'Clip file extension')
    .option('--video-ext <ext>', 'Source recording file extension')
    .option('--video-filename-format <fmt>', 'strftime format of source recording names');

export const defaultConfig = (prefs: Preferences = defaultPreferences()): ResolvedConfig => ({
  ...prefs,
  filenameReplace: prefs.filenameReplace.copy(),
  subcommand: 'show-help'
});

const parseSubcommand = (token: string): Subcommand => {
  const subcommand = SUBCOMMAND_TOKENS[token.toLowerCase()];
  if (!subcommand) {
    throw new ValidationError(`invalid subcommand: ${token}`);
  }
  return subcommand;
};

/**
 * Applies one `--filename-replace` argument. `key=value` adds a rule,
 * `==value` adds a rule for a literal `=`, and an empty argument restores
 * the preferences map.
 */
export const applyReplaceArgument = (
  current: ReplacementMap,
  optarg: string,
  prefs: Preferences
): ReplacementMap => {
  if (!optarg) {
    return prefs.filenameReplace.copy();
  }
  if (optarg.startsWith('==')) {
    return current.with('=', optarg.slice(2));
  }

  const separator = optarg.indexOf('=');
  if (separator <= 0) {
    throw new ValidationError(`invalid replacement: ${optarg}`);
  }
  return current.with(optarg.slice(0, separator), optarg.slice(separator + 1));
};

const requireValue = (value: string | undefined, fallback: string, message: string): string => {
  if (value === undefined) {
    return fallback;
  }
  if (!value) {
    throw new ValidationError(message);
  }
  return value;
};

const parseArgv = (args: readonly string[]): { options: ArgvOptions; operands: string[] } => {
  const parser = createArgvParser();
  try {
    parser.parse([...args], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      throw new ValidationError(error.message.replace(/^error: /, ''));
    }
    throw error;
  }
  return { options: parser.opts<ArgvOptions>(), operands: parser.args };
};

/**
 * Resolves the configuration for one run from the program arguments
 * (without the node and script entries). Flags win over preferences, which
 * win over the built-in defaults.
 */
export function resolveConfig(args: readonly string[], prefs: Preferences = defaultPreferences()): ResolvedConfig {
  const base = defaultConfig(prefs);
  const { options, operands } = parseArgv(args);

  let subcommand = operands.length > 0 ? parseSubcommand(operands[0]) : base.subcommand;
  if (options.help) {
    subcommand = 'show-help';
  }

  let filenameReplace = base.filenameReplace;
  for (const optarg of options.filenameReplace) {
    filenameReplace = applyReplaceArgument(filenameReplace, optarg, prefs);
  }

  return {
    subcommand,
    filenameReplace,
    jobPath: requireValue(options.jobPath, base.jobPath, 'job path cannot be empty'),
    outputDir: requireValue(options.outputDir, base.outputDir, 'output clip directory cannot be empty'),
    outputExt: requireValue(options.outputExt, base.outputExt, 'output extension cannot be empty'),
    videoDir: requireValue(options.videoDir, base.videoDir, 'video directory path cannot be empty'),
    videoExt: requireValue(options.videoExt, base.videoExt, 'video extension cannot be empty'),
    videoFilenameFormat: requireValue(
      options.videoFilenameFormat,
      base.videoFilenameFormat,
      'video filename format cannot be empty'
    )
  };
}

export const usage = (): string => createArgvParser().helpInformation();
