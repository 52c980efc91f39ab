import {
  addClipToJobFile,
  AddedClip,
  ClipExtractor,
  createStreamCopyExtractor,
  Job,
  JobLogger,
  JobRunSummary,
  wallClockNow
} from '@vclip/engine';
import { loadPreferences, resolveConfig, ResolvedConfig, usage } from '@vclip/settings';

export interface VclipContext {
  loadPreferences: typeof loadPreferences;
  createExtractor: (logger: JobLogger) => ClipExtractor;
  logger: JobLogger;
  now: () => Date;
}

/* c8 ignore start */
export const createVclipContext = (logger: JobLogger = console): VclipContext => ({
  loadPreferences,
  createExtractor: extractorLogger => createStreamCopyExtractor({ logger: extractorLogger }),
  logger,
  now: () => wallClockNow()
});
/* c8 ignore end */

const SUBCOMMAND_HELP = [
  'Subcommands:',
  '  clip  append a clip ending now to the latest started video of the job file',
  '  help  show this message (default)',
  '  run   cut every clip of the job file that does not exist yet'
];

export const helpText = (): string => [usage().trimEnd(), '', ...SUBCOMMAND_HELP, ''].join('\n');

export const resolveConfigAction = async (
  args: readonly string[],
  ctx = createVclipContext()
): Promise<ResolvedConfig> => resolveConfig(args, await ctx.loadPreferences());

export const runJobAction = async (
  config: ResolvedConfig,
  ctx = createVclipContext()
): Promise<JobRunSummary> => {
  const job = await Job.fromYamlFile(config, config.jobPath);
  ctx.logger.info(`${config.jobPath}: ${job.videos.length} video(s), ${job.clipCount} clip(s)`);
  return job.run(config, {
    extractor: ctx.createExtractor(ctx.logger),
    logger: ctx.logger
  });
};

export const addClipAction = async (
  config: ResolvedConfig,
  ctx = createVclipContext()
): Promise<AddedClip> =>
  addClipToJobFile(config.jobPath, {
    now: ctx.now(),
    logger: ctx.logger
  });

export type ActionResult =
  | { subcommand: 'show-help'; text: string }
  | { subcommand: 'run-job'; summary: JobRunSummary }
  | { subcommand: 'add-clip'; clip: AddedClip };

export const dispatchAction = async (
  args: readonly string[],
  ctx = createVclipContext()
): Promise<ActionResult> => {
  const config = await resolveConfigAction(args, ctx);
  switch (config.subcommand) {
    case 'show-help':
      return { subcommand: 'show-help', text: helpText() };
    case 'run-job':
      return { subcommand: 'run-job', summary: await runJobAction(config, ctx) };
    case 'add-clip':
      return { subcommand: 'add-clip', clip: await addClipAction(config, ctx) };
  }
};
