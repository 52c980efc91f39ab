#!/usr/bin/env tsx
import type { JobLogger } from '@vclip/engine';
import pc from 'picocolors';

import { createVclipContext, dispatchAction } from './actions';

const logger: JobLogger = {
  info: (message: string, ...rest: unknown[]) => console.log(pc.dim(message), ...rest),
  warn: (message: string, ...rest: unknown[]) => console.warn(pc.yellow(message), ...rest),
  error: (message: string, ...rest: unknown[]) => console.error(pc.red(message), ...rest)
};

const handleError = (error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(pc.red(`vclip error: ${message}`));
  process.exitCode = 1;
};

async function main(): Promise<void> {
  const result = await dispatchAction(process.argv.slice(2), createVclipContext(logger));
  switch (result.subcommand) {
    case 'show-help':
      console.log(result.text);
      break;
    case 'run-job': {
      const { extracted, skipped } = result.summary;
      console.log(pc.green(`${extracted.length} clip(s) written, ${skipped.length} already present.`));
      break;
    }
    case 'add-clip':
      console.log(pc.green(`Added '${result.clip.title}' (${result.clip.time}) to '${result.clip.videoTitle}'.`));
      break;
  }
}

main().catch(handleError);
