import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import type { ClipExtractor, ExtractionRequest } from '@vclip/engine';
import { defaultPreferences, Preferences, ValidationError } from '@vclip/settings';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { dispatchAction, helpText, resolveConfigAction } from './actions';

class RecordingExtractor implements ClipExtractor {
  readonly requests: ExtractionRequest[] = [];

  async extract(request: ExtractionRequest): Promise<void> {
    this.requests.push(request);
    await fs.writeFile(request.destination, 'clip');
  }
}

const createContext = (prefs: Preferences) => {
  const extractor = new RecordingExtractor();
  const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const loadPreferences = vi.fn(async () => prefs);
  const createExtractor = vi.fn(() => extractor);
  const now = vi.fn(() => new Date('2020-01-01T00:10:00.000Z'));

  return {
    ctx: { loadPreferences, createExtractor, logger, now },
    extractor,
    logger,
    loadPreferences
  };
};

describe('vclip actions', () => {
  let root: string;
  let prefs: Preferences;
  let context: ReturnType<typeof createContext>;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'vclip-cli-test-'));
    await fs.mkdir(path.join(root, 'captures'));
    await fs.mkdir(path.join(root, 'clips'));
    prefs = {
      ...defaultPreferences(),
      jobPath: path.join(root, 'clip.yaml'),
      videoDir: path.join(root, 'captures'),
      outputDir: path.join(root, 'clips'),
      outputExt: 'mp4',
      videoExt: 'mp4'
    };
    context = createContext(prefs);
    await fs.writeFile(
      prefs.jobPath,
      [
        'videos:',
        '  - date: "2020-01-01T00:00:00"',
        '    title: "Video 1"',
        '    clips:',
        '      - time: "0:00 - 5:00"',
        '        title: "Intro"',
        ''
      ].join('\n'),
      'utf-8'
    );
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('shows help without a subcommand', async () => {
    const result = await dispatchAction([], context.ctx);

    expect(result).toEqual({ subcommand: 'show-help', text: helpText() });
    expect(helpText()).toContain('Subcommands:');
    expect(helpText()).toContain('-i, --video-dir <path>');
  });

  it('layers command-line flags over the loaded preferences', async () => {
    const config = await resolveConfigAction(['--output-ext', 'mkv'], context.ctx);

    expect(context.loadPreferences).toHaveBeenCalledTimes(1);
    expect(config.outputExt).toBe('mkv');
    expect(config.videoExt).toBe('mp4');
  });

  it('runs the job file named by the preferences', async () => {
    await fs.writeFile(path.join(root, 'captures', '2020-01-01 00-00-00.mp4'), 'video');

    const result = await dispatchAction(['run'], context.ctx);
    const destination = path.join(root, 'clips', '2020-01-01 00-00-00 - t+0-00-00 - video 1 - intro.mp4');

    expect(result).toEqual({ subcommand: 'run-job', summary: { extracted: [destination], skipped: [] } });
    expect(context.extractor.requests).toEqual([
      {
        source: path.join(root, 'captures', '2020-01-01 00-00-00.mp4'),
        start: 0,
        duration: 300,
        destination
      }
    ]);
    expect(context.logger.info).toHaveBeenCalledWith(`${prefs.jobPath}: 1 video(s), 1 clip(s)`);
  });

  it('appends a clip to the job file', async () => {
    const result = await dispatchAction(['clip'], context.ctx);

    expect(result).toEqual({
      subcommand: 'add-clip',
      clip: { videoTitle: 'Video 1', time: '0:09:30 - 0:10:00', title: 'clip 2' }
    });
  });

  it('rejects invalid arguments before touching any file', async () => {
    await expect(dispatchAction(['render'], context.ctx)).rejects.toBeInstanceOf(ValidationError);
    expect(context.extractor.requests).toEqual([]);
  });
});
