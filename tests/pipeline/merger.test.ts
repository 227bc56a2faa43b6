import * as fs from 'fs';
import * as path from 'path';
import { runFfmpeg } from '../../src/media/ffmpeg.js';
import {
  buildMergeArgs,
  isWithinTarget,
  manifestLine,
  mergeReel,
  reelVideoFilter,
} from '../../src/pipeline/merger.js';
import { failed, makeTempDir, probeFrom, removeDir, touch, writesOutput } from '../helpers.js';

vi.mock('../../src/media/ffmpeg.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../src/media/ffmpeg.js')>();
  return { ...actual, runFfmpeg: vi.fn() };
});

const ffmpeg = vi.mocked(runFfmpeg);

describe('manifestLine', () => {
  it('quotes the absolute path', () => {
    expect(manifestLine('/media/scene_1_composed.mp4')).toBe("file '/media/scene_1_composed.mp4'\n");
  });

  it('escapes single quotes for the concat demuxer', () => {
    expect(manifestLine("/media/it's.mp4")).toBe("file '/media/it'\\''s.mp4'\n");
  });

  it('resolves relative paths', () => {
    expect(manifestLine('clip.mp4')).toBe(`file '${path.resolve('clip.mp4')}'\n`);
  });
});

describe('reelVideoFilter', () => {
  it('fits, pads and squares pixels to 1080x1920', () => {
    expect(reelVideoFilter()).toBe(
      'scale=1080:1920:force_original_aspect_ratio=decrease,pad=1080:1920:(ow-iw)/2:(oh-ih)/2,setsar=1',
    );
  });
});

describe('buildMergeArgs', () => {
  it('concatenates from the manifest and re-encodes to the reel profile', () => {
    expect(buildMergeArgs('/final/concat_list.txt', '/final/final_reel.mp4')).toEqual([
      '-f', 'concat', '-safe', '0',
      '-i', '/final/concat_list.txt',
      '-vf', 'scale=1080:1920:force_original_aspect_ratio=decrease,pad=1080:1920:(ow-iw)/2:(oh-ih)/2,setsar=1',
      '-c:v', 'libx264', '-preset', 'medium', '-crf', '23',
      '-c:a', 'aac', '-b:a', '128k',
      '-movflags', '+faststart',
      '/final/final_reel.mp4',
    ]);
  });
});

describe('isWithinTarget', () => {
  it('accepts 30–45 s inclusive', () => {
    expect(isWithinTarget(29.9)).toBe(false);
    expect(isWithinTarget(30)).toBe(true);
    expect(isWithinTarget(45)).toBe(true);
    expect(isWithinTarget(45.1)).toBe(false);
  });
});

describe('mergeReel', () => {
  let dir: string;
  let finalDir: string;

  beforeEach(() => {
    ffmpeg.mockReset();
    ffmpeg.mockImplementation(writesOutput);
    dir = makeTempDir();
    finalDir = path.join(dir, 'final');
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('fails without encoding when nothing valid is left', async () => {
    const outcome = await mergeReel([null, undefined, path.join(dir, 'gone.mp4')], { finalDir });

    expect(outcome).toEqual({ ok: false, reason: 'no_valid_scenes' });
    expect(ffmpeg).not.toHaveBeenCalled();
  });

  it('fails for an empty input list', async () => {
    await expect(mergeReel([], { finalDir })).resolves.toEqual({ ok: false, reason: 'no_valid_scenes' });
  });

  it('writes the surviving scenes to the manifest in input order', async () => {
    const s1 = touch(dir, 'composed/scene_1_composed.mp4');
    const s3 = touch(dir, 'composed/scene_3_composed.mp4');
    const s2 = touch(dir, 'composed/scene_2_composed.mp4');

    const outcome = await mergeReel(
      [s3, null, path.join(dir, 'composed/scene_9_composed.mp4'), s1, s2],
      { finalDir, probe: probeFrom({ [path.join(finalDir, 'final_reel.mp4')]: 36 }) },
    );

    const manifest = fs.readFileSync(path.join(finalDir, 'concat_list.txt'), 'utf-8');
    expect(manifest).toBe(`file '${s3}'\nfile '${s1}'\nfile '${s2}'\n`);
    expect(outcome).toEqual({
      ok: true,
      outputPath: path.join(finalDir, 'final_reel.mp4'),
      sceneCount: 3,
      duration: { ok: true, seconds: 36 },
      withinTarget: true,
    });
    expect(ffmpeg).toHaveBeenCalledTimes(1);
    expect(ffmpeg).toHaveBeenCalledWith(
      buildMergeArgs(path.join(finalDir, 'concat_list.txt'), path.join(finalDir, 'final_reel.mp4')),
      'merge',
    );
  });

  it('succeeds but flags a reel outside the target band', async () => {
    const s1 = touch(dir, 'composed/scene_1_composed.mp4');
    const reel = path.join(finalDir, 'final_reel.mp4');

    const outcome = await mergeReel([s1], { finalDir, probe: probeFrom({ [reel]: 12 }) });

    expect(outcome).toMatchObject({ ok: true, sceneCount: 1, withinTarget: false });
  });

  it('does not count a defaulted reel duration as on target', async () => {
    const s1 = touch(dir, 'composed/scene_1_composed.mp4');

    const outcome = await mergeReel([s1], { finalDir, probe: probeFrom({}) });

    expect(outcome).toMatchObject({
      ok: true,
      duration: { ok: false, seconds: 5.0 },
      withinTarget: false,
    });
  });

  it('reports an encode failure once, with a truncated detail', async () => {
    const s1 = touch(dir, 'composed/scene_1_composed.mp4');
    ffmpeg.mockReturnValue(failed('e'.repeat(800)));

    const outcome = await mergeReel([s1], { finalDir });

    expect(outcome).toEqual({ ok: false, reason: 'encode_failed', detail: 'e'.repeat(500) });
    expect(ffmpeg).toHaveBeenCalledTimes(1);
  });
});
