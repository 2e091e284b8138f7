import { basename } from 'node:path';

import { InvalidImageError } from '../../errors.js';
import type { RawImage } from '../../fields/contracts.js';
import { runCommand } from './exec.js';

export type ImageStreamInfo = {
  readonly width: number;
  readonly height: number;
  readonly pixelFormat?: string;
};

const utf8 = new TextDecoder();

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Reads the first video stream of `ffprobe -of json` output. */
export const parseStreamInfo = (json: string, source: string): ImageStreamInfo => {
  let payload: unknown;
  try {
    payload = JSON.parse(json);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidImageError(`[ffprobe] unreadable stream listing for ${source}: ${reason}`);
  }
  const streams = isRecord(payload) ? payload.streams : undefined;
  const stream = Array.isArray(streams) ? streams[0] : undefined;
  if (!isRecord(stream)) {
    throw new InvalidImageError(`[ffprobe] no video stream in ${source}`);
  }
  const { width, height, pix_fmt: pixelFormat } = stream;
  if (
    typeof width !== 'number' ||
    typeof height !== 'number' ||
    !Number.isInteger(width) ||
    !Number.isInteger(height) ||
    width <= 0 ||
    height <= 0
  ) {
    throw new InvalidImageError(`[ffprobe] failed to derive dimensions for ${source}`, {
      width,
      height,
    });
  }
  return {
    width,
    height,
    ...(typeof pixelFormat === 'string' && { pixelFormat }),
  };
};

export const readImageInfo = async (ffprobe: string, input: string): Promise<ImageStreamInfo> => {
  const args = [
    '-v',
    'error',
    '-select_streams',
    'v:0',
    '-show_entries',
    'stream=width,height,pix_fmt',
    '-of',
    'json',
    input,
  ];
  const { stdout } = await runCommand(ffprobe, args);
  return parseStreamInfo(utf8.decode(stdout), basename(input));
};

/** Decodes the first frame of `input` to interleaved 8-bit RGBA. */
export const decodeImage = async (
  ffmpeg: string,
  input: string,
  info: ImageStreamInfo,
): Promise<RawImage> => {
  const { width, height } = info;
  const args = ['-v', 'error', '-i', input, '-frames:v', '1', '-f', 'rawvideo', '-pix_fmt', 'rgba', '-'];
  const { stdout } = await runCommand(ffmpeg, args);
  const expected = width * height * 4;
  if (stdout.byteLength !== expected) {
    throw new InvalidImageError(
      `[ffmpeg] expected ${expected} bytes for ${basename(input)}, received ${stdout.byteLength}`,
      { expected, received: stdout.byteLength },
    );
  }
  return {
    width,
    height,
    channels: 4,
    data: new Uint8Array(stdout.buffer, stdout.byteOffset, stdout.byteLength),
  };
};
