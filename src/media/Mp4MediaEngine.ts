/**
 * MP4 Media Engine
 * Resolves media durations by parsing the container's moov box with MP4Box.js.
 */

import { readFile } from 'node:fs/promises';
import * as MP4Box from 'mp4box';
import type { MP4Info } from 'mp4box';
import type { MediaEngine } from './types';
import { MEDIA } from '../constants';
import { createLogger, errorMessage } from '../utils/logger';

const logger = createLogger('Mp4MediaEngine');

export interface Mp4MediaEngineOptions {
  /** Reject when the container never reports its metadata (ms) */
  probeTimeoutMs?: number;
}

/**
 * Duration in seconds from MP4Box info.
 * Prefers the first video track and falls back to the movie header.
 */
export function durationFromInfo(info: Pick<MP4Info, 'duration' | 'timescale' | 'videoTracks'>): number {
  const videoTrack = info.videoTracks[0];
  if (videoTrack && videoTrack.duration && videoTrack.timescale) {
    return videoTrack.duration / videoTrack.timescale;
  }
  if (info.duration && info.timescale) {
    return info.duration / info.timescale;
  }
  return 0;
}

/**
 * Parse a whole file buffer and resolve its duration in seconds
 */
export function probeDuration(data: Uint8Array, timeoutMs: number): Promise<number> {
  return new Promise((resolve, reject) => {
    const mp4boxfile = MP4Box.createFile();
    let settled = false;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const finish = (action: () => void) => {
      if (settled) return;
      settled = true;
      if (timer !== undefined) clearTimeout(timer);
      action();
    };

    // Set up callbacks BEFORE appending buffer
    mp4boxfile.onReady = (info) => {
      finish(() => {
        const duration = durationFromInfo(info);
        logger.debug('Extracted media duration', {
          duration,
          videoCodec: info.videoTracks[0]?.codec,
          isFragmented: info.isFragmented,
        });
        resolve(duration);
      });
    };

    mp4boxfile.onError = (error) => {
      const message = typeof error === 'string' ? error : error.message;
      finish(() => reject(new Error(`Failed to parse media metadata: ${message}`)));
    };

    try {
      // MP4Box needs an ArrayBuffer tagged with its position in the file
      const arrayBuffer = new ArrayBuffer(data.byteLength);
      new Uint8Array(arrayBuffer).set(data);
      mp4boxfile.appendBuffer(Object.assign(arrayBuffer, { fileStart: 0 }));
      mp4boxfile.flush();
    } catch (error) {
      finish(() => reject(new Error(`Failed to parse media file: ${errorMessage(error)}`)));
      return;
    }

    if (!settled) {
      timer = setTimeout(() => {
        finish(() => reject(new Error('Timeout waiting for media metadata')));
      }, timeoutMs);
    }
  });
}

export class Mp4MediaEngine implements MediaEngine {
  private readonly probeTimeoutMs: number;

  constructor(options: Mp4MediaEngineOptions = {}) {
    this.probeTimeoutMs = options.probeTimeoutMs ?? MEDIA.PROBE_TIMEOUT_MS;
  }

  async getDuration(path: string, signal?: AbortSignal): Promise<number> {
    if (signal?.aborted) {
      throw new Error(`Duration lookup aborted: ${path}`);
    }

    let data: Uint8Array;
    try {
      data = await readFile(path, { signal });
    } catch (error) {
      logger.warn('Failed to read media file', { path, error: errorMessage(error) });
      throw new Error(`Media file unavailable: ${path} (${errorMessage(error)})`);
    }

    const duration = await probeDuration(data, this.probeTimeoutMs);
    if (!(duration > 0)) {
      throw new Error(`Media file has no duration: ${path}`);
    }

    logger.info('Media duration resolved', { path, duration });
    return duration;
  }
}
