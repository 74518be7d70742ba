import ffmpeg from 'fluent-ffmpeg';
import { IMediaProbe } from '../interfaces/IMediaScanner';
import { InternalServerError } from '../utils/errors';

/**
 * ffprobe-backed Media Probe
 *
 * Dependency Inversion: scanner depends on IMediaProbe, not on ffprobe
 */
export class FfprobeMediaProbe implements IMediaProbe {
  constructor(ffprobePath?: string) {
    if (ffprobePath) {
      ffmpeg.setFfprobePath(ffprobePath);
    }
  }

  async probeDurationSeconds(filePath: string): Promise<number> {
    return new Promise((resolve, reject) => {
      ffmpeg.ffprobe(filePath, (error, metadata) => {
        if (error) {
          reject(new InternalServerError(`Failed to probe ${filePath}: ${error.message}`));
          return;
        }

        const duration = Number(metadata.format?.duration);
        if (!Number.isFinite(duration) || duration <= 0) {
          reject(new InternalServerError(`No usable duration reported for ${filePath}`));
          return;
        }

        resolve(duration);
      });
    });
  }
}
