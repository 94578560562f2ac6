/**
 * Writes a finished track to disk. WAV is encoded in-process, compressed
 * formats go through ffmpeg.
 */

import fs from 'fs';
import path from 'path';
import { ExportError, toError } from '../errors';
import { createLogger } from '../logger';
import { floatToF32le, runFfmpeg } from '../ffmpeg/ffmpegProcess';
import { EXPORT_FORMATS, type ExportFormat } from '../../types/dubbing';
import { encodeWav } from './wavCodec';

const exportLog = createLogger('Export');

export interface AudioExporter {
  /** Resolves to the written path */
  export(samples: Float32Array, sampleRate: number, outputPath: string, format: ExportFormat): Promise<string>;
}

const CODEC_ARGS: Record<Exclude<ExportFormat, 'wav'>, string[]> = {
  mp3: ['-c:a', 'libmp3lame', '-b:a', '192k'],
  flac: ['-c:a', 'flac'],
  ogg: ['-c:a', 'libvorbis', '-q:a', '5'],
};

function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some(format => format === value);
}

/** Format implied by the file extension, defaulting to WAV. */
export function formatFromPath(outputPath: string): ExportFormat {
  const extension = path.extname(outputPath).slice(1).toLowerCase();
  return isExportFormat(extension) ? extension : 'wav';
}

export class FileAudioExporter implements AudioExporter {
  async export(samples: Float32Array, sampleRate: number, outputPath: string, format: ExportFormat): Promise<string> {
    const startTime = Date.now();
    try {
      await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });

      if (format === 'wav') {
        await fs.promises.writeFile(outputPath, encodeWav(samples, sampleRate));
      } else {
        await runFfmpeg(
          [
            '-f', 'f32le', '-ar', String(sampleRate), '-ac', '1', '-i', 'pipe:0',
            ...CODEC_ARGS[format],
            '-y', outputPath,
          ],
          floatToF32le(samples)
        );
      }
    } catch (error) {
      const cause = toError(error);
      throw new ExportError(`Failed to export ${format} to ${outputPath}: ${cause.message}`, outputPath, cause);
    }

    const seconds = (samples.length / sampleRate).toFixed(1);
    exportLog.info(`Wrote ${seconds}s of audio to ${outputPath} in ${Date.now() - startTime}ms`);
    return outputPath;
  }
}
