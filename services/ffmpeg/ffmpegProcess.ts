import { spawn } from 'child_process';
import { ffmpegLogger } from '../logger';

export const FFMPEG_BIN = process.env.FFMPEG_PATH || 'ffmpeg';

/**
 * Run ffmpeg with optional stdin payload and collect stdout.
 * Rejects with the tail of stderr when the process exits non-zero.
 */
export function runFfmpeg(args: string[], input?: Uint8Array): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    const ffmpeg = spawn(FFMPEG_BIN, ['-hide_banner', '-loglevel', 'error', ...args]);
    const chunks: Buffer[] = [];
    let stderrOutput = '';

    ffmpeg.stdout.on('data', (data: Buffer) => {
      chunks.push(data);
    });

    ffmpeg.stderr.on('data', (data: Buffer) => {
      const msg = data.toString();
      stderrOutput += msg;
      ffmpegLogger.debug(msg.trim());
    });

    ffmpeg.on('close', (code) => {
      if (code === 0) resolve(Buffer.concat(chunks));
      else reject(new Error(`FFmpeg exited with code ${code}: ${stderrOutput.trim().slice(-500)}`));
    });

    ffmpeg.on('error', (err) => reject(err));

    // ffmpeg may exit before consuming all input; 'close' reports the real cause
    ffmpeg.stdin.on('error', (err) => ffmpegLogger.debug(`stdin closed early: ${err.message}`));

    if (input) {
      ffmpeg.stdin.end(Buffer.from(input.buffer, input.byteOffset, input.byteLength));
    } else {
      ffmpeg.stdin.end();
    }
  });
}

export function floatToF32le(samples: Float32Array): Uint8Array {
  const bytes = new Uint8Array(samples.length * 4);
  const view = new DataView(bytes.buffer);
  for (let i = 0; i < samples.length; i++) {
    view.setFloat32(i * 4, samples[i], true);
  }
  return bytes;
}

export function f32leToFloat(bytes: Uint8Array): Float32Array {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const samples = new Float32Array(Math.floor(bytes.byteLength / 4));
  for (let i = 0; i < samples.length; i++) {
    samples[i] = view.getFloat32(i * 4, true);
  }
  return samples;
}
