/**
 * WAV encoding/decoding for mono float sample buffers.
 *
 * Decoding accepts 8/16/24/32-bit integer PCM, 32-bit float and
 * WAVE_FORMAT_EXTENSIBLE files; multi-channel audio is downmixed to mono.
 */

const FORMAT_PCM = 1;
const FORMAT_FLOAT = 3;
const FORMAT_EXTENSIBLE = 0xfffe;

export interface DecodedWav {
  samples: Float32Array;
  sampleRate: number;
  channels: number;
  bitsPerSample: number;
}

/**
 * Helper to write ASCII string to DataView
 */
function writeString(view: DataView, offset: number, str: string): void {
  for (let i = 0; i < str.length; i++) {
    view.setUint8(offset + i, str.charCodeAt(i));
  }
}

function readString(view: DataView, offset: number, length: number): string {
  let result = '';
  for (let i = 0; i < length; i++) {
    result += String.fromCharCode(view.getUint8(offset + i));
  }
  return result;
}

/**
 * Encode mono samples as a 16-bit PCM WAV file.
 */
export function encodeWav(samples: Float32Array, sampleRate: number): Uint8Array {
  const bytesPerSample = 2;
  const dataSize = samples.length * bytesPerSample;
  const buffer = new ArrayBuffer(44 + dataSize);
  const view = new DataView(buffer);

  // RIFF chunk descriptor
  writeString(view, 0, 'RIFF');
  view.setUint32(4, 36 + dataSize, true);
  writeString(view, 8, 'WAVE');

  // fmt sub-chunk
  writeString(view, 12, 'fmt ');
  view.setUint32(16, 16, true); // Subchunk1Size (16 for PCM)
  view.setUint16(20, FORMAT_PCM, true);
  view.setUint16(22, 1, true); // mono
  view.setUint32(24, sampleRate, true);
  view.setUint32(28, sampleRate * bytesPerSample, true); // byte rate
  view.setUint16(32, bytesPerSample, true); // block align
  view.setUint16(34, 16, true);

  // data sub-chunk
  writeString(view, 36, 'data');
  view.setUint32(40, dataSize, true);

  let offset = 44;
  for (let i = 0; i < samples.length; i++) {
    const s = Math.max(-1, Math.min(1, samples[i]));
    view.setInt16(offset, s < 0 ? s * 0x8000 : s * 0x7fff, true);
    offset += bytesPerSample;
  }

  return new Uint8Array(buffer);
}

/** Little-endian signed 16-bit PCM to floats (Gemini TTS returns this raw). */
export function pcm16ToFloat32(bytes: Uint8Array): Float32Array {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const count = Math.floor(bytes.byteLength / 2);
  const samples = new Float32Array(count);
  for (let i = 0; i < count; i++) {
    samples[i] = view.getInt16(i * 2, true) / 0x8000;
  }
  return samples;
}

function readSample(view: DataView, offset: number, format: number, bitsPerSample: number): number {
  if (format === FORMAT_FLOAT) {
    return bitsPerSample === 64 ? view.getFloat64(offset, true) : view.getFloat32(offset, true);
  }
  switch (bitsPerSample) {
    case 8:
      return (view.getUint8(offset) - 128) / 128;
    case 16:
      return view.getInt16(offset, true) / 0x8000;
    case 24: {
      const value = view.getUint8(offset) | (view.getUint8(offset + 1) << 8) | (view.getInt8(offset + 2) << 16);
      return value / 0x800000;
    }
    case 32:
      return view.getInt32(offset, true) / 0x80000000;
    default:
      throw new Error(`Unsupported WAV bit depth: ${bitsPerSample}`);
  }
}

export function decodeWav(bytes: Uint8Array): DecodedWav {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  if (bytes.byteLength < 12 || readString(view, 0, 4) !== 'RIFF' || readString(view, 8, 4) !== 'WAVE') {
    throw new Error('Invalid WAV: missing RIFF/WAVE header');
  }

  let format = 0;
  let channels = 0;
  let sampleRate = 0;
  let bitsPerSample = 0;
  let dataOffset = -1;
  let dataSize = 0;

  let offset = 12;
  while (offset + 8 <= bytes.byteLength) {
    const chunkId = readString(view, offset, 4);
    const chunkSize = view.getUint32(offset + 4, true);
    const body = offset + 8;

    if (chunkId === 'fmt ') {
      format = view.getUint16(body, true);
      channels = view.getUint16(body + 2, true);
      sampleRate = view.getUint32(body + 4, true);
      bitsPerSample = view.getUint16(body + 14, true);
      if (format === FORMAT_EXTENSIBLE && chunkSize >= 26) {
        // First two bytes of the sub-format GUID carry the real format code
        format = view.getUint16(body + 24, true);
      }
    } else if (chunkId === 'data') {
      dataOffset = body;
      // Streamed WAVs may carry a placeholder size
      dataSize = Math.min(chunkSize, bytes.byteLength - body);
      break;
    }

    offset = body + chunkSize + (chunkSize % 2);
  }

  if (channels === 0 || sampleRate === 0) {
    throw new Error('Invalid WAV: missing fmt chunk');
  }
  if (dataOffset < 0) {
    throw new Error('Invalid WAV: missing data chunk');
  }
  if (format !== FORMAT_PCM && format !== FORMAT_FLOAT) {
    throw new Error(`Unsupported WAV format code: ${format}`);
  }

  const bytesPerSample = bitsPerSample / 8;
  const frameSize = bytesPerSample * channels;
  const frames = Math.floor(dataSize / frameSize);
  const samples = new Float32Array(frames);

  for (let frame = 0; frame < frames; frame++) {
    let sum = 0;
    const frameOffset = dataOffset + frame * frameSize;
    for (let channel = 0; channel < channels; channel++) {
      sum += readSample(view, frameOffset + channel * bytesPerSample, format, bitsPerSample);
    }
    samples[frame] = sum / channels;
  }

  return { samples, sampleRate, channels, bitsPerSample };
}
