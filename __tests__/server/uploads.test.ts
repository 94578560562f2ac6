/**
 * Upload bookkeeping tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { Readable } from 'stream';
import { uploadedFile, uploadedPaths } from '../../server/routes/uploads';
import { removeUploads } from '../../server/utils/index';

function storedFile(field: string, filePath: string): Express.Multer.File {
  return {
    fieldname: field,
    originalname: path.basename(filePath),
    encoding: '7bit',
    mimetype: 'application/octet-stream',
    size: 0,
    destination: path.dirname(filePath),
    filename: path.basename(filePath),
    path: filePath,
    buffer: Buffer.alloc(0),
    stream: Readable.from([]),
  };
}

describe('uploadedPaths', () => {
  it('lists every file stored by a fields upload', () => {
    const files = {
      input_file: [storedFile('input_file', '/tmp/uploads/1_a.srt')],
      voice_file: [storedFile('voice_file', '/tmp/uploads/1_voice.wav')],
    };
    expect(uploadedPaths({ files })).toEqual(['/tmp/uploads/1_a.srt', '/tmp/uploads/1_voice.wav']);
    expect(uploadedFile({ files }, 'voice_file')?.path).toBe('/tmp/uploads/1_voice.wav');
  });

  it('is empty when nothing was uploaded', () => {
    expect(uploadedPaths({ files: undefined })).toEqual([]);
    expect(uploadedFile({ files: undefined }, 'input_file')).toBeUndefined();
  });
});

describe('removeUploads', () => {
  let dir = '';

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
  });

  it('deletes the given files and skips ones already gone', () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'uploads-'));
    const input = path.join(dir, 'input.srt');
    const voice = path.join(dir, 'voice.wav');
    const keep = path.join(dir, 'other.wav');
    for (const file of [input, voice, keep]) fs.writeFileSync(file, 'x');

    removeUploads([input, voice, path.join(dir, 'missing.wav')]);

    expect(fs.existsSync(input)).toBe(false);
    expect(fs.existsSync(voice)).toBe(false);
    expect(fs.existsSync(keep)).toBe(true);
  });
});
