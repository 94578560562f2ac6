import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { createLogger } from '../../services/logger';

const cleanupLog = createLogger('Cleanup');

const __dirname = path.dirname(fileURLToPath(import.meta.url));
export const TEMP_DIR = process.env.DUBBING_TEMP_DIR || path.join(__dirname, '../../temp');
export const UPLOAD_DIR = path.join(TEMP_DIR, 'uploads');
export const RESULT_DIR = process.env.DUBBING_OUTPUT_DIR || path.join(__dirname, '../../output');

// Upload limits
export const MAX_UPLOAD_SIZE = 50 * 1024 * 1024; // 50MB - subtitle files and voice references

/**
 * Sanitize an ID or file stem to prevent path traversal
 */
export const sanitizeId = (id: string): string => {
  return id.replace(/[^a-zA-Z0-9_-]/g, '');
};

/**
 * Make an uploaded file name safe to store, keeping its extension
 */
export const safeFileName = (originalName: string): string => {
  const ext = path.extname(originalName).toLowerCase().replace(/[^a-z0-9.]/g, '');
  const stem = sanitizeId(path.basename(originalName, path.extname(originalName))).slice(0, 60) || 'upload';
  return `${Date.now()}_${stem}${ext}`;
};

export const ensureDir = (dir: string): void => {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
};

/**
 * Ensure upload and result directories exist
 */
export const ensureWorkDirs = (): void => {
  ensureDir(UPLOAD_DIR);
  ensureDir(RESULT_DIR);
};

/**
 * Public URL of a file written to RESULT_DIR
 */
export const resultUrlFor = (filePath: string): string => {
  return `/results/${encodeURIComponent(path.basename(filePath))}`;
};

/**
 * Delete uploaded files once nothing needs them
 */
export const removeUploads = (filePaths: readonly string[]): void => {
  for (const filePath of filePaths) {
    if (!fs.existsSync(filePath)) continue;
    try {
      fs.rmSync(filePath, { force: true });
      cleanupLog.debug(`Removed upload ${path.basename(filePath)}`);
    } catch (e) {
      cleanupLog.error(`Failed to remove upload ${filePath}:`, e);
    }
  }
};
