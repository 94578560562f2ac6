import { Request } from 'express';
import multer from 'multer';
import { MAX_UPLOAD_SIZE, UPLOAD_DIR, ensureDir, safeFileName } from '../utils/index';

// Multer Configuration
const storage = multer.diskStorage({
  destination: (_req, _file, cb) => {
    ensureDir(UPLOAD_DIR);
    cb(null, UPLOAD_DIR);
  },
  filename: (_req, file, cb) => {
    cb(null, safeFileName(file.originalname));
  },
});

export const upload = multer({
  storage,
  limits: { fileSize: MAX_UPLOAD_SIZE, files: 2 },
});

/**
 * First file uploaded under `field` by `upload.fields(...)`
 */
export function uploadedFile(req: Pick<Request, 'files'>, field: string): Express.Multer.File | undefined {
  const files = req.files;
  if (!files || Array.isArray(files)) return undefined;
  return files[field]?.[0];
}

/**
 * Paths of every file multer stored for this request
 */
export function uploadedPaths(req: Pick<Request, 'files'>): string[] {
  const files = req.files;
  if (!files) return [];
  const list = Array.isArray(files) ? files : Object.values(files).flat();
  return list.map(file => file.path);
}
