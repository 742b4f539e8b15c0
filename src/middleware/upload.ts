import multer from 'multer';
import path from 'path';
import fs from 'fs';
import { unlink } from 'fs/promises';
import { randomBytes } from 'crypto';
import createError from 'http-errors';
import { env } from '../config/env';
import { logger } from '../utils/logger';

const IMAGE_TYPES = ['image/jpeg', 'image/png', 'image/webp'];
const VIDEO_TYPES = ['video/mp4', 'video/quicktime', 'video/webm'];

/** Directory (relative to the working directory) that files for `area` are written to. */
export const uploadDir = (area: string) => path.join(env.UPLOAD_DIR, area);

const storageFor = (area: string) =>
  multer.diskStorage({
    destination: (_req, _file, cb) => {
      const dir = uploadDir(area);
      fs.mkdir(dir, { recursive: true }, (err) => cb(err, dir));
    },
    filename: (_req, file, cb) => {
      const ext = path.extname(file.originalname).toLowerCase();
      cb(null, `${Date.now()}-${randomBytes(6).toString('hex')}${ext}`);
    },
  });

export const branchMediaUpload = multer({
  storage: storageFor('branches'),
  limits: { fileSize: 50 * 1024 * 1024 },
  fileFilter: (_req, file, cb) => {
    const allowed = file.fieldname === 'videos' ? VIDEO_TYPES : IMAGE_TYPES;
    if (!allowed.includes(file.mimetype)) {
      return cb(createError(400, `Unsupported file type for ${file.fieldname}: ${file.mimetype}`));
    }
    cb(null, true);
  },
}).fields([
  { name: 'images', maxCount: 10 },
  { name: 'videos', maxCount: 2 },
]);

/** Path stored in the database: always forward slashes, relative to the working directory. */
export const toStoredPath = (file: Express.Multer.File) => path.relative(process.cwd(), file.path).split(path.sep).join('/');

/** One optional `media` file per review, image or video. */
export const reviewMediaUpload = multer({
  storage: storageFor('reviews'),
  limits: { fileSize: 50 * 1024 * 1024 },
  fileFilter: (_req, file, cb) => {
    if (![...IMAGE_TYPES, ...VIDEO_TYPES].includes(file.mimetype)) {
      return cb(createError(400, `Unsupported file type for ${file.fieldname}: ${file.mimetype}`));
    }
    cb(null, true);
  },
}).single('media');

export const isVideo = (file: Express.Multer.File) => VIDEO_TYPES.includes(file.mimetype);

/** Removes files multer already wrote for a request that then failed. */
export const discardUploads = async (files: Express.Multer.File[]) => {
  const paths = files.map((f) => f.path);
  const results = await Promise.allSettled(paths.map((p) => unlink(p)));
  results.forEach((result, i) => {
    if (result.status === 'rejected') {
      logger.warn('Failed to remove orphaned upload', { path: paths[i], error: String(result.reason) });
    }
  });
};
