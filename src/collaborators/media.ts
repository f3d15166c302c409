import fs from "node:fs";
import path from "node:path";
import multer from "multer";
import { ValidationError } from "../errors.js";

const MEDIA_SCHEME = "media://";

/** Opaque media references. The core stores and hands them back; it never opens the files. */
export interface MediaStore {
  referenceFor(storedName: string): string;
  resolve(reference: string): string | undefined;
}

export class DiskMediaStore implements MediaStore {
  readonly directory: string;

  constructor(directory: string) {
    this.directory = path.resolve(process.cwd(), directory);
    if (!fs.existsSync(this.directory)) {
      fs.mkdirSync(this.directory, { recursive: true });
    }
  }

  referenceFor(storedName: string) {
    return `${MEDIA_SCHEME}${storedName}`;
  }

  resolve(reference: string): string | undefined {
    if (!reference.startsWith(MEDIA_SCHEME)) return undefined;
    const name = path.basename(reference.slice(MEDIA_SCHEME.length));
    const filePath = path.join(this.directory, name);
    return fs.existsSync(filePath) ? filePath : undefined;
  }

  uploader() {
    return multer({
      storage: multer.diskStorage({
        destination: (_req, _file, cb) => cb(null, this.directory),
        filename: (_req, file, cb) => {
          const uniqueName = `${Date.now()}-${Math.round(Math.random() * 1e9)}${path.extname(file.originalname)}`;
          cb(null, uniqueName);
        }
      }),
      limits: { fileSize: 5 * 1024 * 1024, files: 1 },
      fileFilter: (_req, file, cb) => {
        if (!file.mimetype.startsWith("image/")) {
          cb(new ValidationError("Only image files are allowed"));
          return;
        }
        cb(null, true);
      }
    });
  }
}
