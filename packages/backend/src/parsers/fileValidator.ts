import { basename, extname } from "node:path";
import { fileTypeFromBuffer } from "file-type";
import type { DocumentFileType } from "@docchat/shared";
import { UnsupportedFormatError } from "../errors.js";
import { extensionToFileType } from "./TextExtractor.js";

export interface UploadedFileLike {
  originalname: string;
  mimetype: string;
  size: number;
  buffer: Buffer;
}

export interface FileValidationOptions {
  maxSizeBytes?: number;
}

export interface ValidatedFile {
  fileType: DocumentFileType;
  sanitizedFilename: string;
  mimeType: string;
  size: number;
}

export class FileValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FileValidationError";
  }
}

const DOCX_MIME = "application/vnd.openxmlformats-officedocument.wordprocessingml.document";

const allowedMimeTypes: Record<DocumentFileType, string[]> = {
  pdf: ["application/pdf"],
  docx: [DOCX_MIME, "application/zip"],
  md: ["text/markdown", "text/x-markdown", "text/plain"],
  txt: ["text/plain"]
};

const extensionFallbackMime: Record<DocumentFileType, string> = {
  pdf: "application/pdf",
  docx: DOCX_MIME,
  md: "text/markdown",
  txt: "text/plain"
};

export async function validateUploadedFile(
  file: UploadedFileLike,
  options: FileValidationOptions = {}
): Promise<ValidatedFile> {
  const extension = extname(file.originalname).toLowerCase();
  const fileType = extensionToFileType[extension];
  if (!fileType) {
    throw new UnsupportedFormatError(extension);
  }

  if (file.size === 0) {
    throw new FileValidationError("Uploaded file is empty.");
  }

  if (options.maxSizeBytes !== undefined && file.size > options.maxSizeBytes) {
    throw new FileValidationError(`File is too large. Maximum size is ${options.maxSizeBytes} bytes.`);
  }

  const allowed = allowedMimeTypes[fileType];
  const declaredMime = file.mimetype.toLowerCase();
  const detected = await fileTypeFromBuffer(file.buffer);
  const detectedMime = detected?.mime.toLowerCase();

  // Browsers send application/octet-stream for files they cannot classify.
  const effectiveDeclaredMime = declaredMime === "application/octet-stream" ? "" : declaredMime;

  if (effectiveDeclaredMime && !allowed.includes(effectiveDeclaredMime)) {
    throw new FileValidationError(`MIME type mismatch for ${extension}. Received ${declaredMime}.`);
  }

  if (detectedMime && !allowed.includes(detectedMime)) {
    throw new FileValidationError(`Binary signature mismatch for ${extension}. Detected ${detectedMime}.`);
  }

  return {
    fileType,
    sanitizedFilename: sanitizeFilename(file.originalname),
    mimeType: detectedMime ?? (effectiveDeclaredMime || extensionFallbackMime[fileType]),
    size: file.size
  };
}

export function sanitizeFilename(filename: string): string {
  const cleanBase = basename(filename).replace(/[^\w.-]/g, "_");
  return cleanBase.length > 0 ? cleanBase : "file";
}
