import type { RequestHandler } from "express";
import { Router } from "express";
import multer from "multer";
import type { UploadDocumentResponse } from "@docchat/shared";
import { appConfig } from "../config.js";
import { IngestionError, UnsupportedFormatError, errorMessage } from "../errors.js";
import { validateUploadedFile } from "../parsers/fileValidator.js";
import { getSessionCoordinatorSingleton } from "../runtime/serviceRuntime.js";
import type { SessionCoordinator } from "../services/SessionCoordinator.js";
import { logger } from "../utils/logger.js";

interface CreateDocumentsRouterOptions {
  coordinator?: SessionCoordinator;
  maxUploadSize?: number;
}

export function createDocumentsRouter(options: CreateDocumentsRouterOptions = {}): Router {
  const coordinator = options.coordinator ?? getSessionCoordinatorSingleton();
  const maxUploadSize = options.maxUploadSize ?? appConfig.MAX_UPLOAD_SIZE;
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: maxUploadSize
    }
  });

  const documentsRouter = Router();

  /** Turns multer failures such as an oversized file into a 400. */
  const handleUpload: RequestHandler = (req, res, next) => {
    upload.single("file")(req, res, (err: unknown) => {
      if (err) {
        const message =
          err instanceof multer.MulterError
            ? err.code === "LIMIT_FILE_SIZE"
              ? `File too large. Maximum allowed size is ${Math.round(maxUploadSize / 1024 / 1024)}MB`
              : err.message
            : errorMessage(err);
        res.status(400).json({ error: message });
        return;
      }
      next();
    });
  };

  documentsRouter.post("/upload", handleUpload, async (req, res) => {
    if (!req.file) {
      return res.status(400).json({ error: "No file uploaded" });
    }

    try {
      await validateUploadedFile(req.file, { maxSizeBytes: maxUploadSize });
    } catch (error) {
      return res.status(400).json({ error: errorMessage(error) });
    }

    try {
      const created = await coordinator.createFromUpload({
        originalName: req.file.originalname,
        buffer: req.file.buffer
      });

      const response: UploadDocumentResponse = {
        sessionId: created.session.id,
        filename: req.file.originalname,
        chunkCount: created.chunkCount,
        message: created.message
      };
      return res.status(201).json(response);
    } catch (error) {
      if (error instanceof UnsupportedFormatError) {
        return res.status(400).json({ error: error.message });
      }
      logger.error({ err: error, filename: req.file.originalname }, "Document upload failed");
      return res.status(500).json({
        error: error instanceof IngestionError ? error.message : "Failed to process document"
      });
    }
  });

  return documentsRouter;
}
