import { Router } from "express";
import { z } from "zod";
import type { CleanupResponse } from "@docchat/shared";
import { validate } from "../middleware/validator.js";
import { getSessionCoordinatorSingleton } from "../runtime/serviceRuntime.js";
import type { SessionCoordinator } from "../services/SessionCoordinator.js";
import { logger } from "../utils/logger.js";

const cleanupQuerySchema = z.object({
  daysOld: z.coerce.number().int().min(0).default(30)
});

interface CreateAdminRouterOptions {
  coordinator?: SessionCoordinator;
}

export function createAdminRouter(options: CreateAdminRouterOptions = {}): Router {
  const coordinator = options.coordinator ?? getSessionCoordinatorSingleton();
  const adminRouter = Router();

  adminRouter.post("/cleanup", validate({ query: cleanupQuerySchema }), async (req, res) => {
    const { daysOld } = cleanupQuerySchema.parse(req.query);
    try {
      const deletedSessions = await coordinator.cleanupOlderThan(daysOld);
      const response: CleanupResponse = {
        deletedSessions,
        message: `Deleted ${deletedSessions} sessions older than ${daysOld} days`
      };
      return res.json(response);
    } catch (error) {
      logger.error({ err: error, daysOld }, "Session cleanup failed");
      return res.status(500).json({ error: "Failed to clean up sessions" });
    }
  });

  return adminRouter;
}
