import express, { type Router } from "express";
import { z } from "zod";
import { NotFoundError, ValidationError } from "../../core/errors.js";
import { getGroup } from "../../core/middleware/authMiddleware.js";
import { asyncHandler } from "../../core/middleware/publicErrorHandler.js";
import { sanitizeFilename } from "../../core/security/sanitizer.js";
import type { ImageStorage } from "../../core/storage/imageStorage.js";
import { mimeTypeFor } from "../../core/storage/types.js";

export interface ImagesRouterOptions {
  storage: ImageStorage;
}

const purgeSchema = z.object({
  age_days: z.number().int().min(0),
});

/**
 * Stored image access by GUID: bytes, metadata and deletion. Mounted at
 * `/proxy`. Every call is scoped to the caller's group.
 */
export function createProxyRouter(options: ImagesRouterOptions): Router {
  const router = express.Router();
  const { storage } = options;

  // --- File retrieval ---
  router.get(
    "/:guid",
    asyncHandler(async (req, res) => {
      const { guid } = req.params;
      const image = await storage.getImage(guid, getGroup(res));
      if (!image) throw new NotFoundError(`Image not found: ${guid}`);

      const download = typeof req.query.download === "string" ? req.query.download : undefined;
      const disposition = download !== undefined
        ? `attachment; filename="${sanitizeFilename(download, { format: image.format }).filename}"`
        : `inline; filename="${guid}.${image.format}"`;

      res.setHeader("Content-Type", mimeTypeFor(image.format));
      res.setHeader("Content-Disposition", disposition);
      res.send(image.data);
    })
  );

  // --- Metadata retrieval ---
  router.get(
    "/:guid/metadata",
    asyncHandler(async (req, res) => {
      const { guid } = req.params;
      const metadata = await storage.getMetadata(guid, getGroup(res));
      if (!metadata) throw new NotFoundError(`Image not found: ${guid}`);

      res.json({
        guid: metadata.guid,
        format: metadata.format,
        size: metadata.size,
        created_at: metadata.createdAt ?? null,
        group: metadata.group ?? null,
        ...metadata.extra,
      });
    })
  );

  // --- Delete image ---
  router.delete(
    "/:guid",
    asyncHandler(async (req, res) => {
      const deleted = await storage.deleteImage(req.params.guid, getGroup(res));
      res.json({ deleted });
    })
  );

  return router;
}

/**
 * Group-level listing and purge. Mounted at `/images`.
 */
export function createImagesRouter(options: ImagesRouterOptions): Router {
  const router = express.Router();
  const { storage } = options;

  router.get(
    "/",
    asyncHandler(async (_req, res) => {
      const group = getGroup(res);
      const guids = await storage.listImages(group);
      res.json({ group: group ?? null, guids });
    })
  );

  router.post(
    "/purge",
    asyncHandler(async (req, res) => {
      const parsed = purgeSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        throw new ValidationError("age_days must be a non-negative integer");
      }

      const deleted = await storage.purge(parsed.data.age_days, getGroup(res));
      res.json({ deleted });
    })
  );

  return router;
}
