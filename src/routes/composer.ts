import { Router } from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import pino from 'pino';
import { validate } from '../middleware/validation.js';
import {
  cleanSellerText,
  formatForPlatform,
  generateDescription,
  saveListingPackage,
} from '../services/composer/index.js';
import { sendError } from './error-response.js';

const log = pino({ name: 'composer-routes' });

const listingFields = {
  title: z.string().default(''),
  price: z.number().default(0),
  condition: z.string().default('Good'),
  category: z.string().default('General'),
  location: z.string().default(''),
};

const descriptionSchema = z.object({
  style: z.string().default('casual'),
  ...listingFields,
});

const formatSchema = z.object({
  platform: z.string().default('facebook'),
  description: z.string().default(''),
  localOnly: z.boolean().default(true),
  ...listingFields,
});

const cleanSchema = z.object({
  text: z.string(),
});

const saveSchema = z.object({
  title: z.string().default(''),
  facebook: z.string().default(''),
  craigslist: z.string().default(''),
  offerup: z.string().default(''),
  photos: z
    .array(
      z.object({
        name: z.string().min(1),
        // base64 file content
        data: z.string().base64(),
      }),
    )
    .default([]),
});

export interface ComposerRouterDeps {
  listingsDir: string;
}

export function createComposerRouter(deps: ComposerRouterDeps): Router {
  const router = Router();

  /**
   * POST /api/composer/description — templated sale description.
   */
  router.post('/description', validate(descriptionSchema), (req: Request, res: Response) => {
    const input: z.infer<typeof descriptionSchema> = req.body;
    res.json({ description: generateDescription(input) });
  });

  /**
   * POST /api/composer/format — description wrapped for a target platform.
   */
  router.post('/format', validate(formatSchema), (req: Request, res: Response) => {
    const input: z.infer<typeof formatSchema> = req.body;
    res.json({ listing: formatForPlatform(input) });
  });

  /**
   * POST /api/composer/clean — tidy a pasted seller description.
   */
  router.post('/clean', validate(cleanSchema), (req: Request, res: Response) => {
    const { text }: z.infer<typeof cleanSchema> = req.body;
    res.json({ cleaned: cleanSellerText(text) });
  });

  /**
   * POST /api/composer/save — write the per-platform texts and photos to a
   * listing folder and zip it.
   */
  router.post('/save', validate(saveSchema), async (req: Request, res: Response) => {
    const input: z.infer<typeof saveSchema> = req.body;
    try {
      const saved = await saveListingPackage(
        {
          ...input,
          photos: input.photos.map((p) => ({ name: p.name, content: Buffer.from(p.data, 'base64') })),
        },
        deps.listingsDir,
      );
      res.status(201).json(saved);
    } catch (err) {
      sendError(res, err, log, 'Failed to save listing');
    }
  });

  return router;
}
