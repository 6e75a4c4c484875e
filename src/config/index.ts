import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(3000),
  // Saved searches fall back to an in-memory store without a database
  DATABASE_URL: z.string().optional(),
  // Without both credentials the pipeline runs in raw mode (no sold-price data)
  EBAY_CLIENT_ID: z.string().optional(),
  EBAY_CLIENT_SECRET: z.string().optional(),
  EBAY_MARKETPLACE_ID: z.string().default('EBAY_US'),
  EXPORT_DIR: z.string().default('exports'),
  LISTINGS_DIR: z.string().default('listings'),
});

export type AppConfig = z.infer<typeof envSchema>;

export const config: AppConfig = envSchema.parse(process.env);
