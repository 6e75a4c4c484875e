import { z } from 'zod';

const amountSchema = z.object({
  value: z.string(),
  currency: z.string(),
});

// Marketplace Insights item_sales/search response (fields we read)
export const itemSaleSchema = z.object({
  itemId: z.string(),
  title: z.string(),
  lastSoldPrice: amountSchema.optional(),
  lastSoldDate: z.string().optional(),
  totalSoldQuantity: z.number().optional(),
  condition: z.string().optional(),
});

export const itemSalesResponseSchema = z.object({
  total: z.number().default(0),
  limit: z.number().optional(),
  offset: z.number().optional(),
  itemSales: z.array(itemSaleSchema).optional(),
});

export const tokenResponseSchema = z.object({
  access_token: z.string(),
  expires_in: z.number(),
  token_type: z.string(),
});

export type EbayItemSale = z.infer<typeof itemSaleSchema>;
export type EbayItemSalesResponse = z.infer<typeof itemSalesResponseSchema>;
export type EbayTokenResponse = z.infer<typeof tokenResponseSchema>;

export interface EbayCredentials {
  clientId: string;
  clientSecret: string;
  marketplaceId: string;
}
