import { z } from 'zod';

// warframe.market v1 response shapes. Only the fields we read are declared.

export const MarketPlatformSchema = z.enum(['pc', 'ps4', 'xbox', 'switch']);
export type MarketPlatform = z.infer<typeof MarketPlatformSchema>;

export const MarketItemSchema = z.object({
  url_name: z.string(),
  item_name: z.string().optional(),
});

export const ItemsResponseSchema = z.object({
  payload: z.object({
    items: z.array(MarketItemSchema),
  }),
});

export const MarketOrderSchema = z.object({
  order_type: z.enum(['sell', 'buy']),
  platinum: z.number().nonnegative(),
  visible: z.boolean().optional(),
  mod_rank: z.number().int().optional(),
  user: z.object({
    status: z.string(),
  }),
});
export type MarketOrder = z.infer<typeof MarketOrderSchema>;

export const OrdersResponseSchema = z.object({
  payload: z.object({
    orders: z.array(MarketOrderSchema),
  }),
});
