import { z } from 'zod';

/**
 * Schemas for the alias data file (data/aliases.json).
 * Aliases cover spellings the normalization pipeline cannot derive.
 */

export const ItemCategorySchema = z.enum(['Item', 'Mod', 'Arcane']);
export type ItemCategory = z.infer<typeof ItemCategorySchema>;

export const AliasRuleSchema = z.object({
  pattern: z.string().trim().min(1),
  canonicalId: z
    .string()
    .regex(/^[a-z0-9_%]+$/, 'canonicalId must be a catalog url name (lowercase, digits, underscores)'),
  category: ItemCategorySchema,
  note: z.string().optional(),
});
export type AliasRule = z.infer<typeof AliasRuleSchema>;

export const AliasFileSchema = z.object({
  version: z.literal(1),
  aliases: z.array(AliasRuleSchema),
});
