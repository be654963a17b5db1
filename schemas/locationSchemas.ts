import { z } from 'zod';

export const LatitudeSchema = z.number().min(-90).max(90);
export const LongitudeSchema = z.number().min(-180).max(180);

export const FallbackCatalogSchema = z.object({
  version: z.number().int().positive(),
  entries: z.array(z.object({
    name: z.string().trim().min(1, 'Fallback entry name is required'),
    latitude: LatitudeSchema,
    longitude: LongitudeSchema
  })).min(1, 'Fallback catalog needs at least one entry')
});

export const OceanKeywordsSchema = z.object({
  version: z.number().int().positive(),
  keywords: z.array(
    z.string().trim().min(1).refine(k => k === k.toLowerCase(), 'Keywords must be lower-case')
  ).min(1, 'At least one ocean keyword is required')
});

/**
 * Nominatim /reverse body. Only the fields we read are checked.
 */
export const NominatimReverseSchema = z.object({
  error: z.string().optional(),
  display_name: z.string().optional(),
  address: z.record(z.string(), z.unknown()).optional()
}).passthrough();
