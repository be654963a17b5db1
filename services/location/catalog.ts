/**
 * Fallback catalog and ocean keyword data.
 * Both live as versioned JSON under config/data and are validated on load.
 */

import fallbackCatalogJson from '../../config/data/fallbackCatalog.json';
import oceanKeywordsJson from '../../config/data/oceanKeywords.json';
import { FallbackCatalogSchema, OceanKeywordsSchema } from '../../schemas/locationSchemas';
import { LocationConfigError } from './errors';
import { FallbackEntry, createCoordinate } from './types';

function describeIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

export function parseFallbackCatalog(data: unknown): readonly FallbackEntry[] {
  const parsed = FallbackCatalogSchema.safeParse(data);
  if (!parsed.success) {
    throw new LocationConfigError(`Invalid fallback catalog: ${describeIssues(parsed.error.issues)}`);
  }

  return Object.freeze(parsed.data.entries.map(entry => Object.freeze({
    name: entry.name,
    coordinate: createCoordinate(entry.latitude, entry.longitude)
  })));
}

export function parseOceanKeywords(data: unknown): readonly string[] {
  const parsed = OceanKeywordsSchema.safeParse(data);
  if (!parsed.success) {
    throw new LocationConfigError(`Invalid ocean keyword list: ${describeIssues(parsed.error.issues)}`);
  }
  return Object.freeze([...parsed.data.keywords]);
}

export const FALLBACK_CATALOG = parseFallbackCatalog(fallbackCatalogJson);

export const OCEAN_KEYWORDS = parseOceanKeywords(oceanKeywordsJson);
