import type { CheckCategory } from '../category-runner.js';
import type { CategoryName } from '../config.js';
import { attributesCategory } from './attributes.js';
import { bucketsCategory } from './buckets.js';
import { errorConditionsCategory } from './error-conditions.js';
import { metadataCategory } from './metadata.js';
import { multipartCategory } from './multipart.js';
import { objectsCategory } from './objects.js';
import { rangeRequestsCategory } from './range-requests.js';
import { syncCategory } from './sync.js';
import { taggingCategory } from './tagging.js';
import { versioningCategory } from './versioning.js';

/** Every category, keyed by name, in execution order. */
export const categoryRegistry: Record<CategoryName, CheckCategory> = {
  buckets: bucketsCategory,
  objects: objectsCategory,
  multipart: multipartCategory,
  versioning: versioningCategory,
  tagging: taggingCategory,
  attributes: attributesCategory,
  metadata: metadataCategory,
  range_requests: rangeRequestsCategory,
  error_conditions: errorConditionsCategory,
  sync: syncCategory,
};

export const allCategories: CheckCategory[] = Object.values(categoryRegistry);

export const quickCategories: CheckCategory[] = allCategories.filter(category => category.quick);

export interface CategoryLookup {
  found: CheckCategory[];
  unknown: string[];
}

/** Case-insensitive lookup; `found` keeps registry order and has no duplicates. */
export function getCategoriesByName(names: string[]): CategoryLookup {
  const wanted = names.map(n => n.trim().toLowerCase()).filter(n => n.length > 0);
  const known = new Set<string>(allCategories.map(c => c.name));
  return {
    found: allCategories.filter(category => wanted.includes(category.name)),
    unknown: wanted.filter(n => !known.has(n)),
  };
}
