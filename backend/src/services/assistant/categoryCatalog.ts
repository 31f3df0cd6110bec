/**
 * Category Catalog
 * Topic categories, their required fields and enrichment templates, loaded
 * from config/categories.json
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../../lib/errors.js';
import { createLogger } from '../../lib/logger.js';

const log = createLogger('category-catalog');

export const DEFAULT_CATEGORIES_FILE = fileURLToPath(
  new URL('../../../config/categories.json', import.meta.url)
);

const patternList = z.array(z.string().min(1));

const requiredFieldSchema = z.object({
  field: z.string().min(1),
  question: z.string().min(1),
  options: z.array(z.string().min(1)).min(1),
  context: z.string(),
  indicators: patternList.default([]),
});

const categorySchema = z.object({
  name: z.string().min(1),
  keywords: patternList.min(1),
  entityPatterns: patternList.default([]),
  requiredFields: z.array(requiredFieldSchema).default([]),
  followUpQuestions: z
    .array(z.object({ question: z.string().min(1), field: z.string().optional() }))
    .default([]),
  actionItems: z.array(z.string().min(1)).default([]),
  relatedTopics: z
    .array(z.object({ topic: z.string().min(1), majors: z.array(z.string()).optional() }))
    .default([]),
});

export const catalogSchema = z.object({
  genericQualifiers: z.array(z.string().min(1)),
  limits: z
    .object({
      followUpQuestions: z.number().int().min(0).default(3),
      actionItems: z.number().int().min(0).default(4),
      relatedTopics: z.number().int().min(0).default(5),
    })
    .default({}),
  categories: z.array(categorySchema),
});

export type CatalogDefinition = z.input<typeof catalogSchema>;

export interface RequiredField {
  field: string;
  question: string;
  options: string[];
  context: string;
  indicators: RegExp[];
}

export interface CategoryDefinition {
  name: string;
  keywords: RegExp[];
  entityPatterns: RegExp[];
  requiredFields: RequiredField[];
  followUpQuestions: Array<{ question: string; field?: string }>;
  actionItems: string[];
  relatedTopics: Array<{ topic: string; majors?: string[] }>;
}

export interface CategoryCatalog {
  genericQualifiers: RegExp[];
  limits: { followUpQuestions: number; actionItems: number; relatedTopics: number };
  categories: CategoryDefinition[];
}

/**
 * Whole-word, case-insensitive pattern
 */
function compile(pattern: string, source: string): RegExp {
  try {
    return new RegExp(`\\b(?:${pattern})\\b`, 'i');
  } catch (error) {
    throw new ConfigError('Invalid pattern in category catalog', [
      `${source}: ${pattern} (${errorMessage(error)})`,
    ]);
  }
}

/**
 * Validate and compile a catalog definition
 */
export function buildCategoryCatalog(definition: unknown): CategoryCatalog {
  const parsed = catalogSchema.safeParse(definition);
  if (!parsed.success) {
    throw new ConfigError(
      'Invalid category catalog',
      parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`)
    );
  }

  const { genericQualifiers, limits, categories } = parsed.data;

  const names = new Set<string>();
  for (const category of categories) {
    if (names.has(category.name)) {
      throw new ConfigError('Invalid category catalog', [`categories: duplicate name '${category.name}'`]);
    }
    names.add(category.name);
  }

  return {
    genericQualifiers: genericQualifiers.map((q) => compile(q, 'genericQualifiers')),
    limits,
    categories: categories.map((category) => ({
      name: category.name,
      keywords: category.keywords.map((k) => compile(k, `${category.name}.keywords`)),
      entityPatterns: category.entityPatterns.map((p) => compile(p, `${category.name}.entityPatterns`)),
      requiredFields: category.requiredFields.map((field) => ({
        ...field,
        indicators: field.indicators.map((i) => compile(i, `${category.name}.${field.field}`)),
      })),
      followUpQuestions: category.followUpQuestions,
      actionItems: category.actionItems,
      relatedTopics: category.relatedTopics,
    })),
  };
}

/**
 * Load the catalog from a JSON file (defaults to the bundled one)
 */
export function loadCategoryCatalog(path: string = DEFAULT_CATEGORIES_FILE): CategoryCatalog {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError('Could not read category catalog', [
      `${path}: ${errorMessage(error)}`,
    ]);
  }

  const catalog = buildCategoryCatalog(raw);
  log.info({ path, categories: catalog.categories.map((c) => c.name) }, 'Category catalog loaded');
  return catalog;
}

export function findCategory(catalog: CategoryCatalog, name: string): CategoryDefinition | undefined {
  return catalog.categories.find((category) => category.name === name);
}
