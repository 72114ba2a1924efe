import type { ArticleMetadata } from './types.js';

const REQUIRED_FIELDS = ['title', 'tags', 'category', 'difficulty', 'author'] as const;

/**
 * Outcome of frontmatter validation
 * error is empty when valid
 */
export interface FrontmatterValidation {
  valid: boolean;
  error: string;
}

/**
 * Plain key/value object check (rejects null, arrays and class instances)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Validate that article frontmatter carries the fields the platform indexes on
 */
export function validateFrontmatter(frontmatter: unknown): FrontmatterValidation {
  if (!isPlainObject(frontmatter)) {
    return { valid: false, error: 'Frontmatter must be a key-value object' };
  }

  const missing = REQUIRED_FIELDS.filter((field) => !(field in frontmatter));
  if (missing.length > 0) {
    return { valid: false, error: `Missing required fields: ${missing.join(', ')}` };
  }

  const { title, tags } = frontmatter;
  if (typeof title !== 'string' || !title.trim()) {
    return { valid: false, error: 'Title must be a non-empty string' };
  }
  if (!Array.isArray(tags)) {
    return { valid: false, error: 'Tags must be a list' };
  }
  if (!tags.every((tag) => typeof tag === 'string')) {
    return { valid: false, error: 'All tags must be strings' };
  }

  return { valid: true, error: '' };
}

/**
 * Flatten ArticleMetadata into the frontmatter mapping sent on publish
 * Named fields win over same-named keys in the open mapping
 */
export function metadataToFrontmatter(metadata: ArticleMetadata): Record<string, unknown> {
  return {
    ...metadata.frontmatter,
    title: metadata.title,
    tags: [...metadata.tags],
    category: metadata.category,
    difficulty: metadata.difficulty,
    author: metadata.author,
  };
}
