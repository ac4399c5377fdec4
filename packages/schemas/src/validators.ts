import type { ZodError } from 'zod';
import { SchemaValidationError } from '@searchbridge/shared/src/utils/errors.js';
import { SearchBridgeConfigSchema } from './search-config.schema.js';
import type { SearchBridgeConfig } from './search-config.schema.js';
import { VocabularySchema } from './vocabulary.schema.js';
import type { Vocabulary } from './vocabulary.schema.js';

export function formatZodErrors(error: ZodError): readonly string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

export function validateSearchBridgeConfig(data: unknown): SearchBridgeConfig {
  const result = SearchBridgeConfigSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid search configuration', formatZodErrors(result.error));
  }

  return result.data;
}

export function validateVocabulary(data: unknown): Vocabulary {
  const result = VocabularySchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid vocabulary', formatZodErrors(result.error));
  }

  return result.data;
}
