import { z } from 'zod';

const TermSchema = z
  .string()
  .min(1)
  .regex(/^\S+$/, 'Terms must be single words')
  .transform((term) => term.toLowerCase());

export const VocabularySchema = z.object({
  $schema: z.string().optional(),
  corrections: z.record(z.string(), TermSchema).default({}),
  synonyms: z.array(z.array(TermSchema).min(2)).default([]),
  terms: z.array(TermSchema).default([]),
});

export type Vocabulary = z.infer<typeof VocabularySchema>;
export type VocabularyInput = z.input<typeof VocabularySchema>;
