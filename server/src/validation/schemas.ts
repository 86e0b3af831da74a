import { z } from 'zod';
import { QUESTION_CATEGORIES, QUESTION_TYPES } from '../types/models.js';

/**
 * Request body schemas. Route handlers parse with these; a ZodError is turned
 * into a 400 by the error middleware.
 */

const idSchema = z.string().trim().min(1).max(64);

export const CreateQuestionSchema = z.object({
  content: z.string().trim().min(1, 'content is required').max(200),
  type: z.enum(QUESTION_TYPES),
  category: z.enum(QUESTION_CATEGORIES),
  emojiImageId: idSchema,
});

export const CreateQuestionSetSchema = z.object({
  questionIds: z.array(idSchema).min(1),
  publishedAt: z.coerce.date(),
  endAt: z.coerce.date(),
});

export const GenerateSheetsSchema = z.object({
  resolverId: idSchema.optional(),
});

export const ResolverQuerySchema = z.object({
  resolverId: idSchema,
});

export const RegisterMemberSchema = z.object({
  fullName: z.string().trim().min(1, 'fullName is required').max(100),
});

export const RelationPairSchema = z.object({
  fromId: idSchema,
  toId: idSchema,
});

export const RelationListQuerySchema = z.object({
  type: z.enum(['all', 'friend', 'accompany']).default('all'),
});
