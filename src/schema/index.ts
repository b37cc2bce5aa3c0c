import { z } from 'zod';

export const TagSchema = z
  .string()
  .min(1)
  .regex(/^\S+$/, 'Tags cannot contain whitespace');

export const NoteDraftSchema = z.object({
  title: z.string().trim().min(1, 'Title cannot be empty'),
  body: z.string(),
  tags: z.array(TagSchema),
});
export type NoteDraft = z.infer<typeof NoteDraftSchema>;

export const NoteSchema = NoteDraftSchema.extend({
  id: z.number().int().positive(),
  createdAt: z.string(),
  updatedAt: z.string(),
});
export type Note = z.infer<typeof NoteSchema>;

/** Row shape as stored in SQLite; tags are a JSON-encoded array. */
export const NoteRowSchema = z.object({
  id: z.number().int().positive(),
  title: z.string(),
  content: z.string(),
  tags: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
});
export type NoteRow = z.infer<typeof NoteRowSchema>;

export const StoredTagsSchema = z.array(z.string());
