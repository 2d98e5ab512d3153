/**
 * Shape of one chapter document.
 */

import { z } from 'zod';

export const verseEntrySchema = z
  .object({
    numberInSurah: z.number().int(),
    text: z.string(),
    number: z.number().int().optional(),
  })
  .passthrough();

export const chapterDocumentSchema = z
  .object({
    number: z.number().int(),
    name: z.string(),
    englishName: z.string().optional(),
    revelationType: z.string().optional(),
    ayahs: z.array(verseEntrySchema).min(1, 'chapter must contain at least one verse'),
  })
  .passthrough();

export type VerseEntry = z.infer<typeof verseEntrySchema>;
export type ChapterDocument = z.infer<typeof chapterDocumentSchema>;

/**
 * One-line description of the first schema violation, e.g.
 * `missing key "ayahs.0.text"` or `ayahs: chapter must contain at least one verse`.
 */
export function describeSchemaIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'invalid document';
  const path = issue.path.join('.');
  if (issue.code === z.ZodIssueCode.invalid_type && issue.received === 'undefined') {
    return `missing key "${path}"`;
  }
  return path ? `${path}: ${issue.message}` : issue.message;
}
