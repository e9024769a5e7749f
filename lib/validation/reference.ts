import { z } from "zod";

export const MAX_LOCATION_NUMBER = 255;

export const locationNumberSchema = z.number().int().min(0).max(MAX_LOCATION_NUMBER);

export const verseLocationSchema = z.object({
  chapters: z.array(locationNumberSchema).min(1),
  verses: z.array(locationNumberSchema).min(1).nullable().default(null)
});

export const bibleReferenceSchema = z.object({
  book: z.string().min(1),
  locations: z.array(verseLocationSchema).min(1)
});

export const grammarSourceSchema = z.object({
  reference: z.string().min(1),
  location: z.string().min(1),
  step: z.string().min(1)
});

export type GrammarSource = z.infer<typeof grammarSourceSchema>;
