import { z } from 'zod';

export const searchResultSchema = z.object({
  title: z.string(),
  link: z.string(),
  snippet: z.string(),
  displayed_link: z.string(),
  /** Visible page text, set by content enhancement. */
  content: z.string().optional(),
});

export type SearchResult = Readonly<z.infer<typeof searchResultSchema>>;
