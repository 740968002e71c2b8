import { z } from "zod";
import { defineEntity } from "../services/search/metadata";

export const bookSchema = z.object({
  id: z.string(),
  title: z.string(),
  author: z.string(),
  year: z.number().int(),
  version: z.number().int().optional(),
});

export type Book = z.infer<typeof bookSchema>;

export const bookEntity = defineEntity<Book>({
  indexName: "books",
  versionAttribute: "version",
  schema: bookSchema,
  mapping: {
    title: { type: "text" },
    author: { type: "keyword" },
    year: { type: "integer" },
  },
});

export const dune: Book = { id: "b1", title: "Dune", author: "Frank Herbert", year: 1965 };
export const duneMessiah: Book = {
  id: "b2",
  title: "Dune Messiah",
  author: "Frank Herbert",
  year: 1969,
};
export const emma: Book = { id: "b3", title: "Emma", author: "Jane Austen", year: 1815 };
