import { z } from "zod";

const classificationLevel = z.object({
  id: z.string(),
  name: z.string().optional(),
});

export const authorSchema = z.object({
  full_name: z.string(),
  last_name: z.string().optional(),
  first_name: z.string().optional(),
  orcid: z.string().optional(),
  author_id: z.string().optional(),
});

/**
 * A paper's metadata record as stored in the search index.
 */
export const documentSchema = z.object({
  id: z.string().min(1).optional(),
  paper_id: z.string().min(1),
  paper_id_v: z.string().optional(),
  version: z.number().int().positive().optional(),
  title: z.string(),
  abstract: z.string().optional(),
  authors: z.array(authorSchema).optional(),
  comments: z.string().optional(),
  journal_ref: z.string().optional(),
  report_num: z.string().optional(),
  acm_class: z.string().optional(),
  msc_class: z.string().optional(),
  doi: z.string().optional(),
  submitted_date: z.string().optional(),
  primary_classification: z
    .object({
      group: classificationLevel,
      archive: classificationLevel.optional(),
      category: classificationLevel.optional(),
    })
    .optional(),
});

export type Author = z.infer<typeof authorSchema>;
export type Document = z.infer<typeof documentSchema>;

/**
 * A document returned by a search, annotated by the backend.
 */
export type SearchResult = Document & {
  /** Relevance score; higher is more relevant. */
  score: number;
  /** Backend-reported type tag. */
  type: string;
  highlight?: Record<string, string[]>;
};

export interface DocumentSet {
  /** Total number of matching documents, not just those returned. */
  count: number;
  /** Results in backend rank order. */
  results: SearchResult[];
  metadata: {
    pageStart: number;
    pageEnd: number;
    pageSize: number;
    maxPages: number;
  };
}

/**
 * The identifier a document is indexed under.
 */
export function getDocumentId(document: Document): string {
  return document.id ?? document.paper_id;
}
