/**
 * Field vocabulary shared by the clause compiler and the index mapping in
 * `mappings/DocumentMapping.json`.  The two must stay in sync.
 */

export const ALL_SEARCH_FIELDS = [
  "author",
  "title",
  "abstract",
  "comments",
  "journal_ref",
  "acm_class",
  "msc_class",
  "report_num",
  "paper_id",
  "doi",
  "orcid",
  "author_id",
] as const;

export type IndexedField = (typeof ALL_SEARCH_FIELDS)[number];

/**
 * Searchable field, including the `all` pseudo-field that spans
 * {@link DEFAULT_SEARCH_FIELDS}.
 */
export type SearchField = (typeof SEARCH_FIELDS)[number];

export const SEARCH_FIELDS = [...ALL_SEARCH_FIELDS, "all"] as const;

export const DEFAULT_SEARCH_FIELDS: readonly IndexedField[] = [
  "title",
  "author",
  "abstract",
  "comments",
  "journal_ref",
];

/**
 * Indexed representations of each field.  Text fields are indexed twice:
 * once keeping TeX markup intact and once with English stemming.
 */
export const FIELD_REPRESENTATIONS: Readonly<
  Record<IndexedField, readonly string[]>
> = {
  author: ["authors.full_name", "authors.last_name"],
  title: ["title.tex", "title.english"],
  abstract: ["abstract.tex", "abstract.english"],
  comments: ["comments"],
  journal_ref: ["journal_ref"],
  acm_class: ["acm_class"],
  msc_class: ["msc_class"],
  report_num: ["report_num"],
  paper_id: ["paper_id", "paper_id_v"],
  doi: ["doi"],
  orcid: ["authors.orcid"],
  author_id: ["authors.author_id"],
};

export const SUBMITTED_DATE_FIELD = "submitted_date";

export const CLASSIFICATION_PATH = "primary_classification";

export const CLASSIFICATION_FIELDS = {
  group: `${CLASSIFICATION_PATH}.group.id`,
  archive: `${CLASSIFICATION_PATH}.archive.id`,
  category: `${CLASSIFICATION_PATH}.category.id`,
} as const;

export function isSearchField(value: string): value is SearchField {
  return SEARCH_FIELDS.some((field) => field === value);
}

/**
 * Lists the indexed representations a search on `field` targets.
 */
export function getRepresentations(field: SearchField): string[] {
  if (field === "all") {
    return DEFAULT_SEARCH_FIELDS.flatMap((f) => FIELD_REPRESENTATIONS[f]);
  }
  return [...FIELD_REPRESENTATIONS[field]];
}
