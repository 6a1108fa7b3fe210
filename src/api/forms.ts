/**
 * The advanced search form and its conversion into an {@link AdvancedQuery}.
 */

import { Temporal } from "@js-temporal/polyfill";
import { z } from "zod";
import {
  type AdvancedQuery,
  type Classification,
  type DateRange,
  type FieldedSearchTerm,
  SEARCH_FIELDS,
} from "../search";

export const EARLIEST_YEAR = 1991;

export const PHYSICS_ARCHIVES = [
  "all",
  "astro-ph",
  "cond-mat",
  "gr-qc",
  "hep-ex",
  "hep-lat",
  "hep-ph",
  "hep-th",
  "math-ph",
  "nlin",
  "nucl-ex",
  "nucl-th",
  "physics",
  "quant-ph",
] as const;

const SUBJECTS = [
  "computer_science",
  "economics",
  "eess",
  "mathematics",
  "physics",
  "q_biology",
  "q_finance",
  "statistics",
] as const;

/**
 * Classification groups behind the subject checkboxes.
 */
export const SUBJECT_GROUPS: Record<(typeof SUBJECTS)[number], string> = {
  computer_science: "cs",
  economics: "econ",
  eess: "eess",
  mathematics: "math",
  physics: "physics",
  q_biology: "q-bio",
  q_finance: "q-fin",
  statistics: "stat",
};

/**
 * Parse a `YYYY-MM-DD` string, returning `null` if it is not a valid date.
 */
export function parsePlainDate(value: string): Temporal.PlainDate | null {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return null;
  try {
    return Temporal.PlainDate.from(value, { overflow: "reject" });
  } catch (error) {
    if (error instanceof RangeError) return null;
    throw error;
  }
}

function parseOptionalDate(
  value: string | undefined,
): Temporal.PlainDate | null {
  return value == null ? null : parsePlainDate(value);
}

const dateString = z
  .string()
  .refine((value) => parsePlainDate(value) != null, "Not a valid date");

const termSchema = z.object({
  operator: z.enum(["AND", "OR", "NOT"]).default("AND"),
  field: z.enum(SEARCH_FIELDS),
  term: z.string().default(""),
});

const classificationSchema = z.object({
  all_subjects: z.boolean().optional(),
  computer_science: z.boolean().optional(),
  economics: z.boolean().optional(),
  eess: z.boolean().optional(),
  mathematics: z.boolean().optional(),
  physics: z.boolean().optional(),
  physics_archives: z.enum(PHYSICS_ARCHIVES).optional(),
  q_biology: z.boolean().optional(),
  q_finance: z.boolean().optional(),
  statistics: z.boolean().optional(),
});

const dateSchema = z
  .object({
    all_dates: z.boolean().optional(),
    past_12: z.boolean().optional(),
    specific_year: z.boolean().optional(),
    year: z.number().int().optional(),
    date_range: z.boolean().optional(),
    from_date: dateString.optional(),
    to_date: dateString.optional(),
  })
  .superRefine((date, ctx) => {
    const selected = [
      date.all_dates,
      date.past_12,
      date.specific_year,
      date.date_range,
    ].filter((option) => option === true).length;
    if (selected > 1) {
      ctx.addIssue({
        code: "custom",
        message: "Only one date filter may be selected",
        path: ["all_dates"],
      });
    }
    if (date.specific_year === true && date.year == null) {
      ctx.addIssue({
        code: "custom",
        message: "Please select a year",
        path: ["year"],
      });
    }
    const currentYear = Temporal.Now.plainDateISO().year;
    if (
      date.year != null &&
      (date.year < EARLIEST_YEAR || date.year > currentYear)
    ) {
      ctx.addIssue({
        code: "custom",
        message: "Not a valid publication year",
        path: ["year"],
      });
    }
    if (date.date_range !== true) return;
    if (date.from_date == null && date.to_date == null) {
      ctx.addIssue({
        code: "custom",
        message: "Must select start and/or end date(s)",
        path: ["date_range"],
      });
      return;
    }
    const from = parseOptionalDate(date.from_date);
    const to = parseOptionalDate(date.to_date);
    if (
      from != null &&
      to != null &&
      Temporal.PlainDate.compare(from, to) >= 0
    ) {
      ctx.addIssue({
        code: "custom",
        message: "End date must be later than start date",
        path: ["to_date"],
      });
    }
  });

export const advancedFormSchema = z.object({
  terms: z.array(termSchema).default([]),
  classification: classificationSchema.optional(),
  date: dateSchema.optional(),
  size: z.union([z.literal(25), z.literal(50), z.literal(100)]).default(25),
  page: z.number().int().positive().default(1),
  order: z.enum(["", "submitted_date", "-submitted_date"]).default(""),
});

export type AdvancedForm = z.output<typeof advancedFormSchema>;

export function startOfDay(date: Temporal.PlainDate): Temporal.PlainDateTime {
  return Temporal.PlainDateTime.from({
    year: date.year,
    month: date.month,
    day: date.day,
  });
}

function startOfYear(year: number): Temporal.PlainDateTime {
  return Temporal.PlainDateTime.from({ year, month: 1, day: 1 });
}

function toDateRange(
  date: AdvancedForm["date"],
  today: Temporal.PlainDate,
): DateRange | undefined {
  if (date == null || date.all_dates === true) return undefined;
  if (date.past_12 === true) {
    return { startDate: startOfDay(today.subtract({ months: 12 })) };
  }
  if (date.specific_year === true && date.year != null) {
    return {
      startDate: startOfYear(date.year),
      endDate: startOfYear(date.year + 1),
    };
  }
  if (date.date_range === true) {
    const from = parseOptionalDate(date.from_date);
    const to = parseOptionalDate(date.to_date);
    return {
      startDate: from == null ? undefined : startOfDay(from),
      endDate: to == null ? undefined : startOfDay(to),
    };
  }
  return undefined;
}

function toClassifications(
  classification: AdvancedForm["classification"],
): Classification[] {
  if (classification == null || classification.all_subjects === true) {
    return [];
  }
  const classifications: Classification[] = [];
  for (const subject of SUBJECTS) {
    if (classification[subject] !== true) continue;
    const group = SUBJECT_GROUPS[subject];
    const archive = classification.physics_archives;
    classifications.push(
      group === "physics" && archive != null && archive !== "all"
        ? { group, archive }
        : { group },
    );
  }
  return classifications;
}

/**
 * Build an advanced query from a validated form.
 *
 * Blank terms are dropped and the first remaining term loses its operator.
 *
 * @param form The validated form.
 * @param today The current date, used for the "past 12 months" option.
 */
export function formToQuery(
  form: AdvancedForm,
  today: Temporal.PlainDate = Temporal.Now.plainDateISO(),
): AdvancedQuery {
  const terms = form.terms
    .filter((term) => term.term.trim().length > 0)
    .map((term, index): FieldedSearchTerm => ({
      type: "term",
      operator: index < 1 ? null : term.operator,
      field: term.field,
      term: term.term,
    }));
  return {
    type: "advanced",
    terms,
    dateRange: toDateRange(form.date, today),
    primaryClassification: toClassifications(form.classification),
    order: form.order === "" ? null : form.order,
    page: form.page,
    pageSize: form.size,
  };
}

/**
 * Parse a `group[:archive[:category]]` classification key.
 */
export function parseClassification(value: string): Classification | null {
  const [group, archive, category, ...rest] = value.split(":");
  if (group.length < 1 || rest.length > 0) return null;
  if (archive === "" || category === "") return null;
  if (archive == null) return { group };
  if (category == null) return { group, archive };
  return { group, archive, category };
}
