import { Temporal } from "@js-temporal/polyfill";
import { describe, expect, it } from "vitest";
import {
  buildClassificationFilter,
  buildDateRangeFilter,
  formatDateBound,
} from "./filters";

describe("formatDateBound", () => {
  it("formats a plain date-time without an offset", () => {
    expect.assertions(1);
    const bound = Temporal.PlainDateTime.from("2006-02-05T00:00");
    expect(formatDateBound(bound)).toBe("2006-02-05T00:00:00");
  });

  it("formats a zoned date-time with its offset", () => {
    expect.assertions(1);
    const bound = Temporal.ZonedDateTime.from(
      "1996-02-05T00:00:00-05:00[-05:00]",
    );
    expect(formatDateBound(bound)).toBe("1996-02-05T00:00:00-05:00");
  });

  it("drops fractional seconds", () => {
    expect.assertions(1);
    const bound = Temporal.PlainDateTime.from("2010-07-01T12:30:15.250");
    expect(formatDateBound(bound)).toBe("2010-07-01T12:30:15");
  });
});

describe("buildDateRangeFilter", () => {
  it("returns null without a range", () => {
    expect.assertions(2);
    expect(buildDateRangeFilter(undefined)).toBeNull();
    expect(buildDateRangeFilter({})).toBeNull();
  });

  it("bounds both ends", () => {
    expect.assertions(1);
    expect(
      buildDateRangeFilter({
        startDate: Temporal.ZonedDateTime.from(
          "1996-02-05T00:00:00-05:00[-05:00]",
        ),
        endDate: Temporal.PlainDateTime.from("2006-02-05T00:00"),
      }),
    ).toEqual({
      type: "range",
      field: "submitted_date",
      gte: "1996-02-05T00:00:00-05:00",
      lt: "2006-02-05T00:00:00",
    });
  });

  it("leaves a missing end open", () => {
    expect.assertions(1);
    expect(
      buildDateRangeFilter({
        startDate: Temporal.PlainDateTime.from("2020-01-01T00:00"),
      }),
    ).toEqual({
      type: "range",
      field: "submitted_date",
      gte: "2020-01-01T00:00:00",
    });
  });

  it("leaves a missing start open", () => {
    expect.assertions(1);
    expect(
      buildDateRangeFilter({
        endDate: Temporal.PlainDateTime.from("2020-01-01T00:00"),
      }),
    ).toEqual({
      type: "range",
      field: "submitted_date",
      lt: "2020-01-01T00:00:00",
    });
  });
});

describe("buildClassificationFilter", () => {
  it("returns null for an empty list", () => {
    expect.assertions(1);
    expect(buildClassificationFilter([])).toBeNull();
  });

  it("matches a lone group directly", () => {
    expect.assertions(1);
    expect(buildClassificationFilter([{ group: "cs" }])).toEqual({
      type: "nested",
      path: "primary_classification",
      query: {
        type: "match",
        field: "primary_classification.group.id",
        value: "cs",
      },
    });
  });

  it("requires every level of a classification", () => {
    expect.assertions(1);
    expect(
      buildClassificationFilter([
        { group: "physics", archive: "hep-th", category: "hep-th" },
      ]),
    ).toEqual({
      type: "nested",
      path: "primary_classification",
      query: {
        type: "and",
        children: [
          {
            type: "match",
            field: "primary_classification.group.id",
            value: "physics",
          },
          {
            type: "match",
            field: "primary_classification.archive.id",
            value: "hep-th",
          },
          {
            type: "match",
            field: "primary_classification.category.id",
            value: "hep-th",
          },
        ],
      },
    });
  });

  it("ORs several classifications inside one nested scope", () => {
    expect.assertions(1);
    expect(
      buildClassificationFilter([
        { group: "cs" },
        { group: "physics", archive: "astro-ph" },
      ]),
    ).toEqual({
      type: "nested",
      path: "primary_classification",
      query: {
        type: "or",
        children: [
          {
            type: "match",
            field: "primary_classification.group.id",
            value: "cs",
          },
          {
            type: "and",
            children: [
              {
                type: "match",
                field: "primary_classification.group.id",
                value: "physics",
              },
              {
                type: "match",
                field: "primary_classification.archive.id",
                value: "astro-ph",
              },
            ],
          },
        ],
      },
    });
  });
});
