import { Temporal } from "@js-temporal/polyfill";
import { describe, expect, it } from "vitest";
import { compileQuery } from "./compiler";
import { paginate } from "./pagination";
import {
  collectMatchFields,
  renderQuery,
  renderSearchRequest,
} from "./render";
import type { CompiledQuery } from "./types";

describe("renderQuery", () => {
  it("renders null as match_all", () => {
    expect.assertions(1);
    expect(renderQuery(null)).toEqual({ match_all: {} });
  });

  it("renders a disjunction with a minimum match of one", () => {
    expect.assertions(1);
    expect(
      renderQuery({
        type: "or",
        children: [
          { type: "match", field: "comments", value: "a" },
          { type: "match", field: "doi", value: "b" },
        ],
      }),
    ).toEqual({
      bool: {
        should: [{ match: { comments: "a" } }, { match: { doi: "b" } }],
        minimum_should_match: 1,
      },
    });
  });

  it("renders a negation as must and must_not", () => {
    expect.assertions(1);
    expect(
      renderQuery({
        type: "not",
        include: { type: "match", field: "comments", value: "a" },
        exclude: { type: "match", field: "doi", value: "b" },
      }),
    ).toEqual({
      bool: {
        must: [{ match: { comments: "a" } }],
        must_not: [{ match: { doi: "b" } }],
      },
    });
  });

  it("renders only the present range bounds", () => {
    expect.assertions(1);
    expect(
      renderQuery({ type: "range", field: "submitted_date", lt: "2001" }),
    ).toEqual({ range: { submitted_date: { lt: "2001" } } });
  });
});

describe("collectMatchFields", () => {
  it("lists match fields once, skipping nested filters", () => {
    expect.assertions(1);
    const query: CompiledQuery = {
      type: "and",
      children: [
        {
          type: "not",
          include: { type: "match", field: "title.tex", value: "a" },
          exclude: { type: "match", field: "comments", value: "b" },
        },
        { type: "match", field: "title.tex", value: "c" },
        {
          type: "nested",
          path: "primary_classification",
          query: {
            type: "match",
            field: "primary_classification.group.id",
            value: "cs",
          },
        },
      ],
    };
    expect(collectMatchFields(query)).toEqual(["title.tex", "comments"]);
  });
});

describe("renderSearchRequest", () => {
  it("renders the combined advanced query", () => {
    expect.assertions(1);
    const compiled = compileQuery({
      type: "advanced",
      terms: [
        { type: "term", operator: null, field: "title", term: "muon" },
        { type: "term", operator: "OR", field: "title", term: "gluon" },
      ],
      dateRange: {
        startDate: Temporal.PlainDateTime.from("2006-02-05T00:00"),
        endDate: Temporal.PlainDateTime.from("2007-03-25T00:00"),
      },
      primaryClassification: [{ group: "cs" }],
      order: null,
      page: 1,
      pageSize: 25,
    });
    expect(renderSearchRequest(compiled, paginate(1, 25), null)).toEqual({
      query: {
        bool: {
          must: [
            {
              bool: {
                should: [
                  {
                    bool: {
                      should: [
                        { match: { "title.tex": "muon" } },
                        { match: { "title.english": "muon" } },
                      ],
                      minimum_should_match: 1,
                    },
                  },
                  {
                    bool: {
                      should: [
                        { match: { "title.tex": "gluon" } },
                        { match: { "title.english": "gluon" } },
                      ],
                      minimum_should_match: 1,
                    },
                  },
                ],
                minimum_should_match: 1,
              },
            },
            {
              range: {
                submitted_date: {
                  gte: "2006-02-05T00:00:00",
                  lt: "2007-03-25T00:00:00",
                },
              },
            },
            {
              nested: {
                path: "primary_classification",
                query: { match: { "primary_classification.group.id": "cs" } },
              },
            },
          ],
        },
      },
      from: 0,
      size: 25,
      highlight: { fields: { "title.tex": {}, "title.english": {} } },
    });
  });

  it("sorts by submission date and omits highlighting for match_all", () => {
    expect.assertions(1);
    const bounds = paginate(2, 50);
    expect(renderSearchRequest(null, bounds, "-submitted_date")).toEqual({
      query: { match_all: {} },
      from: 50,
      size: 50,
      sort: [{ submitted_date: { order: "desc" } }],
    });
  });

  it("sorts ascending", () => {
    expect.assertions(1);
    const request = renderSearchRequest(
      { type: "match", field: "comments", value: "x" },
      paginate(1, 25),
      "submitted_date",
    );
    expect(request.sort).toEqual([{ submitted_date: { order: "asc" } }]);
  });
});
