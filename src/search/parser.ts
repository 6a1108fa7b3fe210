/**
 * Fielded search query parser.
 *
 * Parses the compact textual form of an advanced search into a
 * {@link FieldedSearchList} that can then be grouped and compiled.
 *
 * Grammar (informal):
 *   query    = term (keyword? term)*
 *   keyword  = "AND" | "OR" | "NOT"
 *   term     = fielded | quotedString | word
 *   fielded  = fieldName ":" (quotedString | word)
 *   quotedString = '"' ... '"' | "'" ... "'"
 *   word     = [^\s]+
 *
 * Terms without a keyword between them are joined with `AND`.
 */

import { isSearchField } from "./fields";
import type {
  BooleanOperator,
  FieldedSearchList,
  FieldedSearchTerm,
} from "./types";

type Token =
  | { type: "KEYWORD"; value: BooleanOperator }
  | { type: "FIELDED"; value: string; field: string; text: string }
  | { type: "QUOTED"; value: string }
  | { type: "WORD"; value: string };

interface QuotedString {
  value: string;
  closed: boolean;
  end: number;
}

const isWhitespace = (ch: string) => /\s/.test(ch);
const isQuote = (ch: string) => ch === '"' || ch === "'";

function isKeyword(word: string): word is BooleanOperator {
  return word === "AND" || word === "OR" || word === "NOT";
}

/**
 * Read a quoted string starting at the opening quote at `start`.
 */
function readQuoted(input: string, start: number): QuotedString {
  const quote = input[start];
  let value = "";
  let pos = start + 1;
  while (pos < input.length) {
    if (input[pos] === "\\") {
      pos++;
      if (pos < input.length) {
        value += input[pos];
        pos++;
      }
    } else if (input[pos] === quote) {
      return { value, closed: true, end: pos + 1 };
    } else {
      value += input[pos];
      pos++;
    }
  }
  return { value, closed: false, end: pos };
}

function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < input.length) {
    if (isWhitespace(input[pos])) {
      pos++;
      continue;
    }

    if (isQuote(input[pos])) {
      const quoted = readQuoted(input, pos);
      tokens.push(
        quoted.closed
          ? { type: "QUOTED", value: quoted.value }
          : { type: "WORD", value: input.substring(pos, quoted.end) },
      );
      pos = quoted.end;
      continue;
    }

    const start = pos;
    let word = "";
    while (pos < input.length && !isWhitespace(input[pos])) {
      // A quoted value right after the colon of a field name:
      if (
        input[pos] === ":" &&
        word.length > 0 &&
        pos + 1 < input.length &&
        isQuote(input[pos + 1])
      ) {
        const quoted = readQuoted(input, pos + 1);
        if (quoted.closed) {
          tokens.push({
            type: "FIELDED",
            value: input.substring(start, quoted.end),
            field: word.toLowerCase(),
            text: quoted.value,
          });
        } else {
          tokens.push({
            type: "WORD",
            value: input.substring(start, quoted.end),
          });
        }
        pos = quoted.end;
        word = "";
        break;
      }
      word += input[pos];
      pos++;
    }

    if (word.length === 0) continue;
    if (isKeyword(word)) {
      tokens.push({ type: "KEYWORD", value: word });
      continue;
    }
    const colonIndex = word.indexOf(":");
    if (colonIndex > 0 && colonIndex < word.length - 1) {
      tokens.push({
        type: "FIELDED",
        value: word,
        field: word.substring(0, colonIndex).toLowerCase(),
        text: word.substring(colonIndex + 1),
      });
    } else {
      tokens.push({ type: "WORD", value: word });
    }
  }

  return tokens;
}

/**
 * Parse a fielded search query string into a term list.
 *
 * Bare words and `name:value` pairs with an unknown field name search the
 * `all` pseudo-field.  A keyword with no term before it is searched as
 * text, and a trailing keyword is ignored.
 *
 * @param query The search query string to parse.
 * @returns The parsed term list, empty if the query is blank.
 *
 * @example
 * ```typescript
 * parseFieldedQuery('title:muon OR author:"de la cruz"')
 * // => [
 * //   { type: "term", operator: null, field: "title", term: "muon" },
 * //   { type: "term", operator: "OR", field: "author", term: "de la cruz" },
 * // ]
 * ```
 */
export function parseFieldedQuery(query: string): FieldedSearchList {
  const terms: FieldedSearchTerm[] = [];
  let pending: BooleanOperator | null = null;

  const addTerm = (field: FieldedSearchTerm["field"], term: string) => {
    terms.push({
      type: "term",
      operator: terms.length < 1 ? null : (pending ?? "AND"),
      field,
      term,
    });
    pending = null;
  };

  for (const token of tokenize(query.trim())) {
    switch (token.type) {
      case "KEYWORD":
        if (terms.length < 1 || pending != null) addTerm("all", token.value);
        else pending = token.value;
        break;
      case "FIELDED":
        if (isSearchField(token.field)) addTerm(token.field, token.text);
        else addTerm("all", token.value);
        break;
      case "QUOTED":
      case "WORD":
        addTerm("all", token.value);
        break;
    }
  }

  return terms;
}
