import { Client, errors } from "@elastic/elasticsearch";
import Mock from "@elastic/elasticsearch-mock";
import { beforeEach, describe, expect, it } from "vitest";
import { classifyError, ElasticsearchTransport } from "./elasticsearch";

function responseError(statusCode: number, body: unknown) {
  return new errors.ResponseError({
    body,
    statusCode,
    headers: {},
    warnings: null,
    meta: {
      context: null,
      name: "elasticsearch-js",
      request: { params: { method: "GET", path: "/" }, options: {}, id: 1 },
      connection: null,
      attempts: 0,
      aborted: false,
    },
  });
}

describe("classifyError", () => {
  it("classifies a missing index", () => {
    expect.assertions(1);
    const error = responseError(404, {
      error: {
        type: "index_not_found_exception",
        reason: "no such index [test-papers]",
      },
      status: 404,
    });
    expect(classifyError(error)).toEqual({
      kind: "index_not_found",
      message: "no such index [test-papers]",
      cause: error,
    });
  });

  it("classifies a missing document", () => {
    expect.assertions(1);
    const error = responseError(404, {
      _index: "test-papers",
      _id: "0000.0000",
      found: false,
    });
    expect(classifyError(error)).toEqual({
      kind: "not_found",
      message: "No such document",
      cause: error,
    });
  });

  it("classifies a rejected query", () => {
    expect.assertions(1);
    const error = responseError(400, {
      error: { type: "parsing_exception", reason: "unknown query [foo]" },
      status: 400,
    });
    expect(classifyError(error).kind).toBe("parse");
  });

  it("classifies an existing index", () => {
    expect.assertions(1);
    const error = responseError(400, {
      error: {
        type: "resource_already_exists_exception",
        reason: "index [test-papers] already exists",
      },
      status: 400,
    });
    expect(classifyError(error).kind).toBe("already_exists");
  });

  it("classifies other error responses", () => {
    expect.assertions(1);
    const error = responseError(500, {
      error: { type: "illegal_state_exception", reason: "shard failure" },
      status: 500,
    });
    expect(classifyError(error)).toEqual({
      kind: "response",
      message: "shard failure",
      cause: error,
    });
  });

  it("classifies transport errors", () => {
    expect.assertions(3);
    const refused = new errors.ConnectionError("connect ECONNREFUSED");
    const timeout = new errors.TimeoutError("Request timed out");
    const aborted = new errors.RequestAbortedError("Request aborted");
    expect(classifyError(refused).kind).toBe("connection");
    expect(classifyError(timeout).kind).toBe("connection");
    expect(classifyError(aborted).kind).toBe("aborted");
  });

  it("leaves unrecognized errors unknown", () => {
    expect.assertions(1);
    const error = new TypeError("not a function");
    expect(classifyError(error)).toEqual({
      kind: "unknown",
      message: "not a function",
      cause: error,
    });
  });
});

describe("ElasticsearchTransport", () => {
  let mock: Mock;
  let transport: ElasticsearchTransport;

  beforeEach(() => {
    mock = new Mock();
    const client = new Client({
      node: "http://localhost:9200",
      Connection: mock.getConnection(),
      maxRetries: 0,
    });
    transport = new ElasticsearchTransport(client, "test-papers");
  });

  it("maps search hits", async () => {
    expect.assertions(1);
    mock.add({ method: "POST", path: "/test-papers/_search" }, () => ({
      took: 3,
      timed_out: false,
      _shards: { total: 1, successful: 1, skipped: 0, failed: 0 },
      hits: {
        total: { value: 31, relation: "eq" },
        max_score: 2.5,
        hits: [
          {
            _index: "test-papers",
            _id: "1234.5678",
            _score: 2.5,
            _source: { paper_id: "1234.5678", title: "Muon decay" },
            highlight: { "title.tex": ["<em>Muon</em> decay"] },
          },
        ],
      },
    }));
    const result = await transport.search({
      query: { match: { "title.tex": "muon" } },
      from: 0,
      size: 25,
    });
    expect(result).toEqual({
      ok: true,
      value: {
        total: 31,
        hits: [
          {
            id: "1234.5678",
            score: 2.5,
            source: { paper_id: "1234.5678", title: "Muon decay" },
            highlight: { "title.tex": ["<em>Muon</em> decay"] },
          },
        ],
      },
    });
  });

  it("reports a missing index as a fault", async () => {
    expect.assertions(1);
    mock.add({ method: "POST", path: "/test-papers/_search" }, () =>
      responseError(404, {
        error: {
          type: "index_not_found_exception",
          reason: "no such index [test-papers]",
        },
        status: 404,
      }),
    );
    const result = await transport.search({
      query: { match_all: {} },
      from: 0,
      size: 25,
    });
    expect(result.ok ? null : result.fault.kind).toBe("index_not_found");
  });

  it("returns a stored source", async () => {
    expect.assertions(1);
    mock.add({ method: "GET", path: "/test-papers/_doc/1234.5678" }, () => ({
      _index: "test-papers",
      _id: "1234.5678",
      _version: 1,
      found: true,
      _source: { paper_id: "1234.5678", title: "Muon decay" },
    }));
    expect(await transport.get("1234.5678")).toEqual({
      ok: true,
      value: { paper_id: "1234.5678", title: "Muon decay" },
    });
  });

  it("reports a missing document as not found", async () => {
    expect.assertions(1);
    const result = await transport.get("0000.0000");
    expect(result.ok ? null : result.fault.kind).toBe("not_found");
  });

  it("reports item failures of a bulk request", async () => {
    expect.assertions(1);
    mock.add({ method: "POST", path: "/_bulk" }, () => ({
      took: 2,
      errors: true,
      items: [
        {
          index: {
            _index: "test-papers",
            _id: "1234.5678",
            status: 400,
            error: {
              type: "document_parsing_exception",
              reason: "failed to parse field [version]",
            },
          },
        },
      ],
    }));
    const result = await transport.bulk(
      [{ id: "1234.5678", source: { paper_id: "1234.5678", version: "x" } }],
      500,
    );
    expect(result).toEqual({
      ok: false,
      fault: {
        kind: "bulk",
        message:
          "Bulk indexing failed for 1234.5678: failed to parse field [version]",
      },
    });
  });

  it("succeeds once the cluster is yellow", async () => {
    expect.assertions(1);
    mock.add({ method: "GET", path: "/_cluster/health" }, () => ({
      cluster_name: "test",
      status: "yellow",
      timed_out: false,
    }));
    expect(await transport.health(1000)).toEqual({
      ok: true,
      value: undefined,
    });
  });

  it("fails when the health check times out", async () => {
    expect.assertions(1);
    mock.add({ method: "GET", path: "/_cluster/health" }, () => ({
      cluster_name: "test",
      status: "red",
      timed_out: true,
    }));
    const result = await transport.health(1000);
    expect(result.ok ? null : result.fault.message).toBe(
      "Cluster status is red",
    );
  });
});
