// test/decoder.test.ts
import { describe, expect, it } from "vitest";
import { decodeResponse, reviveDates } from "../src/decoder.js";
import { AlreadyExistsError, HttpError, MalformedResponseError, NotFoundError } from "../src/errors.js";
import type { TransportResponse } from "../src/types.js";

const NODE = "http://a.example:9200";

function response(status: number, text: string): TransportResponse {
  return { status, headers: {}, body: new TextEncoder().encode(text) };
}

function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected a throw");
}

describe("decodeResponse", () => {
  it("returns parsed JSON for 2xx", () => {
    expect(decodeResponse(response(200, '{"ok":true}'), NODE)).toEqual({ ok: true });
    expect(decodeResponse(response(201, "[1,2]"), NODE)).toEqual([1, 2]);
  });

  it("keeps integers past 2^53 exact as bigint", () => {
    const out = decodeResponse(response(200, '{"id":12345678901234567891,"n":42,"f":1.5,"neg":-9007199254740993}'), NODE);
    expect(out).toEqual({ id: 12345678901234567891n, n: 42, f: 1.5, neg: -9007199254740993n });
  });

  it("decodes an empty HEAD response as null", () => {
    expect(decodeResponse(response(200, ""), NODE, "HEAD")).toBeNull();
    const missing = caught(() => decodeResponse(response(404, ""), NODE, "HEAD"));
    expect(missing).toBeInstanceOf(NotFoundError);
    if (!(missing instanceof NotFoundError)) return;
    expect(missing.body).toBeNull();
  });

  it("still requires a body for an empty GET response", () => {
    expect(caught(() => decodeResponse(response(200, ""), NODE, "GET"))).toBeInstanceOf(MalformedResponseError);
  });

  it("raises MalformedResponseError with the raw bytes on a non-JSON 2xx", () => {
    const err = caught(() => decodeResponse(response(200, "<html>oops</html>"), NODE));
    expect(err).toBeInstanceOf(MalformedResponseError);
    if (!(err instanceof MalformedResponseError)) return;
    expect(err.status).toBe(200);
    expect(err.text).toBe("<html>oops</html>");
    expect(err.node).toBe(NODE);
  });

  it("raises MalformedResponseError, not HttpError, for a non-JSON error body", () => {
    const err = caught(() => decodeResponse(response(502, "Bad Gateway"), NODE));
    expect(err).toBeInstanceOf(MalformedResponseError);
    expect(err).not.toBeInstanceOf(HttpError);
  });

  it("maps 404 to NotFoundError carrying the parsed body", () => {
    const err = caught(() => decodeResponse(response(404, '{"error":"IndexMissingException[[nope] missing]","status":404}'), NODE));
    expect(err).toBeInstanceOf(NotFoundError);
    if (!(err instanceof NotFoundError)) return;
    expect(err.status).toBe(404);
    expect(err.error).toBe("IndexMissingException[[nope] missing]");
    expect(err.body).toEqual({ error: "IndexMissingException[[nope] missing]", status: 404 });
  });

  it("recognizes already-exists conditions in string and object error forms", () => {
    const legacy = caught(() => decodeResponse(response(400, '{"error":"IndexAlreadyExistsException[[docs] already exists]"}'), NODE));
    expect(legacy).toBeInstanceOf(AlreadyExistsError);

    const modern = caught(() =>
      decodeResponse(response(400, '{"error":{"type":"resource_already_exists_exception","reason":"index [docs] exists"}}'), NODE)
    );
    expect(modern).toBeInstanceOf(AlreadyExistsError);
  });

  it("falls back to HttpError for other statuses", () => {
    const err = caught(() => decodeResponse(response(500, '{"error":"boom"}'), NODE));
    expect(err).toBeInstanceOf(HttpError);
    expect(err).not.toBeInstanceOf(NotFoundError);
    if (!(err instanceof HttpError)) return;
    expect(err.message).toBe("Non-OK response returned (500): 'boom'");
  });
});

describe("reviveDates", () => {
  it("turns serializer-style datetimes back into Date and leaves other strings", () => {
    const out = reviveDates({ at: "2013-05-04T22:01:09", name: "2013", list: ["2001-12-25T00:00:00.5"] });
    expect(out).toEqual({
      at: new Date(Date.UTC(2013, 4, 4, 22, 1, 9)),
      name: "2013",
      list: [new Date(Date.UTC(2001, 11, 25))],
    });
  });

  it("keeps two-digit years literal", () => {
    const out = reviveDates("0050-01-01T00:00:00");
    expect(out).toBeInstanceOf(Date);
    if (!(out instanceof Date)) return;
    expect(out.getUTCFullYear()).toBe(50);
    expect(out.getUTCMonth()).toBe(0);
    expect(out.getUTCDate()).toBe(1);
  });

  it("leaves out-of-range fields as strings instead of rolling over", () => {
    expect(reviveDates("2001-13-01T00:00:00")).toBe("2001-13-01T00:00:00");
    expect(reviveDates("2001-02-30T00:00:00")).toBe("2001-02-30T00:00:00");
    expect(reviveDates("2001-02-01T24:00:00")).toBe("2001-02-01T24:00:00");
  });
});
