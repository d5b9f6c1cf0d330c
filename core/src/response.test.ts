/**
 * Unit tests for canonical response helpers.
 */

import { describe, it, expect } from "vitest";
import { Body } from "./body.js";
import { createResponse, htmlResponse, mapResponseBody, textResponse } from "./response.js";

describe("createResponse", () => {
  it("should default to 200 with an empty body", async () => {
    const response = createResponse();
    expect(response.status).toBe(200);
    expect(await response.body.intoText()).toBe("");
  });
});

describe("textResponse", () => {
  it("should set a plain-text content type", async () => {
    const response = textResponse("nope", 404);
    expect(response.status).toBe(404);
    expect(response.headers.get("content-type")).toBe("text/plain; charset=utf-8");
    expect(await response.body.intoText()).toBe("nope");
  });
});

describe("htmlResponse", () => {
  it("should set an HTML content type", () => {
    const response = htmlResponse("<p>hi</p>");
    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toBe("text/html; charset=utf-8");
  });
});

describe("mapResponseBody", () => {
  it("should replace the body and keep status and headers", () => {
    const original = createResponse({ status: 201, headers: { "x-id": "7" }, body: Body.fixed("abc") });
    const mapped = mapResponseBody(original, (body) => body.sizeHint());

    expect(mapped.status).toBe(201);
    expect(mapped.headers).toBe(original.headers);
    expect(mapped.body).toBe(3);
  });
});
