import { describe, expect, it } from "vitest";
import {
  AuthError,
  NotFoundError,
  TransientError,
  classifyRequestError,
  httpStatusOf,
} from "./errors.js";

function requestError(status: number, headers: Record<string, string> = {}) {
  return Object.assign(new Error(`HTTP ${status}`), { status, response: { headers } });
}

describe("classifyRequestError", () => {
  it("maps 404 to a non-retryable NotFoundError", () => {
    const error = classifyRequestError(requestError(404), "lookup");

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error.message).toBe("lookup: HTTP 404");
    expect(error.retryable).toBe(false);
    expect(error.name).toBe("NotFoundError");
  });

  it("maps refused credentials to AuthError", () => {
    expect(classifyRequestError(requestError(401), "auth")).toBeInstanceOf(AuthError);
    expect(classifyRequestError(requestError(403), "auth")).toBeInstanceOf(AuthError);
  });

  it("treats an exhausted rate limit as transient", () => {
    const error = classifyRequestError(
      requestError(403, { "x-ratelimit-remaining": "0" }),
      "list",
    );

    expect(error).toBeInstanceOf(TransientError);
    expect(error.retryable).toBe(true);
  });

  it("treats server errors and status-less failures as transient", () => {
    expect(classifyRequestError(requestError(502), "x")).toBeInstanceOf(TransientError);
    expect(classifyRequestError(new Error("socket hang up"), "x")).toBeInstanceOf(TransientError);
  });

  it("passes classified errors through unchanged", () => {
    const original = new NotFoundError("gone", 404);

    expect(classifyRequestError(original, "ignored")).toBe(original);
  });
});

describe("httpStatusOf", () => {
  it("reads a numeric status only", () => {
    expect(httpStatusOf({ status: 418 })).toBe(418);
    expect(httpStatusOf({ status: "418" })).toBeUndefined();
    expect(httpStatusOf(null)).toBeUndefined();
  });
});
