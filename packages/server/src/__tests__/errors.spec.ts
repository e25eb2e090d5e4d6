import { describe, it, expect } from "vitest";
import {
  ExecutionError,
  InvalidRequestError,
  MissingQueryError,
  SessionNotFoundError,
} from "@execd/shared";
import { toErrorResponse } from "../errors.js";

describe("toErrorResponse", () => {
  it("maps daemon errors to their code and status", () => {
    expect(toErrorResponse(new InvalidRequestError("bad input"))).toEqual({
      status: 400,
      body: { code: "InvalidRequest", message: "bad input" },
    });
    expect(toErrorResponse(new MissingQueryError("id"))).toEqual({
      status: 400,
      body: { code: "MissingQuery", message: "missing query parameter: id" },
    });
    expect(toErrorResponse(new SessionNotFoundError("s1"))).toEqual({
      status: 404,
      body: { code: "NotFound", message: "command session not found: s1" },
    });
    expect(toErrorResponse(new ExecutionError("disk full"))).toEqual({
      status: 500,
      body: { code: "RuntimeError", message: "disk full" },
    });
  });

  it("treats body parser failures as invalid requests", () => {
    const err = Object.assign(new SyntaxError("Unexpected token n"), {
      type: "entity.parse.failed",
      status: 400,
    });

    expect(toErrorResponse(err)).toEqual({
      status: 400,
      body: {
        code: "InvalidRequest",
        message: "error parsing request body: Unexpected token n",
      },
    });
  });

  it("maps anything else to a runtime error", () => {
    expect(toErrorResponse(new Error("boom"))).toEqual({
      status: 500,
      body: { code: "RuntimeError", message: "boom" },
    });
    expect(toErrorResponse("plain string")).toEqual({
      status: 500,
      body: { code: "RuntimeError", message: "plain string" },
    });
  });
});
