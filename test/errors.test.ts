import { describe, expect, test } from "vitest";
import {
  AppError,
  appError,
  ErrorCodes,
  ErrorTypes,
  isAppError,
  isCodedError,
  isHTTPEquivError,
  isNamedError,
  jsonError,
  marshalerContentTypeError,
  marshalerEmptyBodyError,
  methodNotAllowedError,
  methodNotFoundError,
} from "../src/errors.js";

describe("AppError", () => {
  test("exposes type, code and status through its capabilities", () => {
    const err = new AppError("Card was declined", {
      type: "payment_declined",
      code: 4021,
      status: 402,
    });
    expect(err.errorName()).toBe("payment_declined");
    expect(err.errorCode()).toBe(4021);
    expect(err.statusCode()).toBe(402);
    expect(err.description).toBe("Card was declined");
    expect(err.message).toBe("Card was declined");
    expect(err.name).toBe("AppError");
    expect(err).toBeInstanceOf(Error);
  });

  test("defaults to an empty type and zero code and status", () => {
    const err = new AppError("plain");
    expect(err.type).toBe("");
    expect(err.code).toBe(0);
    expect(err.status).toBe(0);
    expect(err.cause).toBeUndefined();
  });

  test("keeps the cause", () => {
    const cause = new Error("socket closed");
    const err = new AppError("upstream failed", { cause });
    expect(err.cause).toBe(cause);
  });
});

describe("factories", () => {
  test("jsonError is a 400 json error", () => {
    const err = jsonError("unexpected end of input");
    expect(err.type).toBe(ErrorTypes.json);
    expect(err.code).toBe(9001);
    expect(err.status).toBe(400);
    expect(err.message).toBe("unexpected end of input");
  });

  test("marshalerEmptyBodyError names the method", () => {
    const err = marshalerEmptyBodyError("POST");
    expect(err.message).toBe("Empty interface is not suitable for POST request bodies");
    expect(err.type).toBe("marshaler");
    expect(err.code).toBe(ErrorCodes.marshaler);
    expect(err.status).toBe(500);
  });

  test("marshalerContentTypeError is a 415", () => {
    const err = marshalerContentTypeError("text/xml");
    expect(err.message).toBe("Content-Type header is text/xml, not application/json");
    expect(err.code).toBe(9002);
    expect(err.status).toBe(415);
  });

  test("methodNotFoundError has a status but no type", () => {
    const err = methodNotFoundError("GET /widgets not found");
    expect(err.status).toBe(404);
    expect(err.type).toBe("");
    expect(err.message).toBe("GET /widgets not found");
  });

  test("methodNotAllowedError prefixes the description", () => {
    const err = methodNotAllowedError("PUT /widgets");
    expect(err.message).toBe("Method not allowed, PUT /widgets");
    expect(err.status).toBe(405);
  });

  test("appError leaves the status undecided", () => {
    const err = appError(12, "quota", "Quota exceeded");
    expect(err.code).toBe(12);
    expect(err.type).toBe("quota");
    expect(err.status).toBe(0);
  });
});

describe("capability guards", () => {
  test("detect methods, not properties", () => {
    expect(isNamedError({ errorName: () => "teapot" })).toBe(true);
    expect(isHTTPEquivError({ statusCode: () => 418 })).toBe(true);
    expect(isHTTPEquivError({ statusCode: 418 })).toBe(false);
    expect(isCodedError({ errorCode: () => 7 })).toBe(true);
  });

  test("reject plain errors and primitives", () => {
    expect(isNamedError(new Error("x"))).toBe(false);
    expect(isNamedError(null)).toBe(false);
    expect(isNamedError("errorName")).toBe(false);
    expect(isCodedError(undefined)).toBe(false);
  });

  test("isAppError only accepts AppError instances", () => {
    expect(isAppError(jsonError("x"))).toBe(true);
    expect(isAppError({ type: "json", code: 9001, status: 400 })).toBe(false);
  });
});
