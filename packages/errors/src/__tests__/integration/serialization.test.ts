import { describe, expect, it } from "vitest";
import {
  ExternalError,
  NotFoundError,
  ProblemDetailsSchema,
  serializeToRFC9457,
  ValidationError,
  wrapError,
} from "../../index.js";

describe("RFC 9457 serialization", () => {
  it("serializes a ValidationError with issues", () => {
    const error = new ValidationError("Invalid query parameters", [
      { field: "seconds", message: "Required", code: "invalid_type" },
    ]);
    const problem = serializeToRFC9457(error, "/set");

    expect(problem).toMatchObject({
      type: "/errors/VALIDATION_FAILED",
      title: "Validation failed",
      status: 400,
      detail: "Invalid query parameters",
      instance: "/set",
      code: "VALIDATION_FAILED",
      domain: "validation",
      errors: [{ field: "seconds", message: "Required", code: "invalid_type" }],
    });
    expect(ProblemDetailsSchema.safeParse(problem).success).toBe(true);
  });

  it("omits optional members that are not set", () => {
    const problem = serializeToRFC9457(new NotFoundError("No route for /nope"));

    expect(problem.instance).toBeUndefined();
    expect(problem.traceId).toBeUndefined();
    expect(problem.metadata).toBeUndefined();
    expect(problem.errors).toBeUndefined();
  });

  it("serializes a wrapped foreign error as INTERNAL_ERROR", () => {
    const problem = serializeToRFC9457(wrapError(new Error("kaput")), "/start");

    expect(problem.status).toBe(500);
    expect(problem.code).toBe("INTERNAL_ERROR");
    expect(problem.detail).toBe("kaput");
    expect(problem.instance).toBe("/start");
    expect(problem.metadata).toEqual({ originalName: "Error" });
  });

  it("uses the catalog title and keeps metadata and trace id", () => {
    const error = new ExternalError({
      code: "PERSISTENCE_READ_FAILED",
      message: "EIO",
      metadata: { path: "/tmp/state.json" },
      traceId: "trace-1",
    });
    const problem = serializeToRFC9457(error);

    expect(problem).toMatchObject({
      type: "/errors/PERSISTENCE_READ_FAILED",
      title: "Snapshot read failed",
      status: 503,
      domain: "persistence",
      metadata: { path: "/tmp/state.json" },
      traceId: "trace-1",
    });
    expect(ProblemDetailsSchema.safeParse(problem).success).toBe(true);
  });

  it("rejects bodies with an out-of-range status", () => {
    expect(ProblemDetailsSchema.safeParse({ type: "/errors/X", title: "X", status: 99 }).success).toBe(
      false,
    );
  });
});
