import { describe, it, expect } from "vitest";
import { z } from "zod";
import { formatZodErrors } from "./zod-helpers.js";

describe("formatZodErrors", () => {
  it("formats a single field error", () => {
    const result = z.object({ numWindows: z.number() }).safeParse({ numWindows: "three" });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodErrors(result.error)).toEqual(["numWindows: Expected number, received string"]);
    }
  });

  it("joins nested paths with dots", () => {
    const schema = z.object({ walkForward: z.object({ trainRatio: z.number().max(1) }) });
    const result = schema.safeParse({ walkForward: { trainRatio: 2 } });

    expect(result.success).toBe(false);
    if (!result.success) {
      const errors = formatZodErrors(result.error);
      expect(errors).toHaveLength(1);
      expect(errors[0]).toMatch(/^walkForward\.trainRatio:/);
    }
  });

  it("labels root-level issues", () => {
    const result = z.number().safeParse("x");

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodErrors(result.error)).toEqual(["(root): Expected number, received string"]);
    }
  });
});
