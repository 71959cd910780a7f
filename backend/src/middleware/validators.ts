import { z } from "zod";
import { jobOptionsInputSchema } from "../services/jobOptions";

const locatorSchema = z.string().url("Invalid URL format").max(2048, "URL is too long");

export const processRequestSchema = z.object({
  locator: locatorSchema,
  scene: z.number().int().positive().nullable().optional(),
  options: jobOptionsInputSchema.optional(),
});

export const batchRequestSchema = z
  .object({
    /** Request list text, one `url` or `url|scene` per line. */
    list: z.string().max(1_000_000).optional(),
    items: z
      .array(
        z.object({
          locator: locatorSchema,
          scene: z.number().int().positive().nullable().optional(),
        })
      )
      .optional(),
    options: jobOptionsInputSchema.optional(),
  })
  .refine((body) => body.list !== undefined || body.items !== undefined, {
    message: "Either list or items is required",
  });

export const jobIdSchema = z.string().uuid("Invalid job ID format");

/** Flattens zod issues into one line for logs. */
export function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; ");
}
