import { z } from "zod";

export const companyRecordSchema = z
  .object({
    name: z
      .string()
      .trim()
      .min(1, "Company name is required")
      .max(300, "Company name must be less than 300 characters"),
  })
  .catchall(z.string());

// Spreadsheet exports write these for empty website cells
export const EMPTY_WEBSITE_VALUES = ["", "nan", "none", "null"] as const;

export const existingWebsiteSchema = z
  .string()
  .trim()
  .refine(
    (val) => !(EMPTY_WEBSITE_VALUES as readonly string[]).includes(val.toLowerCase()),
    "Website is empty"
  );
