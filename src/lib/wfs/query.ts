/**
 * Parcel query normalization.
 */

import { z } from "zod";
import { REGISTERS } from "./wfs-config";
import type { ParcelQuery } from "./types";

export const MISSING_FILTER_MESSAGE = "Provide a cadastral zone or at least one parcel number.";

/**
 * Split free-form parcel input ("12/1, 12/2; 15  16") into labels.
 * Separators are commas, semicolons and whitespace; order is kept.
 */
export function parseParcelLabels(input: string | readonly string[] | undefined): string[] {
  if (input === undefined) return [];
  const parts = typeof input === "string" ? input.split(/[,;\s]+/) : input;
  return parts.map((part) => part.trim()).filter((part) => part.length > 0);
}

const optionalTrimmed = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const queryInputSchema = z
  .object({
    register: z
      .string()
      .default("C")
      .transform((value) => value.trim().toUpperCase())
      .pipe(z.enum(REGISTERS)),
    zoneCode: optionalTrimmed,
    parcels: z.union([z.string(), z.array(z.string())]).optional(),
    spatialReference: z.string().nullish().transform((value) => value?.trim() || undefined),
  })
  .transform(
    (input): ParcelQuery => ({
      register: input.register,
      zoneCode: input.zoneCode,
      parcelLabels: parseParcelLabels(input.parcels),
      spatialReference: input.spatialReference,
    }),
  )
  .refine(isQueryValid, { message: MISSING_FILTER_MESSAGE });

export type ParcelQueryInput = z.input<typeof queryInputSchema>;

export type QueryParseResult =
  | { ok: true; query: ParcelQuery }
  | { ok: false; message: string };

/** At least one of zone code or parcel labels must be present. */
export function isQueryValid(query: ParcelQuery): boolean {
  return Boolean(query.zoneCode?.trim()) || query.parcelLabels.some((label) => label.trim() !== "");
}

/**
 * Validate raw form/CLI input into a ParcelQuery.
 * Register defaults to "C" and is case-insensitive.
 */
export function createQuery(input: ParcelQueryInput): QueryParseResult {
  const parsed = queryInputSchema.safeParse(input);
  if (parsed.success) {
    return { ok: true, query: parsed.data };
  }
  return { ok: false, message: parsed.error.issues.map((issue) => issue.message).join("; ") };
}
