/**
 * Primitive / reusable Zod types for the review workflow model.
 */
import { z } from "zod";

// ---------------------------------------------------------------------------
// Scalars
// ---------------------------------------------------------------------------

export const NonEmptyString = z.string().trim().min(1);
export const ISODate = z.string().date();           // "YYYY-MM-DD"
export const ISODateTime = z.string().datetime({ offset: true }).or(z.string().datetime());
export const Email = z.string().email();
export const Phone = z.string().regex(/^\+?[0-9]{9,15}$/, "Numeric phone, 9-15 digits");

/** Timestamps read back from the database arrive as Date or ISO text. */
export const Timestamp = z.coerce.date();
export const NullableTimestamp = z.union([z.null(), z.coerce.date()]);

// ---------------------------------------------------------------------------
// Jurisdiction (routing key for reviewer pools)
// ---------------------------------------------------------------------------

export const JurisdictionSchema = z.object({
  region: NonEmptyString,
  district: z.string().trim().default(""),
  constituency: z.string().trim().default(""),
});

export type Jurisdiction = z.infer<typeof JurisdictionSchema>;

export const JurisdictionScopeEnum = z.enum(["CONSTITUENCY", "DISTRICT", "REGION", "NATIONAL"]);

export type JurisdictionScope = z.infer<typeof JurisdictionScopeEnum>;
