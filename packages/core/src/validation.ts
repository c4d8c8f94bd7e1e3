import { z } from 'zod';

/**
 * Inbound request schemas
 *
 * A tracking number is accepted as typed by a person ("PRO# 0628-143046"); separators
 * and the PRO label are removed later by the identifier.
 */

export const TrackingNumberInputSchema = z
  .string()
  .trim()
  .min(1, 'trackingNumber must not be empty')
  .max(64, 'trackingNumber must be at most 64 characters');

export const CarrierHintSchema = z
  .string()
  .trim()
  .regex(/^[a-z0-9_]+$/i, 'carrierHint must be a carrier identifier')
  .transform((value) => value.toLowerCase());

export const TrackRequestSchema = z.object({
  trackingNumber: TrackingNumberInputSchema,
  carrierHint: CarrierHintSchema.optional(),
});

export type TrackRequest = z.infer<typeof TrackRequestSchema>;

export const BatchRequestSchema = z.object({
  trackingNumbers: z
    .array(TrackingNumberInputSchema)
    .min(1, 'trackingNumbers must contain at least one entry')
    .max(500, 'trackingNumbers must contain at most 500 entries'),
  carrierHint: CarrierHintSchema.optional(),
});

export type BatchRequest = z.infer<typeof BatchRequestSchema>;

/**
 * Helper: validate a single track request
 */
export function safeValidateTrackRequest(input: unknown) {
  return TrackRequestSchema.safeParse(input);
}

/**
 * Helper: validate a batch request
 */
export function safeValidateBatchRequest(input: unknown) {
  return BatchRequestSchema.safeParse(input);
}
