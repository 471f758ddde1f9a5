import { z } from 'zod';

const NonNegativeIntSchema = z.number().int().nonnegative();

/**
 * Ideal Customer Profile as it travels over HTTP. `min <= max` is expected
 * for both ranges and is not enforced. Unknown keys are dropped.
 */
export const IcpSchema = z.object({
  industries: z.array(z.string().trim().min(1)).min(1),
  revenue_min: NonNegativeIntSchema,
  revenue_max: NonNegativeIntSchema,
  headcount_min: NonNegativeIntSchema,
  headcount_max: NonNegativeIntSchema,
});

export type IcpPayload = z.infer<typeof IcpSchema>;
