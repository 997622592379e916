import { z } from 'zod';

// Integer strings such as "50" are accepted alongside numbers.
const integerSchema = z.union([z.number().int(), z.string().regex(/^-?\d+$/).transform(Number)]);

export const awardActionSchema = z.object({
  action: z.string(),
  points: integerSchema.default(0),
});
