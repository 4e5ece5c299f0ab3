import { z } from 'zod';

/** String whose length bounds count code points, not UTF-16 units. */
export function boundedText(min: number, max: number) {
  return z.string().superRefine((value, ctx) => {
    const length = [...value].length;
    if (length < min) {
      ctx.addIssue({
        code: z.ZodIssueCode.too_small,
        type: 'string',
        minimum: min,
        inclusive: true,
        message: `String must contain at least ${min} character(s)`,
      });
    } else if (length > max) {
      ctx.addIssue({
        code: z.ZodIssueCode.too_big,
        type: 'string',
        maximum: max,
        inclusive: true,
        message: `String must contain at most ${max} character(s)`,
      });
    }
  });
}
