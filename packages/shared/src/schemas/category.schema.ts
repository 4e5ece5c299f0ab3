import { z } from 'zod';
import { boundedText } from './text.schema.js';

export const categoryInputSchema = z.object({
  description: boundedText(3, 255),
});
