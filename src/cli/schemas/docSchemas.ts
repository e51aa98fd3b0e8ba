import { z } from 'zod';

export const DocSchema = z.object({
  target: z.string().trim().min(1, 'A package or package.symbol target is required'),
  width: z.coerce.number().int().min(40).max(200).optional(),
});

export type DocInput = z.infer<typeof DocSchema>;
