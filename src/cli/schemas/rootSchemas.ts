import { z } from 'zod';

export const RootSchema = z.object({});
