import { z } from 'zod';

export const CitySchema = z.object({
  name: z.string().trim().min(1),
  query: z.string().trim().min(1),
});

export type City = z.infer<typeof CitySchema>;
