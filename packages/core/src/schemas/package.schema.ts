import { z } from 'zod';

export const PackageJsonSchema = z.object({
  name: z.string(),
  version: z.string(),
});
