import { z } from 'zod';

const envScheme = z.object({
  ICMCTL_HOME: z.string().optional(),
  ICM_KEY: z.string().optional(),
  GITHUB_TOKEN: z.string().optional(),
  LOG_LEVEL: z.string().optional(),
  LOG_FORMAT: z.string().optional(),
});

const parsedEnv = envScheme.safeParse(process.env);

export const ENV = parsedEnv.success ? parsedEnv.data : {};
