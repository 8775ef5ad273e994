import { z } from 'zod';

const positiveInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug', 'trace']).default('info'),
  PORT: positiveInt('8080'),
  HOST: z.string().default('0.0.0.0'),
  CONFIG_PATH: z.string().default('config/config.yaml'),
  OUTPUT_PATH: z.string().default('output/data.jsonl'),
  PEOPLE_OUTPUT_PATH: z.string().default('output/people.jsonl'),
  // HTTP requests may only write below this directory
  OUTPUT_DIR: z.string().min(1).default('output'),
  SCRAPE_CONCURRENCY: positiveInt('3'),
  SCRAPE_MIN_TIME_MS: z.string().default('1000').transform(Number).pipe(z.number().int().min(0)),
  SCRAPE_MAX_ATTEMPTS: positiveInt('4'),
  SCRAPE_RETRY_DELAY_MS: z.string().default('1000').transform(Number).pipe(z.number().int().min(0)),
  SCRAPE_RETRY_MAX_DELAY_MS: positiveInt('60000'),
  SCRAPE_TIMEOUT_MS: positiveInt('30000'),
  USER_AGENT: z.string().default('malscrape/1.0'),
}).refine(data => data.SCRAPE_RETRY_DELAY_MS <= data.SCRAPE_RETRY_MAX_DELAY_MS, {
  message: 'SCRAPE_RETRY_DELAY_MS must not exceed SCRAPE_RETRY_MAX_DELAY_MS',
  path: ['SCRAPE_RETRY_DELAY_MS'],
});

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error('Environment validation failed:');
    result.error.issues.forEach(error => {
      console.error(`- ${error.path.join('.')}: ${error.message}`);
    });
    process.exit(1);
  }

  return result.data;
}

const env = validateEnv();
export default env;
export { envSchema };
