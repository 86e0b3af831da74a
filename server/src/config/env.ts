import { z } from 'zod';
import dotenv from 'dotenv';
import { existsSync } from 'fs';
import { resolve } from 'path';
import { loadQuestionSetConfig, type QuestionSetConfig } from './question-set.config.js';

// Load .env from the mounted secrets location or the working directory
const possiblePaths = [
  '/etc/secrets/.env',
  resolve(process.cwd(), '.env'),
  resolve(__dirname, '../../../.env'),
];

let envLoaded = false;
for (const envPath of possiblePaths) {
  if (existsSync(envPath)) {
    const result = dotenv.config({ path: envPath });
    if (result.error) {
      console.log(`Failed to load ${envPath}:`, result.error.message);
    } else {
      console.log(`✓ Loaded environment from: ${envPath}`);
      envLoaded = true;
      break;
    }
  }
}

if (!envLoaded) {
  console.log('No .env file found - using process environment variables only');
}

const envSchema = z.object({
  // Database
  DATABASE_URL: z.string().url(),

  // Runtime
  RUN_MODE: z.enum(['web', 'worker']).default('web'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().regex(/^\d+$/).transform(Number).default('3000'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

  // Publish job
  PUBLISH_JOB_INTERVAL_MINUTES: z.string().regex(/^\d+$/).transform(Number).default('10'),
});

export type Env = z.infer<typeof envSchema> & {
  questionSet: QuestionSetConfig;
};

let cachedEnv: Env | null = null;

export function validateEnv(): Env {
  if (cachedEnv) {
    return cachedEnv;
  }

  try {
    cachedEnv = {
      ...envSchema.parse(process.env),
      questionSet: loadQuestionSetConfig(process.env),
    };
    console.log('✓ Environment validation successful');
    return cachedEnv;
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('\n❌ Environment validation failed:');
      error.errors.forEach((err) => {
        const varName = err.path.join('.');
        console.error(`  - ${varName}: ${err.message}`);
      });
      console.error('\nSee .env.example for the expected variables.\n');
      process.exit(1);
    }
    throw error;
  }
}

export const env = validateEnv();
