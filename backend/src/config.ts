import { z } from 'zod';

const MIB = 1024 * 1024;

const envSchema = z.object({
  POSTGRES_HOST: z.string().trim().min(1).default('localhost'),
  POSTGRES_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
  POSTGRES_USER: z.string().default('catalog'),
  POSTGRES_PASSWORD: z.string().default(''),
  POSTGRES_DB: z.string().trim().min(1).default('catalog'),
  POSTGRES_POOL_MAX: z.coerce.number().int().min(1).default(10),
  IMPORT_DOWNLOAD_TIMEOUT_MS: z.coerce.number().int().min(1).default(30_000),
  IMPORT_STATEMENT_TIMEOUT_MS: z.coerce.number().int().min(0).default(60_000),
  IMPORT_MAX_FILE_SIZE: z.coerce.number().int().min(1).default(50 * MIB),
});

export type DatabaseConfig = {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  max: number;
};

export type ImportConfig = {
  downloadTimeoutMs: number;
  statementTimeoutMs: number;
  maxFileSize: number;
};

export type AppConfig = {
  database: DatabaseConfig;
  import: ImportConfig;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    database: {
      host: parsed.POSTGRES_HOST,
      port: parsed.POSTGRES_PORT,
      user: parsed.POSTGRES_USER,
      password: parsed.POSTGRES_PASSWORD,
      database: parsed.POSTGRES_DB,
      max: parsed.POSTGRES_POOL_MAX,
    },
    import: {
      downloadTimeoutMs: parsed.IMPORT_DOWNLOAD_TIMEOUT_MS,
      statementTimeoutMs: parsed.IMPORT_STATEMENT_TIMEOUT_MS,
      maxFileSize: parsed.IMPORT_MAX_FILE_SIZE,
    },
  };
}
