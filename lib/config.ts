import { z } from 'zod'

const envSchema = z.object({
  DATABASE_PATH: z.string().min(1).default('./worktracker.db'),
  SQLITE_BUSY_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
})

export interface AppConfig {
  databasePath: string
  busyTimeoutMs: number
}

let cachedConfig: AppConfig | null = null

export function loadConfig(env: Partial<NodeJS.ProcessEnv> = process.env): AppConfig {
  const result = envSchema.safeParse(env)
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new Error(`Invalid environment configuration (${problems})`)
  }

  return {
    databasePath: result.data.DATABASE_PATH,
    busyTimeoutMs: result.data.SQLITE_BUSY_TIMEOUT_MS,
  }
}

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig()
  }
  return cachedConfig
}

export function resetConfig() {
  cachedConfig = null
}
