import { ConfigError } from '../shared/errors.js'
import { loadConfigFile } from './config-service.js'
import { appConfigSchema, type AppConfig } from './config-types.js'

/**
 * Environment variable names for CLI automation (CI, cron)
 */
export const ENV_VARS = {
  SPLITWISE_API_KEY: 'SPLITWISE_API_KEY',
  SPLITWISE_GROUP_ID: 'SPLITWISE_GROUP_ID',
  GDRIVE_CLIENT_ID: 'GDRIVE_CLIENT_ID',
  GDRIVE_CLIENT_SECRET: 'GDRIVE_CLIENT_SECRET',
  GDRIVE_REFRESH_TOKEN: 'GDRIVE_REFRESH_TOKEN',
  GDRIVE_FOLDER_ID: 'GDRIVE_FOLDER_ID',
  OUTPUT_DIR: 'LEDGER_DIGEST_OUTPUT_DIR',
  TITLE: 'LEDGER_DIGEST_TITLE',
} as const

export type Env = Record<string, string | undefined>

export interface LoadConfigResult {
  config: AppConfig
  source: 'env' | 'file' | 'mixed' | 'defaults'
  /** Non-fatal observations, e.g. an incomplete Google Drive setup */
  notes: string[]
}

/**
 * Validates a config object, turning zod issues into a ConfigError.
 */
export const parseAppConfig = (input: unknown, origin: string): AppConfig => {
  const result = appConfigSchema.safeParse(input)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new ConfigError(`Invalid configuration in ${origin}: ${issues.join('; ')}`, issues)
  }
  return result.data
}

/**
 * Parses a comma-separated list of group ids ("123, 456").
 */
export const parseGroupIds = (value: string): number[] =>
  value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part) => {
      const id = Number(part)
      if (!Number.isInteger(id) || id <= 0) {
        throw new ConfigError(`${ENV_VARS.SPLITWISE_GROUP_ID} contains an invalid group id: "${part}"`)
      }
      return id
    })

const nonEmpty = (value: string | undefined): string | undefined =>
  value && value.trim().length > 0 ? value.trim() : undefined

/**
 * Load config from the config file with environment variables on top.
 * Env vars take priority over config file values.
 */
export const loadConfigWithEnv = async (
  env: Env = process.env,
  configPath?: string
): Promise<LoadConfigResult> => {
  const fileInput = await loadConfigFile(configPath)
  const fileConfig = parseAppConfig(fileInput ?? {}, configPath ?? 'config file')
  const notes: string[] = []

  const apiKey = nonEmpty(env[ENV_VARS.SPLITWISE_API_KEY])
  const groupIdsValue = nonEmpty(env[ENV_VARS.SPLITWISE_GROUP_ID])
  const outputDir = nonEmpty(env[ENV_VARS.OUTPUT_DIR])
  const title = nonEmpty(env[ENV_VARS.TITLE])

  const envDrive = {
    clientId: nonEmpty(env[ENV_VARS.GDRIVE_CLIENT_ID]),
    clientSecret: nonEmpty(env[ENV_VARS.GDRIVE_CLIENT_SECRET]),
    refreshToken: nonEmpty(env[ENV_VARS.GDRIVE_REFRESH_TOKEN]),
    folderId: nonEmpty(env[ENV_VARS.GDRIVE_FOLDER_ID]),
  }
  const clientId = envDrive.clientId ?? fileConfig.drive?.clientId
  const clientSecret = envDrive.clientSecret ?? fileConfig.drive?.clientSecret
  const refreshToken = envDrive.refreshToken ?? fileConfig.drive?.refreshToken
  const folderId = envDrive.folderId ?? fileConfig.drive?.folderId

  const drive =
    clientId && clientSecret && refreshToken && folderId
      ? { clientId, clientSecret, refreshToken, folderId }
      : undefined
  if (!drive && (clientId || clientSecret || refreshToken || folderId)) {
    notes.push(
      `Google Drive not configured: set all of ${ENV_VARS.GDRIVE_CLIENT_ID}, ${ENV_VARS.GDRIVE_CLIENT_SECRET}, ${ENV_VARS.GDRIVE_REFRESH_TOKEN} and ${ENV_VARS.GDRIVE_FOLDER_ID}`
    )
  }

  const merged: AppConfig = {
    ...fileConfig,
    splitwise: {
      ...fileConfig.splitwise,
      apiKey: apiKey ?? fileConfig.splitwise.apiKey,
      groupIds: groupIdsValue ? parseGroupIds(groupIdsValue) : fileConfig.splitwise.groupIds,
    },
    drive,
    storage: { outputDir: outputDir ?? fileConfig.storage.outputDir },
    reporting: { ...fileConfig.reporting, title: title ?? fileConfig.reporting.title },
  }

  const fromEnv = [apiKey, groupIdsValue, outputDir, title, ...Object.values(envDrive)].some(Boolean)
  let source: LoadConfigResult['source']
  if (fileInput && fromEnv) source = 'mixed'
  else if (fileInput) source = 'file'
  else if (fromEnv) source = 'env'
  else source = 'defaults'

  return { config: parseAppConfig(merged, 'environment'), source, notes }
}

/**
 * The Splitwise API key, or a ConfigError naming the variable to set.
 * Called before any live fetch.
 */
export const requireApiKey = (config: AppConfig): string => {
  if (!config.splitwise.apiKey) {
    throw new ConfigError(
      `Missing required configuration: ${ENV_VARS.SPLITWISE_API_KEY}`,
      `Set ${ENV_VARS.SPLITWISE_API_KEY} or add splitwise.apiKey to the config file.`
    )
  }
  return config.splitwise.apiKey
}
