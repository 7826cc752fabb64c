import { homedir } from 'node:os'
import { join } from 'node:path'
import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { ConfigError, errorMessage } from '../shared/errors.js'

const CONFIG_DIR = join(homedir(), '.config', 'ledger-digest')
const CONFIG_FILE = join(CONFIG_DIR, 'config.json')

export const getConfigPath = () => CONFIG_FILE

const configObjectSchema = z.record(z.string(), z.unknown())

/**
 * Reads the JSON config file. A missing file yields null; a file that exists
 * but cannot be read or parsed is a ConfigError. Schema validation happens
 * after env vars are merged in.
 */
export const loadConfigFile = async (path: string = CONFIG_FILE): Promise<Record<string, unknown> | null> => {
  let content: string
  try {
    content = await readFile(path, 'utf-8')
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null
    throw new ConfigError(`Cannot read config file ${path}: ${errorMessage(error)}`)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch (error) {
    throw new ConfigError(`Config file ${path} is not valid JSON: ${errorMessage(error)}`)
  }

  const result = configObjectSchema.safeParse(parsed)
  if (!result.success) {
    throw new ConfigError(`Config file ${path} must contain a JSON object`)
  }
  return result.data
}
