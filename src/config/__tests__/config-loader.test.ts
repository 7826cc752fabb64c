import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { loadConfigWithEnv, parseGroupIds, requireApiKey } from '../config-loader.js'
import { loadConfigFile } from '../config-service.js'
import { appConfigSchema } from '../config-types.js'
import { ConfigError } from '../../shared/errors.js'

const driveEnv = {
  GDRIVE_CLIENT_ID: 'test-client',
  GDRIVE_CLIENT_SECRET: 'test-secret',
  GDRIVE_REFRESH_TOKEN: 'test-refresh',
  GDRIVE_FOLDER_ID: 'folder-1',
}

describe('config loading', () => {
  let directory: string
  let configPath: string

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'ledger-digest-config-'))
    configPath = join(directory, 'config.json')
  })

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true })
  })

  describe('loadConfigWithEnv', () => {
    it('uses defaults without a file or env vars', async () => {
      const result = await loadConfigWithEnv({}, configPath)

      expect(result.source).toBe('defaults')
      expect(result.config).toEqual(appConfigSchema.parse({}))
      expect(result.notes).toEqual([])
    })

    it('reads credentials and groups from env vars', async () => {
      const result = await loadConfigWithEnv(
        { SPLITWISE_API_KEY: 'test-secret', SPLITWISE_GROUP_ID: '12, 34', LEDGER_DIGEST_OUTPUT_DIR: '/tmp/out' },
        configPath
      )

      expect(result.source).toBe('env')
      expect(result.config.splitwise.apiKey).toBe('test-secret')
      expect(result.config.splitwise.groupIds).toEqual([12, 34])
      expect(result.config.storage.outputDir).toBe('/tmp/out')
    })

    it('reads the config file', async () => {
      await writeFile(configPath, JSON.stringify({ splitwise: { apiKey: 'file-key', pageSize: 50 } }))

      const result = await loadConfigWithEnv({}, configPath)

      expect(result.source).toBe('file')
      expect(result.config.splitwise.apiKey).toBe('file-key')
      expect(result.config.splitwise.pageSize).toBe(50)
    })

    it('lets env vars override the file', async () => {
      await writeFile(
        configPath,
        JSON.stringify({ splitwise: { apiKey: 'file-key', pageSize: 50 }, reporting: { title: 'From file' } })
      )

      const result = await loadConfigWithEnv({ SPLITWISE_API_KEY: 'env-key', LEDGER_DIGEST_TITLE: 'From env' }, configPath)

      expect(result.source).toBe('mixed')
      expect(result.config.splitwise.apiKey).toBe('env-key')
      expect(result.config.splitwise.pageSize).toBe(50)
      expect(result.config.reporting.title).toBe('From env')
    })

    it('ignores blank env vars', async () => {
      const result = await loadConfigWithEnv({ SPLITWISE_API_KEY: '   ' }, configPath)

      expect(result.source).toBe('defaults')
      expect(result.config.splitwise.apiKey).toBeUndefined()
    })

    it('enables Google Drive when every credential is set', async () => {
      const result = await loadConfigWithEnv(driveEnv, configPath)

      expect(result.config.drive).toEqual({
        clientId: 'test-client',
        clientSecret: 'test-secret',
        refreshToken: 'test-refresh',
        folderId: 'folder-1',
      })
    })

    it('combines Drive credentials from the file and env vars', async () => {
      await writeFile(
        configPath,
        JSON.stringify({
          drive: { clientId: 'test-client', clientSecret: 'test-secret', refreshToken: 'old-refresh', folderId: 'folder-1' },
        })
      )

      const result = await loadConfigWithEnv({ GDRIVE_REFRESH_TOKEN: 'test-refresh' }, configPath)

      expect(result.config.drive?.refreshToken).toBe('test-refresh')
      expect(result.config.drive?.folderId).toBe('folder-1')
    })

    it('leaves Google Drive off with a note when credentials are partial', async () => {
      const { GDRIVE_FOLDER_ID: _folder, ...partial } = driveEnv

      const result = await loadConfigWithEnv(partial, configPath)

      expect(result.config.drive).toBeUndefined()
      expect(result.notes).toHaveLength(1)
      expect(result.notes[0]).toContain('GDRIVE_FOLDER_ID')
    })

    it('rejects an invalid config file', async () => {
      await writeFile(configPath, JSON.stringify({ splitwise: { pageSize: 0 } }))

      await expect(loadConfigWithEnv({}, configPath)).rejects.toThrow(
        `Invalid configuration in ${configPath}: splitwise.pageSize: Number must be greater than or equal to 1`
      )
    })
  })

  describe('loadConfigFile', () => {
    it('returns null for a missing file', async () => {
      await expect(loadConfigFile(configPath)).resolves.toBeNull()
    })

    it('rejects a file that is not JSON', async () => {
      await writeFile(configPath, '{ splitwise: ')

      await expect(loadConfigFile(configPath)).rejects.toBeInstanceOf(ConfigError)
    })

    it('rejects JSON that is not an object', async () => {
      await writeFile(configPath, '[1, 2]')

      await expect(loadConfigFile(configPath)).rejects.toThrow(`Config file ${configPath} must contain a JSON object`)
    })
  })
})

describe('parseGroupIds', () => {
  it('parses a comma-separated list', () => {
    expect(parseGroupIds('12,34, 56')).toEqual([12, 34, 56])
  })

  it('skips empty items', () => {
    expect(parseGroupIds('12,,')).toEqual([12])
  })

  it('rejects ids that are not positive integers', () => {
    expect(() => parseGroupIds('12,abc')).toThrow(new ConfigError('SPLITWISE_GROUP_ID contains an invalid group id: "abc"'))
    expect(() => parseGroupIds('-3')).toThrow(ConfigError)
  })
})

describe('requireApiKey', () => {
  it('returns the configured key', () => {
    const config = appConfigSchema.parse({ splitwise: { apiKey: 'test-secret' } })

    expect(requireApiKey(config)).toBe('test-secret')
  })

  it('names the variable to set when the key is missing', () => {
    expect(() => requireApiKey(appConfigSchema.parse({}))).toThrow(
      new ConfigError('Missing required configuration: SPLITWISE_API_KEY')
    )
  })
})
