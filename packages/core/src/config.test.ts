import { mkdir, readFile, writeFile } from 'fs/promises'
import { join } from 'path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { cleanupTempDir, createTempDir } from './__tests__/test-utils.js'
import { ConfigManager, DEFAULT_CONFIG, loadConfig, parseConfig, SpecloomConfigSchema } from './config.js'

describe('ConfigManager', () => {
  let tempDir: string
  let configManager: ConfigManager

  beforeEach(async () => {
    tempDir = await createTempDir()
    configManager = new ConfigManager(tempDir)
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await cleanupTempDir(tempDir)
  })

  describe('readConfig()', () => {
    it('should return default config when file does not exist', async () => {
      const config = await configManager.readConfig()

      expect(config).toEqual(DEFAULT_CONFIG)
    })

    it('should read config from file', async () => {
      await writeFile(
        join(tempDir, 'specloom.yaml'),
        'root_dir: docs/specs\nvalidation:\n  strict: true\n',
        'utf-8'
      )

      const config = await configManager.readConfig()

      expect(config).toEqual({
        root_dir: 'docs/specs',
        validation: { strict: true },
        archive: { date_prefix: true },
      })
    })

    it('should return default config for invalid YAML', async () => {
      await writeFile(join(tempDir, 'specloom.yaml'), 'root_dir: [unclosed\n', 'utf-8')

      const config = await configManager.readConfig()

      expect(config).toEqual(DEFAULT_CONFIG)
      expect(console.warn).toHaveBeenCalledTimes(1)
    })

    it('should return default config for invalid schema', async () => {
      await writeFile(join(tempDir, 'specloom.yaml'), 'validation:\n  strict: sometimes\n', 'utf-8')

      const config = await configManager.readConfig()

      expect(config).toEqual(DEFAULT_CONFIG)
      expect(vi.mocked(console.warn).mock.calls[0][0]).toBe('Invalid config format, using defaults:')
    })
  })

  describe('writeConfig()', () => {
    it('should merge with the current config', async () => {
      await configManager.writeConfig({ archive: { date_prefix: false } })
      await configManager.writeConfig({ validation: { strict: true } })

      expect(await configManager.readConfig()).toEqual({
        root_dir: 'specloom',
        validation: { strict: true },
        archive: { date_prefix: false },
      })
      expect(await readFile(join(tempDir, 'specloom.yaml'), 'utf-8')).toBe(
        'root_dir: specloom\nvalidation:\n  strict: true\narchive:\n  date_prefix: false\n'
      )
    })
  })
})

describe('loadConfig', () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await createTempDir()
  })

  afterEach(async () => {
    await cleanupTempDir(tempDir)
  })

  it('should find the config file in a parent directory', async () => {
    const nested = join(tempDir, 'a', 'b')
    await mkdir(nested, { recursive: true })
    await writeFile(join(tempDir, 'specloom.yaml'), 'root_dir: spec\n', 'utf-8')

    const loaded = await loadConfig(nested)

    expect(loaded.projectDir).toBe(tempDir)
    expect(loaded.configPath).toBe(join(tempDir, 'specloom.yaml'))
    expect(loaded.config.root_dir).toBe('spec')
  })
})

describe('parseConfig', () => {
  it('should treat an empty file as defaults', () => {
    expect(parseConfig('')).toEqual(DEFAULT_CONFIG)
  })

  it('should fill nested defaults', () => {
    expect(SpecloomConfigSchema.parse({ archive: {} })).toEqual(DEFAULT_CONFIG)
  })
})
