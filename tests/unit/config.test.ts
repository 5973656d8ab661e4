import { describe, it, expect } from 'vitest'
import { DEFAULT_INPUT_PATH, loadConfig } from '../../src/config.js'
import { ConfigurationError } from '../../src/utils/errors.js'

describe('loadConfig', () => {
  it('should fall back to defaults', () => {
    expect(loadConfig({})).toEqual({
      inputPath: DEFAULT_INPUT_PATH,
      logLevel: 'warn',
      format: 'text',
    })
  })

  it('should read values from the environment', () => {
    expect(
      loadConfig({
        RECORD_VALIDATOR_INPUT: 'people.json',
        RECORD_VALIDATOR_FORMAT: 'json',
        LOG_LEVEL: 'debug',
      })
    ).toEqual({ inputPath: 'people.json', logLevel: 'debug', format: 'json' })
  })

  it('should treat empty variables as unset', () => {
    expect(loadConfig({ RECORD_VALIDATOR_INPUT: '', LOG_LEVEL: '' }).inputPath).toBe('data.json')
  })

  it('should reject an unknown log level', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(ConfigurationError)
  })

  it('should reject an unknown format', () => {
    try {
      loadConfig({ RECORD_VALIDATOR_FORMAT: 'csv' })
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError)
      expect((error as ConfigurationError).field).toBe('RECORD_VALIDATOR_FORMAT')
    }
  })
})
