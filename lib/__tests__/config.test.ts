import { getConfig, loadConfig, resetConfig } from '../config'

describe('config', () => {
  afterEach(() => {
    resetConfig()
  })

  it('should fall back to defaults', () => {
    expect(loadConfig({})).toEqual({ databasePath: './worktracker.db', busyTimeoutMs: 5000 })
  })

  it('should read values from the environment', () => {
    expect(loadConfig({ DATABASE_PATH: ':memory:', SQLITE_BUSY_TIMEOUT_MS: '250' })).toEqual({
      databasePath: ':memory:',
      busyTimeoutMs: 250,
    })
  })

  it('should name the variable that is invalid', () => {
    expect(() => loadConfig({ SQLITE_BUSY_TIMEOUT_MS: 'soon' })).toThrow(/SQLITE_BUSY_TIMEOUT_MS/)
  })

  it('should cache the configuration until reset', () => {
    process.env.DATABASE_PATH = 'first.db'
    const first = getConfig()
    process.env.DATABASE_PATH = 'second.db'

    expect(getConfig()).toBe(first)
    resetConfig()
    expect(getConfig().databasePath).toBe('second.db')

    delete process.env.DATABASE_PATH
  })
})
