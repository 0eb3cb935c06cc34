import { createEntryService, type EntryService } from '../entry-service'
import { EntryNotFoundError, InvalidIdentityError, ValidationFailedError } from '../errors'
import type { DatabaseConnection } from '../sqlite'
import { openMigratedDatabase, silenceConsole, steppingClock } from './helpers'

describe('entry queries', () => {
  let connection: DatabaseConnection
  let service: EntryService

  beforeEach(() => {
    silenceConsole()
    connection = openMigratedDatabase()
    service = createEntryService(connection.db, { now: steppingClock('2025-01-15T09:00:00.000Z') })

    service.submitWeek('Jo Smith', [
      { date: '2025-01-08', location: 'remote' },
      { date: '2025-01-06', location: 'on-site' },
      { date: '2025-01-13', location: 'on-site' },
    ])
    service.submitWeek('Ann Lee', [
      { date: '2025-01-06', location: 'client-site', client: 'Acme' },
      { date: '2025-01-07', location: 'leave' },
    ])
    service.submitWeek('bob', [{ date: '2025-01-14', location: 'abroad' }])
  })

  afterEach(() => {
    connection.close()
  })

  describe('getWeekForUser', () => {
    it('should return one person\'s days in the week whatever the casing', () => {
      const entries = service.getWeekForUser('  JO SMITH ', '2025-01-06')

      expect(entries.map((entry) => [entry.date, entry.location])).toEqual([
        ['2025-01-06', 'on-site'],
        ['2025-01-08', 'remote'],
      ])
    })

    it('should reject a malformed week start', () => {
      expect(() => service.getWeekForUser('Jo Smith', '2025-1-6')).toThrow(ValidationFailedError)
    })

    it('should reject a blank name', () => {
      expect(() => service.getWeekForUser(' ', '2025-01-06')).toThrow(InvalidIdentityError)
    })
  })

  describe('getWeekSummary', () => {
    it('should list everyone\'s days ordered by date then person', () => {
      const entries = service.getWeekSummary('2025-01-06')

      expect(entries.map((entry) => [entry.date, entry.userKey])).toEqual([
        ['2025-01-06', 'ann lee'],
        ['2025-01-06', 'jo smith'],
        ['2025-01-07', 'ann lee'],
        ['2025-01-08', 'jo smith'],
      ])
    })
  })

  describe('listKnownUsers', () => {
    it('should list everyone when no week is given', () => {
      expect(service.listKnownUsers()).toEqual(['Ann Lee', 'bob', 'Jo Smith'])
    })

    it('should list only people with entries in the week', () => {
      expect(service.listKnownUsers('2025-01-13')).toEqual(['bob', 'Jo Smith'])
    })

    it('should show the latest spelling of a name', () => {
      service.submitWeek('ann LEE', [{ date: '2025-01-08', location: 'remote' }])

      expect(service.listKnownUsers('2025-01-06')).toEqual(['ann LEE', 'Jo Smith'])
    })
  })

  describe('checkExistingEntries', () => {
    it('should report existing entries for the week', () => {
      const result = service.checkExistingEntries('ann lee', '2025-01-06')

      expect(result.exists).toBe(true)
      expect(result.count).toBe(2)
      expect(result.entries.map((entry) => entry.date)).toEqual(['2025-01-06', '2025-01-07'])
    })

    it('should report nothing for an unknown person', () => {
      expect(service.checkExistingEntries('Nobody', '2025-01-06')).toEqual({
        exists: false,
        count: 0,
        entries: [],
      })
    })
  })

  describe('listEntries', () => {
    it('should filter by an open-ended date range', () => {
      expect(service.listEntries({ from: '2025-01-13' }).map((entry) => entry.date)).toEqual([
        '2025-01-13',
        '2025-01-14',
      ])
      expect(service.listEntries({ to: '2025-01-06' })).toHaveLength(2)
      expect(service.listEntries()).toHaveLength(6)
    })
  })

  describe('deleteEntry', () => {
    it('should remove exactly one row', () => {
      const [target] = service.listEntries({ from: '2025-01-14' })

      service.deleteEntry(target.id)

      expect(service.listEntries()).toHaveLength(5)
      expect(service.listKnownUsers()).toEqual(['Ann Lee', 'Jo Smith'])
    })

    it('should fail for an unknown id', () => {
      expect(() => service.deleteEntry(9999)).toThrow(EntryNotFoundError)
    })
  })

  describe('getAttendance', () => {
    it('should count office and client days per person', () => {
      expect(service.getAttendance('2025-01-06')).toEqual({
        weekStart: '2025-01-06',
        weekEnd: '2025-01-10',
        lines: [
          { userName: 'Ann Lee', officeDays: 1 },
          { userName: 'Jo Smith', officeDays: 1 },
        ],
      })
    })

    it('should default to the previous week', () => {
      expect(service.getAttendance().weekStart).toBe('2025-01-06')
    })
  })

  it('should expose the migration status', () => {
    expect(service.getMigrationStatus()).toEqual({
      phase: 'done',
      lastError: null,
      updatedAt: '2025-01-01T00:00:00.000Z',
    })
  })
})
