import { ValidationFailedError, type ValidationIssue } from '../errors'
import type { DayRecordInput } from '../schemas'
import { parseDayRecords } from '../upsert'

function issuesOf(inputs: DayRecordInput[]): ValidationIssue[] {
  try {
    parseDayRecords(inputs)
  } catch (error) {
    if (error instanceof ValidationFailedError) return error.issues
    throw error
  }
  throw new Error('expected validation to fail')
}

describe('parseDayRecords', () => {
  it('should normalize a valid day', () => {
    expect(parseDayRecords([{ date: '2025-01-06', location: 'on-site', notes: '  in early  ' }])).toEqual([
      { date: '2025-01-06', location: 'on-site', clientDescription: null, notes: 'in early' },
    ])
  })

  it('should map legacy location names onto the enumeration', () => {
    const records = parseDayRecords([
      { date: '2025-01-06', location: 'WFH' },
      { date: '2025-01-07', location: 'Neal Street' },
      { date: '2025-01-08', location: 'Client Office', client: 'Acme' },
      { date: '2025-01-09', location: 'PTO' },
    ])

    expect(records.map((record) => record.location)).toEqual(['remote', 'on-site', 'client-site', 'leave'])
  })

  it('should require a client for client-site days', () => {
    expect(issuesOf([{ date: '2025-01-06', location: 'client-site' }])).toEqual([
      {
        index: 0,
        date: '2025-01-06',
        field: 'client',
        message: 'Client name is required when location is client-site',
      },
    ])
  })

  it('should accept a client-site day with a client and trim it', () => {
    expect(parseDayRecords([{ date: '2025-01-06', location: 'client-site', client: '  Acme ' }])).toEqual([
      { date: '2025-01-06', location: 'client-site', clientDescription: 'Acme', notes: null },
    ])
  })

  it('should require a description for other days', () => {
    expect(issuesOf([{ date: '2025-01-06', location: 'other', client: '   ' }])).toEqual([
      {
        index: 0,
        date: '2025-01-06',
        field: 'client',
        message: 'Location description is required when location is other',
      },
    ])
  })

  it('should reject a client on a day that does not take one', () => {
    expect(issuesOf([{ date: '2025-01-06', location: 'remote', client: 'Acme' }])).toEqual([
      { index: 0, date: '2025-01-06', field: 'client', message: 'Client must be empty when location is remote' },
    ])
  })

  it('should name the day with an impossible date', () => {
    expect(issuesOf([
      { date: '2025-01-06', location: 'remote' },
      { date: '2025-02-30', location: 'remote' },
    ])).toEqual([
      { index: 1, date: '2025-02-30', field: 'date', message: 'Date must be a calendar day in YYYY-MM-DD format' },
    ])
  })

  it('should reject unknown locations', () => {
    const issues = issuesOf([{ date: '2025-01-06', location: 'Beach' }])

    expect(issues).toHaveLength(1)
    expect(issues[0]).toMatchObject({ index: 0, date: '2025-01-06', field: 'location' })
  })

  it('should reject a date submitted twice', () => {
    expect(issuesOf([
      { date: '2025-01-06', location: 'on-site' },
      { date: '2025-01-06', location: 'remote' },
    ])).toEqual([
      { index: 1, date: '2025-01-06', field: 'date', message: 'Date appears more than once in the submission' },
    ])
  })

  it('should reject an empty submission', () => {
    expect(issuesOf([])).toEqual([{ field: 'entries', message: 'At least one day entry is required' }])
  })

  it('should describe the offending day in the error message', () => {
    expect(() => parseDayRecords([{ date: '2025-01-06', location: 'client-site' }])).toThrow(
      'day 1 (2025-01-06) client: Client name is required when location is client-site'
    )
  })
})
