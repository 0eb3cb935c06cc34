import type { Entry } from './db-schema'

// Wire shapes keep the field names the form has always sent and read

export interface EntryResponse {
  id: number
  user_name: string
  user_key: string
  date: string
  location: string
  client: string | null
  notes: string | null
  created_at: string
  updated_at: string
}

export interface SummaryRow {
  user_name: string
  date: string
  location: string
  client: string | null
  notes: string | null
}

export function toEntryResponse(entry: Entry): EntryResponse {
  return {
    id: entry.id,
    user_name: entry.displayName,
    user_key: entry.userKey,
    date: entry.date,
    location: entry.location,
    client: entry.clientDescription,
    notes: entry.notes,
    created_at: entry.createdAt,
    updated_at: entry.updatedAt,
  }
}

export function toSummaryRow(entry: Entry): SummaryRow {
  return {
    user_name: entry.displayName,
    date: entry.date,
    location: entry.location,
    client: entry.clientDescription,
    notes: entry.notes,
  }
}
