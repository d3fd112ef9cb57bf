/**
 * SQLite Adapter
 *
 * Production implementation of the calendar event adapter using better-sqlite3.
 * Constraint failures surface as the adapter error classes.
 */
import Database from 'better-sqlite3'
import type { Adapter, CalendarEvent, EventId, LocalDateTime } from './adapter'
import { DuplicateKeyError, InvalidDataError, NotFoundError } from './adapter'

export { DuplicateKeyError, InvalidDataError, NotFoundError }

// ============================================================================
// Extended type for SQLite-specific introspection methods
// ============================================================================

export type SqliteExtras = {
  close(): Promise<void>
  listTables(): Promise<string[]>
  listIndices(table: string): Promise<string[]>
  inTransaction(): Promise<boolean>
  getSchemaVersion(): Promise<number>
}

export type SqliteAdapter = Adapter & SqliteExtras

const SCHEMA_VERSION = 1

// ============================================================================
// Schema DDL
// ============================================================================

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS calendar_event (
    id TEXT PRIMARY KEY,
    student_id TEXT NOT NULL,
    title TEXT NOT NULL CHECK (length(title) > 0),
    start_at TEXT NOT NULL,
    end_at TEXT NOT NULL,
    location TEXT,
    module_id TEXT,
    created_at TEXT NOT NULL,
    CHECK (end_at > start_at)
  );
  CREATE INDEX IF NOT EXISTS idx_calendar_event_student_start ON calendar_event(student_id, start_at);

  CREATE TABLE IF NOT EXISTS schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT NOT NULL
  );
`

// ============================================================================
// Error Mapping
// ============================================================================

function mapError(e: unknown): never {
  const msg = e instanceof Error ? e.message : String(e)
  if (/UNIQUE constraint/i.test(msg)) throw new DuplicateKeyError(msg)
  if (/CHECK constraint|NOT NULL constraint/i.test(msg)) throw new InvalidDataError(msg)
  throw e
}

function safe<T>(fn: () => T): T {
  try { return fn() }
  catch (e) { mapError(e) }
}

// ============================================================================
// SQL Row Types
// ============================================================================

type EventRow = {
  id: string
  student_id: string
  title: string
  start_at: string
  end_at: string
  location: string | null
  module_id: string | null
  created_at: string
}

type SchemaVersionRow = {
  v: number | null
}

type NameRow = {
  name: string
}

// ============================================================================
// Row → Domain Mappers
// ============================================================================

function toEvent(row: EventRow): CalendarEvent {
  return {
    id: row.id as EventId,
    studentId: row.student_id,
    title: row.title,
    startAt: row.start_at as LocalDateTime,
    endAt: row.end_at as LocalDateTime,
    ...(row.location != null ? { location: row.location } : {}),
    ...(row.module_id != null ? { moduleId: row.module_id } : {}),
    createdAt: row.created_at,
  }
}

// ============================================================================
// Factory
// ============================================================================

export async function createSqliteAdapter(path: string): Promise<SqliteAdapter> {
  const db = new Database(path)
  db.exec(SCHEMA_SQL)

  const ver = db.prepare('SELECT MAX(version) as v FROM schema_version').get() as SchemaVersionRow | undefined
  if (ver?.v == null) {
    db.prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
      SCHEMA_VERSION, new Date().toISOString(),
    )
  }

  let _inTx = false

  const adapter: SqliteAdapter = {
    // ================================================================
    // Transaction
    // ================================================================
    async transaction<T>(fn: () => Promise<T>): Promise<T> {
      if (_inTx) return await fn()
      _inTx = true
      db.exec('BEGIN IMMEDIATE')
      try {
        const result = await fn()
        db.exec('COMMIT')
        return result
      } catch (e) {
        db.exec('ROLLBACK')
        throw e
      } finally {
        _inTx = false
      }
    },

    // ================================================================
    // Events
    // ================================================================
    async createEvent(event: CalendarEvent) {
      safe(() =>
        db.prepare(
          'INSERT INTO calendar_event (id, student_id, title, start_at, end_at, location, module_id, created_at) VALUES (?, ?, ?, ?, ?, ?, ?, ?)',
        ).run(
          event.id,
          event.studentId,
          event.title,
          event.startAt,
          event.endAt,
          event.location ?? null,
          event.moduleId ?? null,
          event.createdAt,
        ),
      )
    },

    async getEvent(id: EventId) {
      const row = db.prepare('SELECT * FROM calendar_event WHERE id = ?').get(id) as EventRow | undefined
      return row ? toEvent(row) : null
    },

    async getEventsByStudent(studentId: string) {
      const rows = db.prepare(
        'SELECT * FROM calendar_event WHERE student_id = ? ORDER BY start_at, id',
      ).all(studentId) as EventRow[]
      return rows.map(toEvent)
    },

    async getEventsStartingBetween(studentId: string, from: LocalDateTime, to: LocalDateTime) {
      const rows = db.prepare(`
        SELECT * FROM calendar_event
        WHERE student_id = ? AND start_at >= ? AND start_at <= ?
        ORDER BY start_at, id
      `).all(studentId, from, to) as EventRow[]
      return rows.map(toEvent)
    },

    async deleteEvent(id: EventId) {
      const info = db.prepare('DELETE FROM calendar_event WHERE id = ?').run(id)
      if (info.changes === 0) throw new NotFoundError(`Event '${id}' not found`)
    },

    // ================================================================
    // Lifecycle
    // ================================================================
    async close() {
      db.close()
    },

    // ================================================================
    // Introspection
    // ================================================================
    async listTables() {
      const rows = db.prepare(
        "SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name",
      ).all() as NameRow[]
      return rows.map((r) => r.name)
    },

    async listIndices(table: string) {
      const rows = db.prepare(
        "SELECT name FROM sqlite_master WHERE type = 'index' AND tbl_name = ? ORDER BY name",
      ).all(table) as NameRow[]
      return rows.map((r) => r.name)
    },

    async inTransaction() {
      return db.inTransaction
    },

    async getSchemaVersion() {
      const row = db.prepare('SELECT MAX(version) as v FROM schema_version').get() as SchemaVersionRow | undefined
      return row?.v ?? 0
    },
  }

  return adapter
}
