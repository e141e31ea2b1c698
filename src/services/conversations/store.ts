import { randomUUID } from "node:crypto";
import type { Pool } from "pg";
import { assertSqlIdentifier } from "../../config";
import { StorageError, normalizeErrorMessage } from "../../errors";

export interface LogEntry {
  id: string;
  conversationId: string;
  role: string;
  content: string;
  sequence: number;
  timestamp: string;
}

export type NewLogEntry = Omit<LogEntry, "id">;

/**
 * Append-only conversation log. Entries are never updated or deleted here;
 * retention belongs to whoever operates the database.
 */
export interface ConversationStore {
  append(entry: NewLogEntry): Promise<LogEntry>;
  /** Most recent first. */
  query(conversationId: string, limit: number): Promise<LogEntry[]>;
}

const MAX_QUERY_LIMIT = 500;

function clampQueryLimit(limit: number): number {
  return Math.max(1, Math.min(limit, MAX_QUERY_LIMIT));
}

function compareNewestFirst(a: LogEntry, b: LogEntry): number {
  const byTime = b.timestamp.localeCompare(a.timestamp);
  return byTime !== 0 ? byTime : b.sequence - a.sequence;
}

export class MemoryConversationStore implements ConversationStore {
  private readonly entries = new Map<string, LogEntry[]>();

  async append(entry: NewLogEntry): Promise<LogEntry> {
    const stored: LogEntry = {
      id: randomUUID(),
      conversationId: entry.conversationId,
      role: entry.role,
      content: entry.content,
      sequence: entry.sequence,
      timestamp: entry.timestamp,
    };

    const list = this.entries.get(entry.conversationId) ?? [];
    list.push(stored);
    this.entries.set(entry.conversationId, list);
    return { ...stored };
  }

  async query(conversationId: string, limit: number): Promise<LogEntry[]> {
    const list = [...(this.entries.get(conversationId) ?? [])];
    list.sort(compareNewestFirst);
    return list.slice(0, clampQueryLimit(limit)).map((entry) => ({ ...entry }));
  }
}

interface LogEntryRow {
  id: string;
  conversation_id: string;
  role: string;
  content: string;
  sequence: number;
  created_at: Date | string;
}

export class PostgresConversationStore implements ConversationStore {
  private readonly table: string;

  constructor(
    private readonly pool: Pool,
    tableName = "conversation_log",
  ) {
    this.table = assertSqlIdentifier(tableName, "CONVERSATION_LOG_TABLE");
  }

  async append(entry: NewLogEntry): Promise<LogEntry> {
    try {
      const result = await this.pool.query<LogEntryRow>(
        `
          INSERT INTO ${this.table} (
            id,
            conversation_id,
            role,
            content,
            sequence,
            created_at
          )
          VALUES ($1, $2, $3, $4, $5, $6::timestamptz)
          RETURNING id, conversation_id, role, content, sequence, created_at
        `,
        [
          randomUUID(),
          entry.conversationId,
          entry.role,
          entry.content,
          entry.sequence,
          entry.timestamp,
        ],
      );

      return this.mapEntry(result.rows[0]);
    } catch (error) {
      throw new StorageError(
        `Failed to append conversation log entry: ${normalizeErrorMessage(error)}`,
        { cause: error },
      );
    }
  }

  async query(conversationId: string, limit: number): Promise<LogEntry[]> {
    const safeLimit = clampQueryLimit(limit);

    try {
      const result = await this.pool.query<LogEntryRow>(
        `
          SELECT id, conversation_id, role, content, sequence, created_at
          FROM ${this.table}
          WHERE conversation_id = $1
          ORDER BY created_at DESC, sequence DESC
          LIMIT $2
        `,
        [conversationId, safeLimit],
      );

      return result.rows.map((row) => this.mapEntry(row));
    } catch (error) {
      throw new StorageError(
        `Failed to query conversation log: ${normalizeErrorMessage(error)}`,
        { cause: error },
      );
    }
  }

  private mapEntry(row: LogEntryRow): LogEntry {
    return {
      id: row.id,
      conversationId: row.conversation_id,
      role: row.role,
      content: row.content,
      sequence: row.sequence,
      timestamp:
        row.created_at instanceof Date ? row.created_at.toISOString() : row.created_at,
    };
  }
}
