import { MessageStoreError } from '@parlor/chat-eventhub';
import { z } from 'zod';

/**
 * A chat message joined with its author's display name
 */
export interface ChatMessage {
  id: string;
  content: string;
  /** Last write time; later than the id's creation time once edited */
  updated: Date;
  authorId: string;
  authorName: string;
}

export interface MessageSource {
  /**
   * @returns `null` when the message no longer exists
   * @throws MessageStoreError when the store cannot be read
   */
  fetchMessage(messageId: string): Promise<ChatMessage | null>;
}

/**
 * The part of a `pg` Pool the message store needs
 */
export interface QueryRunner {
  query(text: string, values: unknown[]): Promise<{ rows: unknown[] }>;
}

// `updated` is stored without a time zone and holds UTC
const FETCH_MESSAGE_SQL = `SELECT m.id, m.content, m.updated AT TIME ZONE 'UTC' AS updated, m.author, u.name AS author_name
FROM messages AS m
JOIN chat_users AS u ON u.id = m.author
WHERE m.id = $1
LIMIT 1`;

const messageRowSchema = z.object({
  id: z.string(),
  content: z.string(),
  updated: z.coerce.date(),
  author: z.string(),
  author_name: z.string(),
});

/**
 * Reads chat messages from Postgres
 *
 * ## Usage
 *
 * ```typescript
 * const pool = new Pool({ connectionString: process.env.DATABASE_URL });
 * const source = new PgMessageSource(pool);
 * const message = await source.fetchMessage(messageId);
 * ```
 */
export class PgMessageSource implements MessageSource {
  constructor(private readonly db: QueryRunner) {}

  async fetchMessage(messageId: string): Promise<ChatMessage | null> {
    let rows: unknown[];
    try {
      ({ rows } = await this.db.query(FETCH_MESSAGE_SQL, [messageId]));
    } catch (error) {
      throw new MessageStoreError(messageId, { cause: error });
    }

    if (rows.length === 0) {
      return null;
    }

    const row = messageRowSchema.safeParse(rows[0]);
    if (!row.success) {
      throw new MessageStoreError(messageId, { cause: row.error });
    }

    return {
      id: row.data.id,
      content: row.data.content,
      updated: row.data.updated,
      authorId: row.data.author,
      authorName: row.data.author_name,
    };
  }
}
