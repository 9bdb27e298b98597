import { z } from "zod";
import type pg from "pg";
import { logger } from "@/lib/logger";
import { ConversationContextSchema, type ConversationContext } from "@/server/conversation/states";
import type { SessionStore } from "./session-store";

export type SqlResult = { rows: unknown[]; rowCount: number | null };

/** The slice of pg the store needs; tests pass an in-memory runner. */
export type SqlRunner = (text: string, values: unknown[]) => Promise<SqlResult>;

const SessionRowSchema = z.object({ context: z.unknown() });

export class PgSessionStore implements SessionStore {
  constructor(private readonly run: SqlRunner) {}

  async load(id: string): Promise<ConversationContext | null> {
    const res = await this.run(`SELECT context FROM assistant_sessions WHERE id = $1`, [id]);
    const row = SessionRowSchema.safeParse(res.rows[0]);
    if (!row.success) return null;

    const parsed = ConversationContextSchema.safeParse(row.data.context);
    if (!parsed.success) {
      logger.warn(`Discarding unreadable session ${id}`, { issues: parsed.error.issues.length });
      return null;
    }
    return parsed.data;
  }

  async save(context: ConversationContext): Promise<void> {
    await this.run(
      `INSERT INTO assistant_sessions (id, context, updated_at)
       VALUES ($1, $2::jsonb, now())
       ON CONFLICT (id) DO UPDATE SET context = EXCLUDED.context, updated_at = now()`,
      [context.id, JSON.stringify(context)]
    );
  }

  async delete(id: string): Promise<boolean> {
    const res = await this.run(`DELETE FROM assistant_sessions WHERE id = $1`, [id]);
    return (res.rowCount ?? 0) > 0;
  }
}

export function createPgSessionStore(pool: pg.Pool): PgSessionStore {
  return new PgSessionStore((text, values) => pool.query(text, values));
}
