import { asc, eq, lte } from "drizzle-orm";
import { Pledge } from "../core/types.js";
import { getDb, schema } from "../db/index.js";

export interface PledgeStore {
  put(pledge: Pledge): Promise<void>;
  get(id: number): Promise<Pledge | null>;
  delete(id: number): Promise<void>;
  /** Pledges whose expiry has passed but which the sweep has not removed yet. */
  listLapsed(now: number): Promise<Pledge[]>;
  purgeExpired(now: number): Promise<number>;
}

export class PgPledgeStore implements PledgeStore {
  async put(pledge: Pledge): Promise<void> {
    const db = getDb();
    await db
      .insert(schema.pledges)
      .values(pledge)
      .onConflictDoUpdate({
        target: schema.pledges.id,
        set: { userId: pledge.userId, expiresAt: pledge.expiresAt, tier: pledge.tier },
      });
  }

  async get(id: number): Promise<Pledge | null> {
    const db = getDb();
    const [row] = await db
      .select()
      .from(schema.pledges)
      .where(eq(schema.pledges.id, id))
      .limit(1);
    return row ?? null;
  }

  async delete(id: number): Promise<void> {
    const db = getDb();
    await db.delete(schema.pledges).where(eq(schema.pledges.id, id));
  }

  async listLapsed(now: number): Promise<Pledge[]> {
    const db = getDb();
    const rows = await db
      .select()
      .from(schema.pledges)
      .where(lte(schema.pledges.expiresAt, now))
      .orderBy(asc(schema.pledges.expiresAt));
    return rows;
  }

  async purgeExpired(now: number): Promise<number> {
    const db = getDb();
    const deleted = await db
      .delete(schema.pledges)
      .where(lte(schema.pledges.expiresAt, now))
      .returning({ id: schema.pledges.id });
    return deleted.length;
  }
}

// ── In-memory store (local mode and tests) ───────────────────────

export class InMemoryPledgeStore implements PledgeStore {
  private pledges = new Map<number, Pledge>();

  async put(pledge: Pledge): Promise<void> {
    this.pledges.set(pledge.id, { ...pledge });
  }

  async get(id: number): Promise<Pledge | null> {
    const pledge = this.pledges.get(id);
    return pledge ? { ...pledge } : null;
  }

  async delete(id: number): Promise<void> {
    this.pledges.delete(id);
  }

  async listLapsed(now: number): Promise<Pledge[]> {
    return [...this.pledges.values()]
      .filter((p) => p.expiresAt <= now)
      .sort((a, b) => a.expiresAt - b.expiresAt)
      .map((p) => ({ ...p }));
  }

  async purgeExpired(now: number): Promise<number> {
    let purged = 0;
    for (const [id, pledge] of this.pledges) {
      if (pledge.expiresAt <= now) {
        this.pledges.delete(id);
        purged++;
      }
    }
    return purged;
  }
}
