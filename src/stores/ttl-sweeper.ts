export interface Expirable {
  purgeExpired(now: number): Promise<number>;
}

export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

/**
 * Store-side TTL expiry. Records are removed some time after their expiry
 * attribute passes, never at the exact instant, so readers may still see a
 * just-expired record until the next run. Scheduling belongs to the
 * maintenance job, which downgrades lapsed pledges before each purge.
 */
export class TtlSweeper {
  constructor(private targets: Record<string, Expirable>) {}

  async runOnce(now = nowSeconds()): Promise<Record<string, number>> {
    const purged: Record<string, number> = {};
    for (const [name, target] of Object.entries(this.targets)) {
      purged[name] = await target.purgeExpired(now);
    }
    return purged;
  }
}
