import { and, eq, gt, isNull, lte } from 'drizzle-orm';
import type {
  RefreshTokenEntry,
  RefreshTokenStore,
  RegisterRefreshTokenInput,
  RotateRefreshTokenInput,
} from '@accounts/auth-core';
import { type AccountsDatabase, refreshTokens } from '@accounts/database';
import { translateStoreError } from '../users/user-repository.js';

/**
 * Refresh token ledger. A row is live until `revoked_at` is set; rows are
 * kept after revocation so replayed tokens stay rejected until they expire.
 */
export class RefreshTokenRepository implements RefreshTokenStore {
  constructor(private db: AccountsDatabase) {}

  async register(input: RegisterRefreshTokenInput): Promise<void> {
    this.run(() => this.db.insert(refreshTokens).values(input).run());
  }

  async find(jti: string): Promise<RefreshTokenEntry | null> {
    const row = this.run(() =>
      this.db.select().from(refreshTokens).where(eq(refreshTokens.jti, jti)).get()
    );
    return row ?? null;
  }

  async contains(jti: string): Promise<boolean> {
    const entry = await this.find(jti);
    return entry?.revokedAt != null;
  }

  async add(jti: string, revokedAt: Date): Promise<boolean> {
    const result = this.run(() =>
      this.db
        .update(refreshTokens)
        .set({ revokedAt })
        .where(and(eq(refreshTokens.jti, jti), isNull(refreshTokens.revokedAt)))
        .run()
    );
    return result.changes > 0;
  }

  async addAll(userId: string, revokedAt: Date): Promise<number> {
    const result = this.run(() =>
      this.db
        .update(refreshTokens)
        .set({ revokedAt })
        .where(
          and(
            eq(refreshTokens.userId, userId),
            isNull(refreshTokens.revokedAt),
            gt(refreshTokens.expiresAt, revokedAt)
          )
        )
        .run()
    );
    return result.changes;
  }

  async rotate(input: RotateRefreshTokenInput): Promise<boolean> {
    return this.run(() =>
      this.db.transaction((tx) => {
        const revoked = tx
          .update(refreshTokens)
          .set({ revokedAt: input.rotatedAt, replacedBy: input.next.jti })
          .where(
            and(
              eq(refreshTokens.jti, input.previousJti),
              eq(refreshTokens.userId, input.userId),
              isNull(refreshTokens.revokedAt)
            )
          )
          .run();

        if (revoked.changes === 0) {
          return false;
        }

        tx.insert(refreshTokens).values(input.next).run();
        return true;
      })
    );
  }

  async purgeExpired(now: Date): Promise<number> {
    const result = this.run(() =>
      this.db.delete(refreshTokens).where(lte(refreshTokens.expiresAt, now)).run()
    );
    return result.changes;
  }

  private run<T>(operation: () => T): T {
    try {
      return operation();
    } catch (error) {
      throw translateStoreError(error);
    }
  }
}
