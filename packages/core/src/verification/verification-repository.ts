/**
 * Verification Repository
 *
 * Data access layer for single-use action tokens
 */

import { and, eq, gt, isNotNull, isNull, lte, or } from 'drizzle-orm';
import { type AccountsDatabase, actionTokens, users } from '@accounts/database';
import { translateStoreError } from '../users/user-repository.js';
import type { User } from '../users/user-types.js';
import type {
  ActionToken,
  ActionTokenStore,
  ActionTokenTtls,
  ConsumeActionTokenParams,
  CreateActionTokenData,
} from './verification-types.js';

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;

export class VerificationRepository implements ActionTokenStore {
  constructor(private db: AccountsDatabase) {}

  async replaceOutstanding(data: CreateActionTokenData): Promise<void> {
    this.run(() =>
      this.db.transaction((tx) => {
        tx.update(actionTokens)
          .set({ consumedAt: data.createdAt })
          .where(
            and(
              eq(actionTokens.userId, data.userId),
              eq(actionTokens.purpose, data.purpose),
              isNull(actionTokens.consumedAt)
            )
          )
          .run();

        tx.insert(actionTokens).values(data).run();
      })
    );
  }

  async findById(id: string): Promise<ActionToken | null> {
    const row = this.run(() =>
      this.db.select().from(actionTokens).where(eq(actionTokens.id, id)).get()
    );
    return row ?? null;
  }

  async consumeAndApply(params: ConsumeActionTokenParams): Promise<User | null> {
    return this.run(() =>
      this.db.transaction((tx) => {
        const owner = tx
          .select({ id: users.id })
          .from(users)
          .where(and(eq(users.id, params.userId), isNull(users.deletedAt)))
          .get();
        if (!owner) {
          return null;
        }

        const consumed = tx
          .update(actionTokens)
          .set({ consumedAt: params.consumedAt })
          .where(
            and(
              eq(actionTokens.id, params.id),
              eq(actionTokens.purpose, params.purpose),
              eq(actionTokens.userId, params.userId),
              isNull(actionTokens.consumedAt),
              gt(actionTokens.createdAt, params.issuedAfter)
            )
          )
          .run();
        if (consumed.changes === 0) {
          return null;
        }

        const updated = tx
          .update(users)
          .set({ ...params.userUpdate, updatedAt: params.consumedAt })
          .where(eq(users.id, params.userId))
          .returning()
          .get();
        return updated ?? null;
      })
    );
  }

  /**
   * Delete consumed tokens and tokens past their purpose's lifetime
   */
  async purge(now: Date, ttls: ActionTokenTtls): Promise<number> {
    const resetCutoff = new Date(now.getTime() - ttls.passwordResetTtlMinutes * MINUTE_MS);
    const verificationCutoff = new Date(now.getTime() - ttls.emailVerificationTtlHours * HOUR_MS);

    const result = this.run(() =>
      this.db
        .delete(actionTokens)
        .where(
          or(
            isNotNull(actionTokens.consumedAt),
            and(eq(actionTokens.purpose, 'password_reset'), lte(actionTokens.createdAt, resetCutoff)),
            and(
              eq(actionTokens.purpose, 'email_verification'),
              lte(actionTokens.createdAt, verificationCutoff)
            )
          )
        )
        .run()
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
