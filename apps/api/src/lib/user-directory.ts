import { eq, inArray } from 'drizzle-orm';

import type { Database } from '../db';
import { users } from '../db/schema';

export type UserRole = 'user' | 'admin';

export interface UserSummary {
  id: string;
  username: string;
  roles: UserRole[];
}

/**
 * Read-only view of the users table. Accounts are created by the identity
 * service that issues our tokens.
 */
export interface UserDirectory {
  get(userId: string): Promise<UserSummary | null>;
  getMany(userIds: string[]): Promise<Map<string, UserSummary>>;
}

export class PgUserDirectory implements UserDirectory {
  constructor(private readonly db: Database) {}

  async get(userId: string): Promise<UserSummary | null> {
    const [user] = await this.db
      .select({ id: users.id, username: users.username, roles: users.roles })
      .from(users)
      .where(eq(users.id, userId))
      .limit(1);
    return user ?? null;
  }

  async getMany(userIds: string[]): Promise<Map<string, UserSummary>> {
    if (userIds.length === 0) {
      return new Map();
    }

    const rows = await this.db
      .select({ id: users.id, username: users.username, roles: users.roles })
      .from(users)
      .where(inArray(users.id, userIds));
    return new Map(rows.map((row) => [row.id, row]));
  }
}
