import { users } from "@shared/schema";
import type { Identity } from "@shared/schema";
import { getDb, eq, and } from "../base";
import type { IdentityDirectory } from "../interfaces";

export class AccountsStorage implements IdentityDirectory {
  async getIdentity(accountId: string): Promise<Identity | undefined> {
    const [user] = await getDb()
      .select({
        accountId: users.accountId,
        displayName: users.displayName,
        role: users.role,
        department: users.department,
      })
      .from(users)
      .where(and(eq(users.accountId, accountId), eq(users.isActive, true)));
    return user;
  }
}
