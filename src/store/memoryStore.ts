import type { MonitoredUser } from "../types";
import type { CredentialStore, StoreStats, UserRegistration } from "./types";

export class InMemoryCredentialStore implements CredentialStore {
  private readonly users = new Map<number, MonitoredUser>();

  async listActiveUsers(): Promise<MonitoredUser[]> {
    return [...this.users.values()].filter((user) => user.active).map((user) => ({ ...user }));
  }

  async get(userId: number): Promise<MonitoredUser | undefined> {
    const user = this.users.get(userId);
    return user ? { ...user } : undefined;
  }

  async upsert(registration: UserRegistration): Promise<MonitoredUser> {
    const existing = this.users.get(registration.userId);
    const user: MonitoredUser = {
      ...(existing ?? { createdAt: new Date().toISOString() }),
      userId: registration.userId,
      username: registration.username,
      secret: registration.secret,
      active: true,
    };
    this.users.set(user.userId, user);
    return { ...user };
  }

  async deactivate(userId: number): Promise<boolean> {
    const user = this.users.get(userId);
    if (!user || !user.active) {
      return false;
    }
    this.users.set(userId, { ...user, active: false });
    return true;
  }

  async recordCheck(userId: number, status: string, checkedAt: string): Promise<void> {
    const user = this.users.get(userId);
    if (!user) {
      return;
    }
    this.users.set(userId, { ...user, lastCheckAt: checkedAt, lastStatus: status });
  }

  async remove(userId: number): Promise<boolean> {
    return this.users.delete(userId);
  }

  async getStats(): Promise<StoreStats> {
    const totalUsers = this.users.size;
    const activeUsers = [...this.users.values()].filter((user) => user.active).length;
    return { totalUsers, activeUsers, inactiveUsers: totalUsers - activeUsers };
  }

  async close(): Promise<void> {
    return;
  }
}
