import type { MonitoredUser } from "../types";

export interface UserRegistration {
  userId: number;
  username: string;
  secret: string;
}

export interface StoreStats {
  totalUsers: number;
  activeUsers: number;
  inactiveUsers: number;
}

/**
 * The only state shared between monitor cycles. Every write touches a single
 * user row.
 */
export interface CredentialStore {
  listActiveUsers(): Promise<MonitoredUser[]>;
  get(userId: number): Promise<MonitoredUser | undefined>;
  /** Inserts the user, or replaces the credentials of an existing one and reactivates it. */
  upsert(registration: UserRegistration): Promise<MonitoredUser>;
  /** Returns false when the user was missing or already inactive. */
  deactivate(userId: number): Promise<boolean>;
  recordCheck(userId: number, status: string, checkedAt: string): Promise<void>;
  remove(userId: number): Promise<boolean>;
  getStats(): Promise<StoreStats>;
  close(): Promise<void>;
}
