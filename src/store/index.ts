import type { AppConfig } from "../config";
import { SqliteCredentialStore } from "./sqliteStore";
import type { CredentialStore } from "./types";

export function createStore(config: AppConfig): CredentialStore {
  return new SqliteCredentialStore(config.storePath);
}

export { InMemoryCredentialStore } from "./memoryStore";
export { SqliteCredentialStore } from "./sqliteStore";
export * from "./types";
