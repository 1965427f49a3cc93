import { AuthError } from "../core/errors";
import type { Logger } from "../observability";
import { errorMessage } from "../observability";
import { summarizeResultSet } from "../scrape";
import type { CredentialStore } from "../store";
import type { CycleOutcome } from "../types";

export type Reply = (text: string) => Promise<void>;

export interface CommandHandlerDeps {
  store: CredentialStore;
  checkUser: (userId: number) => Promise<CycleOutcome>;
  verifyCredentials: (username: string, secret: string) => Promise<void>;
  logger: Logger;
  pollIntervalMinutes: number;
}

const CREDENTIALS_FORMAT = "Please send your credentials in this format:\nusername password\n\nExample: 12345678 ABC123DEF";
const NO_CREDENTIALS = "No credentials found. Use /add to add your credentials first.";

function splitCommand(text: string): { command?: string; args: string[] } {
  const parts = text.trim().split(/\s+/).filter((part) => part.length > 0);
  const head = parts[0];
  if (!head || !head.startsWith("/")) {
    return { args: parts };
  }
  // Group chats address commands as /check@SomeBot.
  const command = head.slice(1).split("@")[0].toLowerCase();
  return { command, args: parts.slice(1) };
}

export function describeOutcome(outcome: CycleOutcome): string {
  switch (outcome.state) {
    case "DEREGISTERED":
      return (
        "Results delivered! You've been removed from automatic monitoring. " +
        "Use /add again if you need to monitor new results."
      );
    case "NOT_READY": {
      const summary = outcome.resultSet ? summarizeResultSet(outcome.resultSet) : outcome.status;
      return `Your results are not ready yet (${summary}). I'll keep checking and send the report when it is available.`;
    }
    case "SKIPPED":
      return NO_CREDENTIALS;
    case "FAILED":
      if (outcome.failedAt !== "AUTHENTICATED") {
        return "Your results could not be checked right now. I'll try again on the next scheduled check.";
      }
      if (outcome.reason === "invalid_credentials") {
        return "Failed to log in to the portal. Please check your credentials with /add";
      }
      return "Could not reach the lab portal right now. I'll try again on the next scheduled check.";
  }
}

/**
 * Transport-independent chat commands. Replies go through the callback in
 * order, so a slow /check still shows its progress message first.
 */
export class BotCommandHandler {
  private readonly deps: CommandHandlerDeps;
  private readonly awaitingCredentials = new Set<number>();

  constructor(deps: CommandHandlerDeps) {
    this.deps = deps;
  }

  isAwaitingCredentials(userId: number): boolean {
    return this.awaitingCredentials.has(userId);
  }

  async handle(userId: number, text: string, reply: Reply): Promise<void> {
    const { command, args } = splitCommand(text);

    switch (command) {
      case undefined:
        await this.handlePlainText(userId, args, reply);
        return;
      case "start":
        await reply(this.welcomeText());
        return;
      case "help":
        await reply(this.helpText());
        return;
      case "add":
        if (args.length === 2) {
          await this.register(userId, args[0], args[1], reply);
          return;
        }
        this.awaitingCredentials.add(userId);
        await reply(CREDENTIALS_FORMAT);
        return;
      case "remove":
        await this.remove(userId, reply);
        return;
      case "check":
        await this.check(userId, reply);
        return;
      case "status":
        await this.status(userId, reply);
        return;
      default:
        await reply("Use /help to see available commands.");
    }
  }

  private async handlePlainText(userId: number, parts: string[], reply: Reply): Promise<void> {
    if (!this.awaitingCredentials.has(userId)) {
      await reply("Use /help to see available commands.");
      return;
    }
    if (parts.length !== 2) {
      await reply(CREDENTIALS_FORMAT);
      return;
    }
    await this.register(userId, parts[0], parts[1], reply);
  }

  private async register(userId: number, username: string, secret: string, reply: Reply): Promise<void> {
    this.awaitingCredentials.delete(userId);
    await reply("Testing your credentials...");

    try {
      await this.deps.verifyCredentials(username, secret);
    } catch (error) {
      if (error instanceof AuthError && error.reason === "invalid_credentials") {
        await reply("Login failed. Please check your credentials and try again.");
        return;
      }
      this.deps.logger.warn("register_verify_failed", { userId, error: errorMessage(error) });
      await reply("Could not reach the lab portal right now. Please try again later.");
      return;
    }

    try {
      await this.deps.store.upsert({ userId, username, secret });
    } catch (error) {
      this.deps.logger.error("register_save_failed", { userId, error: errorMessage(error) });
      await reply("Failed to save credentials. Please try again.");
      return;
    }

    this.deps.logger.info("user_registered", { userId });
    await reply(
      `Credentials saved! I'll check your results every ${this.deps.pollIntervalMinutes} minutes ` +
        "and send the report as soon as it is ready.",
    );
  }

  private async remove(userId: number, reply: Reply): Promise<void> {
    this.awaitingCredentials.delete(userId);
    const removed = await this.deps.store.remove(userId);
    if (removed) {
      this.deps.logger.info("user_removed", { userId });
      await reply("Your credentials have been removed. You'll no longer receive notifications.");
      return;
    }
    await reply("No credentials found to remove.");
  }

  private async check(userId: number, reply: Reply): Promise<void> {
    const user = await this.deps.store.get(userId);
    if (!user || !user.active) {
      await reply(NO_CREDENTIALS);
      return;
    }

    await reply("Checking your results...");
    const outcome = await this.deps.checkUser(userId);
    await reply(describeOutcome(outcome));
  }

  private async status(userId: number, reply: Reply): Promise<void> {
    const user = await this.deps.store.get(userId);
    if (!user) {
      await reply(NO_CREDENTIALS);
      return;
    }

    await reply(
      [
        "Monitoring status",
        "",
        `Username: ${user.username}`,
        `Monitoring: ${user.active ? "active" : "stopped"}`,
        `Last check: ${user.lastCheckAt ?? "never"}`,
        `Status: ${user.lastStatus ?? "unknown"}`,
        "",
        `I check your results every ${this.deps.pollIntervalMinutes} minutes automatically.`,
      ].join("\n"),
    );
  }

  private welcomeText(): string {
    return [
      "Lab Results Monitor",
      "",
      "I can monitor your lab results and send you the report when it's ready.",
      "",
      "/add - Add your lab portal credentials",
      "/remove - Remove your credentials",
      "/check - Check results now",
      "/status - Show your current status",
      "/help - Show this help message",
      "",
      "Use /add to get started!",
    ].join("\n");
  }

  private helpText(): string {
    return [
      "Available commands:",
      "",
      "/add - Add your lab portal credentials",
      "/remove - Remove your stored credentials",
      "/check - Check your results immediately",
      "/status - Show your monitoring status",
      "/help - Show this help message",
      "",
      "How it works:",
      "1. Use /add to store your lab portal credentials",
      `2. I'll check your results every ${this.deps.pollIntervalMinutes} minutes`,
      "3. You'll get the report as soon as every result is released",
    ].join("\n");
  }
}
