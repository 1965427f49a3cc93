import { errorMessage } from "../observability";
import { BotCommandHandler, TelegramBot } from "../telegram";
import type { BatchSummary, CycleOutcome } from "../types";
import type { AppContext } from "./context";
import { createScheduler } from "./context";

export interface RegisterOptions {
  userId: number;
  username: string;
  secret: string;
  verify: boolean;
}

export async function runCheckAll(ctx: AppContext): Promise<BatchSummary> {
  ctx.logger.info("check_all_start");
  const scheduler = createScheduler(ctx);
  const summary = await scheduler.runNow();
  ctx.logger.info("check_all_complete", { ...summary });
  return summary;
}

export async function runCheckUser(ctx: AppContext, userId: number): Promise<CycleOutcome> {
  ctx.logger.info("check_user_start", { userId });
  const scheduler = createScheduler(ctx);
  const outcome = await scheduler.checkUser(userId);
  ctx.logger.info("check_user_complete", { userId, state: outcome.state, status: outcome.status });
  return outcome;
}

export async function runRegister(ctx: AppContext, options: RegisterOptions): Promise<void> {
  ctx.logger.info("register_start", { userId: options.userId, verify: options.verify });
  if (options.verify) {
    await ctx.portal.authenticate(options.username, options.secret);
  }
  await ctx.store.upsert({ userId: options.userId, username: options.username, secret: options.secret });
  ctx.logger.info("register_complete", { userId: options.userId });
}

export async function runRemove(ctx: AppContext, userId: number): Promise<boolean> {
  const removed = await ctx.store.remove(userId);
  ctx.logger.info("remove_complete", { userId, removed });
  return removed;
}

export async function runStatus(ctx: AppContext, userId?: number): Promise<void> {
  ctx.logger.info("status_start", { userId });
  if (userId === undefined) {
    const stats = await ctx.store.getStats();
    ctx.logger.info("status_complete", { stats });
    return;
  }

  const user = await ctx.store.get(userId);
  if (!user) {
    ctx.logger.warn("status_user_not_found", { userId });
    return;
  }
  ctx.logger.info("status_complete", {
    userId,
    username: user.username,
    active: user.active,
    lastCheckAt: user.lastCheckAt ?? null,
    lastStatus: user.lastStatus ?? null,
  });
}

function waitForShutdownSignal(ctx: AppContext): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      resolve(signal);
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
    ctx.logger.info("serve_waiting_for_signal");
  });
}

/** Runs the scheduler and, when a bot token is configured, the Telegram command bot until SIGINT/SIGTERM. */
export async function runServe(ctx: AppContext): Promise<void> {
  const scheduler = createScheduler(ctx);
  let bot: TelegramBot | undefined;

  if (ctx.telegram) {
    const telegram = ctx.telegram;
    const handler = new BotCommandHandler({
      store: ctx.store,
      checkUser: (userId) => scheduler.checkUser(userId),
      verifyCredentials: async (username, secret) => {
        await ctx.portal.authenticate(username, secret);
      },
      logger: ctx.logger.child("bot_commands"),
      pollIntervalMinutes: ctx.config.pollIntervalMinutes,
    });
    bot = new TelegramBot({
      client: telegram,
      handler,
      logger: ctx.logger.child("bot"),
      pollTimeoutSeconds: ctx.config.telegramPollTimeoutSeconds,
    });
    bot.start();
  } else {
    ctx.logger.warn("serve_without_bot", { reason: "TELEGRAM_BOT_TOKEN not set" });
  }

  scheduler.start();
  const signal = await waitForShutdownSignal(ctx);
  ctx.logger.info("shutdown_requested", { signal });

  try {
    await bot?.stop();
  } catch (error) {
    ctx.logger.warn("bot_stop_failed", { error: errorMessage(error) });
  }
  await scheduler.stop();
  ctx.logger.info("serve_stopped");
}
