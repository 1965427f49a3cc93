import type { AppConfig } from "../config";
import { createDeliveryChannel } from "../delivery";
import type { DeliveryChannel } from "../delivery";
import { runMonitorCycle } from "../monitor";
import type { MonitorCycleDeps } from "../monitor";
import { MonitorScheduler } from "../monitor";
import type { Logger, MetricsRegistry } from "../observability";
import { PortalClient } from "../portal";
import type { PortalGateway } from "../portal";
import { DocumentExtractor, ResultStatusParser } from "../scrape";
import { createStore } from "../store";
import type { CredentialStore } from "../store";
import { TelegramClient } from "../telegram";
import { createFetch } from "./fetch";
import type { FetchLike } from "./fetch";

/** Everything a command needs, built once per process and passed down explicitly. */
export interface AppContext {
  runId: string;
  config: AppConfig;
  store: CredentialStore;
  portal: PortalGateway;
  delivery: DeliveryChannel;
  telegram?: TelegramClient;
  logger: Logger;
  metrics: MetricsRegistry;
}

export interface AppContextOverrides {
  fetchFn?: FetchLike;
  store?: CredentialStore;
  portal?: PortalGateway;
  delivery?: DeliveryChannel;
}

export function createAppContext(
  runId: string,
  config: AppConfig,
  logger: Logger,
  metrics: MetricsRegistry,
  overrides: AppContextOverrides = {},
): AppContext {
  const fetchFn = overrides.fetchFn ?? createFetch(config.ignoreHttpsErrors);
  const telegram = config.telegramBotToken
    ? new TelegramClient({
        token: config.telegramBotToken,
        apiBaseUrl: config.telegramApiBaseUrl,
        fetchFn,
        requestTimeoutMs: config.requestTimeoutMs,
      })
    : undefined;

  return {
    runId,
    config,
    store: overrides.store ?? createStore(config),
    portal: overrides.portal ?? PortalClient.fromConfig(config, fetchFn),
    delivery: overrides.delivery ?? createDeliveryChannel(config, fetchFn, telegram),
    telegram,
    logger,
    metrics,
  };
}

export function createCycleDeps(ctx: AppContext): MonitorCycleDeps {
  return {
    store: ctx.store,
    portal: ctx.portal,
    parser: new ResultStatusParser(ctx.config.portalRules),
    extractor: new DocumentExtractor(ctx.portal, ctx.config.portalRules),
    delivery: ctx.delivery,
    logger: ctx.logger,
    metrics: ctx.metrics,
    maxFetchAttempts: ctx.config.maxFetchAttempts,
    retryDelayMs: ctx.config.retryDelayMs,
  };
}

export function createScheduler(ctx: AppContext): MonitorScheduler {
  const cycleDeps = createCycleDeps(ctx);
  return new MonitorScheduler({
    store: ctx.store,
    runCycle: (userId, trigger) => runMonitorCycle(cycleDeps, userId, trigger),
    logger: ctx.logger.child("scheduler"),
    intervalMinutes: ctx.config.pollIntervalMinutes,
    concurrency: ctx.config.monitorConcurrency,
  });
}
