import { AuthError, DeliveryError, FetchError, MonitorError } from "../core/errors";
import type { MonitorStage } from "../core/errors";
import { sleep } from "../core/fetch";
import type { DeliveryChannel } from "../delivery";
import type { Logger, MetricsRegistry } from "../observability";
import { errorMessage } from "../observability";
import { pageText } from "../portal";
import type { PortalGateway } from "../portal";
import type { DocumentExtractor, ResultStatusParser } from "../scrape";
import { summarizeResultSet } from "../scrape";
import type { CredentialStore } from "../store";
import type { CycleOutcome, CycleState, CycleTrigger, DeliveryResult, MonitoredUser } from "../types";

export interface MonitorCycleDeps {
  store: CredentialStore;
  portal: PortalGateway;
  parser: ResultStatusParser;
  extractor: Pick<DocumentExtractor, "extract">;
  delivery: DeliveryChannel;
  logger: Logger;
  metrics: MetricsRegistry;
  maxFetchAttempts: number;
  retryDelayMs: number;
  now?: () => Date;
}

const FAILURE_PREFIX: Record<MonitorStage, string> = {
  authenticate: "login_failed",
  fetch: "fetch_failed",
  parse: "parse_failed",
  extract: "extract_failed",
  deliver: "delivery_failed",
};

export const LOGIN_FAILED_NOTICE =
  "Login failed\n\nI couldn't log in to the lab portal with your saved credentials. " +
  "Please check your credentials with /add";

export function describeFailure(error: MonitorError): string {
  return `${FAILURE_PREFIX[error.stage]}: ${error.message}`;
}

function failureReason(error: MonitorError): string | undefined {
  return error instanceof AuthError || error instanceof FetchError ? error.reason : undefined;
}

async function withFetchRetry<T>(
  deps: MonitorCycleDeps,
  logger: Logger,
  step: string,
  operation: () => Promise<T>,
): Promise<T> {
  const maxAttempts = Math.max(1, deps.maxFetchAttempts);
  for (let attempt = 1; ; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      if (!(error instanceof FetchError) || !error.transient || attempt >= maxAttempts) {
        throw error;
      }
      logger.warn("cycle_fetch_retry", { step, attempt, reason: error.reason, error: error.message });
      await sleep(deps.retryDelayMs * attempt);
    }
  }
}

async function deliver(deps: MonitorCycleDeps, userId: number, run: () => Promise<DeliveryResult>): Promise<void> {
  let result: DeliveryResult;
  try {
    result = await run();
  } catch (error) {
    throw new DeliveryError(`${deps.delivery.name} delivery threw: ${errorMessage(error)}`, { cause: error });
  }
  if (!result.ok) {
    throw new DeliveryError(`${deps.delivery.name} delivery to user ${userId} failed: ${result.error}`);
  }
}

/**
 * One user's check: authenticate, fetch the results page, parse it and, when
 * every result is released, extract the report, deliver it and deregister
 * the user. Monitor errors end the cycle in FAILED with the user still
 * active, and `failedAt` names the step that was being attempted.
 * Deregistration only ever follows a confirmed delivery.
 */
export async function runMonitorCycle(
  deps: MonitorCycleDeps,
  userId: number,
  trigger: CycleTrigger = "manual",
): Promise<CycleOutcome> {
  const { store, portal, parser, extractor, delivery, metrics } = deps;
  const now = deps.now ?? (() => new Date());
  const logger = deps.logger.child("monitor_cycle", { userId, trigger });

  const user = await store.get(userId);
  if (!user || !user.active) {
    metrics.incrementCounter("users_skipped", 1);
    logger.info("cycle_skipped_inactive_user");
    return { userId, state: "SKIPPED", status: "not monitored" };
  }

  metrics.incrementCounter("cycles_started", 1);
  const stopTimer = metrics.startTimer("cycle_ms");
  let step: CycleState = "AUTHENTICATED";
  let outcome: CycleOutcome;

  try {
    const session = await portal.authenticate(user.username, user.secret);

    step = "FETCHED";
    const stopFetchTimer = metrics.startTimer("page_fetch_ms");
    const resultsPage = await withFetchRetry(deps, logger, "results", () => portal.fetch(session, { kind: "results" }));
    stopFetchTimer();

    step = "PARSED";
    const resultSet = parser.parse(pageText(resultsPage));
    const summary = summarizeResultSet(resultSet);

    if (!resultSet.allReady) {
      metrics.incrementCounter("results_pending", 1);
      outcome = { userId, state: "NOT_READY", status: `results_pending: ${summary}`, resultSet };
    } else {
      step = "EXTRACTED";
      const document = await withFetchRetry(deps, logger, "document", () => extractor.extract(session, resultsPage));

      step = "DELIVERED";
      await deliver(deps, userId, () => delivery.sendDocument(userId, document));
      metrics.incrementCounter("documents_delivered", 1);
      logger.info("cycle_document_delivered", { filename: document.filename, bytes: document.content.length });

      step = "DEREGISTERED";
      const deregistered = await deactivateAfterDelivery(deps, logger, userId);
      if (!deregistered) {
        logger.warn("cycle_user_already_deregistered");
      }
      outcome = { userId, state: "DEREGISTERED", status: `results_delivered: ${document.filename}`, resultSet };
    }
  } catch (error) {
    if (!(error instanceof MonitorError)) {
      await recordCheck(deps, logger, userId, `failed: ${errorMessage(error)}`, now());
      throw error;
    }
    metrics.incrementCounter("cycles_failed", 1);
    outcome = {
      userId,
      state: "FAILED",
      failedAt: step,
      reason: failureReason(error),
      status: describeFailure(error),
      error: error.message,
    };
  }

  const durationMs = stopTimer();
  logger.info("cycle_complete", {
    state: outcome.state,
    failedAt: outcome.failedAt,
    status: outcome.status,
    durationMs,
  });
  await recordCheck(deps, logger, userId, outcome.status, now());
  if (trigger === "scheduled") {
    await notifyLoginFailure(deps, logger, user, outcome);
  }
  return outcome;
}

/** One retry; a user left active after delivery would be sent the report again next cycle. */
async function deactivateAfterDelivery(deps: MonitorCycleDeps, logger: Logger, userId: number): Promise<boolean> {
  try {
    return await deps.store.deactivate(userId);
  } catch (error) {
    logger.warn("cycle_deregister_retry", { error: errorMessage(error) });
  }
  try {
    return await deps.store.deactivate(userId);
  } catch (error) {
    logger.error("cycle_deregister_failed", {
      error: errorMessage(error),
      risk: "user still active after delivery; the next cycle may deliver the report again",
    });
    throw error;
  }
}

/** Tells the user once when stored credentials stop working; repeats of the same status stay quiet. */
async function notifyLoginFailure(
  deps: MonitorCycleDeps,
  logger: Logger,
  user: MonitoredUser,
  outcome: CycleOutcome,
): Promise<void> {
  if (outcome.failedAt !== "AUTHENTICATED" || outcome.reason !== "invalid_credentials") {
    return;
  }
  if (user.lastStatus === outcome.status) {
    return;
  }

  try {
    const result = await deps.delivery.notify(user.userId, LOGIN_FAILED_NOTICE);
    if (!result.ok) {
      logger.warn("cycle_login_notice_failed", { error: result.error });
    }
  } catch (error) {
    logger.warn("cycle_login_notice_failed", { error: errorMessage(error) });
  }
}

async function recordCheck(
  deps: MonitorCycleDeps,
  logger: Logger,
  userId: number,
  status: string,
  checkedAt: Date,
): Promise<void> {
  try {
    await deps.store.recordCheck(userId, status, checkedAt.toISOString());
  } catch (error) {
    logger.warn("cycle_status_write_failed", { error: errorMessage(error) });
  }
}
