import { beforeEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_CONFIG } from "../../src/config";
import type { DeliveryChannel } from "../../src/delivery";
import { LOGIN_FAILED_NOTICE, runMonitorCycle } from "../../src/monitor";
import type { MonitorCycleDeps } from "../../src/monitor";
import type { MetricsRegistry } from "../../src/observability";
import { PortalClient } from "../../src/portal";
import { DocumentExtractor, ResultStatusParser } from "../../src/scrape";
import { InMemoryCredentialStore } from "../../src/store";
import type { DeliveryResult, LabDocument } from "../../src/types";
import type { FakeHttp } from "../helpers/fakeHttp";
import {
  BASE_URL,
  fakePortal,
  PDF_BYTES,
  pendingRow,
  readyRow,
  resultsPage,
  silentLogger,
  testConfig,
  testMetrics,
} from "../helpers/portalFixtures";

const CHECKED_AT = new Date("2024-05-01T12:00:00.000Z");
const USER_ID = 1001;

class RecordingChannel implements DeliveryChannel {
  readonly name = "recording";
  readonly sent: Array<{ userId: number; document: LabDocument }> = [];
  readonly notices: Array<{ userId: number; text: string }> = [];
  result: DeliveryResult = { ok: true };

  async sendDocument(userId: number, document: LabDocument): Promise<DeliveryResult> {
    this.sent.push({ userId, document });
    return this.result;
  }

  async notify(userId: number, text: string): Promise<DeliveryResult> {
    this.notices.push({ userId, text });
    return { ok: true };
  }
}

let store: InMemoryCredentialStore;
let delivery: RecordingChannel;
let metrics: MetricsRegistry;

function cycleDeps(http: FakeHttp, overrides: Partial<MonitorCycleDeps> = {}): MonitorCycleDeps {
  const portal = PortalClient.fromConfig(testConfig(), http.fetch);
  return {
    store,
    portal,
    parser: new ResultStatusParser(DEFAULT_CONFIG.portalRules),
    extractor: new DocumentExtractor(portal, DEFAULT_CONFIG.portalRules),
    delivery,
    logger: silentLogger(),
    metrics,
    maxFetchAttempts: 2,
    retryDelayMs: 0,
    now: () => CHECKED_AT,
    ...overrides,
  };
}

beforeEach(async () => {
  store = new InMemoryCredentialStore();
  delivery = new RecordingChannel();
  metrics = testMetrics();
  await store.upsert({ userId: USER_ID, username: "patient-1", secret: "test-secret" });
});

describe("runMonitorCycle", () => {
  it("leaves the user monitored while some results are pending", async () => {
    const http = fakePortal(resultsPage([readyRow("Hemograma"), pendingRow("Glicose")]));

    const outcome = await runMonitorCycle(cycleDeps(http), USER_ID);

    expect(outcome).toMatchObject({ userId: USER_ID, state: "NOT_READY", status: "results_pending: 1/2 results ready" });
    expect(delivery.sent).toHaveLength(0);
    expect(await store.get(USER_ID)).toMatchObject({
      active: true,
      lastCheckAt: "2024-05-01T12:00:00.000Z",
      lastStatus: "results_pending: 1/2 results ready",
    });
    expect(metrics.getCounter("results_pending")).toBe(1);
    expect(http.requestsTo("GET", "/get_laudo?id=42")).toHaveLength(0);
  });

  it("delivers the decoded report and deregisters the user once everything is released", async () => {
    const http = fakePortal(resultsPage([readyRow("Hemograma"), readyRow("Glicose")]));

    const outcome = await runMonitorCycle(cycleDeps(http), USER_ID);

    expect(outcome).toMatchObject({ state: "DEREGISTERED", status: "results_delivered: lab_results.pdf" });
    expect(delivery.sent).toHaveLength(1);
    expect(delivery.sent[0].userId).toBe(USER_ID);
    expect(delivery.sent[0].document.content.equals(PDF_BYTES)).toBe(true);
    expect(await store.get(USER_ID)).toMatchObject({ active: false, lastStatus: "results_delivered: lab_results.pdf" });
    expect(metrics.getCounter("documents_delivered")).toBe(1);
  });

  it("skips a user that was deregistered by an earlier delivery", async () => {
    const http = fakePortal(resultsPage([readyRow("Hemograma")]));
    const deps = cycleDeps(http);
    await runMonitorCycle(deps, USER_ID);
    const requestsAfterDelivery = http.requests.length;

    const second = await runMonitorCycle(deps, USER_ID);

    expect(second).toEqual({ userId: USER_ID, state: "SKIPPED", status: "not monitored" });
    expect(delivery.sent).toHaveLength(1);
    expect(http.requests).toHaveLength(requestsAfterDelivery);
  });

  it("skips users that were never registered", async () => {
    const http = fakePortal(resultsPage([readyRow("Hemograma")]));

    const outcome = await runMonitorCycle(cycleDeps(http), 4242);

    expect(outcome.state).toBe("SKIPPED");
    expect(http.requests).toHaveLength(0);
    expect(metrics.getCounter("users_skipped")).toBe(1);
  });

  it("records a login failure and keeps the user", async () => {
    await store.upsert({ userId: USER_ID, username: "patient-1", secret: "stale-secret" });
    const http = fakePortal(resultsPage([readyRow("Hemograma")]));

    const outcome = await runMonitorCycle(cycleDeps(http), USER_ID);

    expect(outcome).toMatchObject({
      state: "FAILED",
      failedAt: "AUTHENTICATED",
      reason: "invalid_credentials",
      status: "login_failed: portal rejected the credentials",
    });
    expect(await store.get(USER_ID)).toMatchObject({
      active: true,
      lastStatus: "login_failed: portal rejected the credentials",
    });
    expect(metrics.getCounter("cycles_failed")).toBe(1);
  });

  it("only touches the check fields when the results page cannot be fetched", async () => {
    const results = resultsPage([readyRow("Hemograma")]);
    const http = fakePortal(results);
    http.sequence("GET", "/resultados", [{ body: results }, { status: 503, body: "unavailable" }]);
    const before = await store.get(USER_ID);

    const outcome = await runMonitorCycle(cycleDeps(http), USER_ID);

    expect(outcome).toMatchObject({
      state: "FAILED",
      failedAt: "FETCHED",
      reason: "http_status",
      status: `fetch_failed: HTTP 503 while fetching ${BASE_URL}/resultados`,
    });
    expect(await store.get(USER_ID)).toEqual({
      ...before,
      lastCheckAt: "2024-05-01T12:00:00.000Z",
      lastStatus: `fetch_failed: HTTP 503 while fetching ${BASE_URL}/resultados`,
    });
    // Initial landing after login, then two attempts at the results page.
    expect(http.requestsTo("GET", "/resultados")).toHaveLength(3);
  });

  it("retries a transient fetch failure before giving up", async () => {
    const results = resultsPage([pendingRow("Hemograma")]);
    const http = fakePortal(results);
    http.sequence("GET", "/resultados", [
      { body: results },
      { status: 503, body: "busy" },
      { body: results },
    ]);

    const outcome = await runMonitorCycle(cycleDeps(http), USER_ID);

    expect(outcome.state).toBe("NOT_READY");
  });

  it("does not retry a session that expired", async () => {
    const http = fakePortal(resultsPage([readyRow("Hemograma")]));
    http.sequence("GET", "/resultados", [
      { body: resultsPage([]) },
      { status: 302, headers: { location: "/acesso_paciente" } },
    ]);

    const outcome = await runMonitorCycle(cycleDeps(http), USER_ID);

    expect(outcome).toMatchObject({ state: "FAILED", failedAt: "FETCHED", reason: "session_expired" });
    expect(outcome.status).toBe(`fetch_failed: session expired while fetching ${BASE_URL}/resultados`);
    expect(http.requestsTo("GET", "/resultados")).toHaveLength(2);
  });

  it("fails at PARSED when the results page has no table", async () => {
    const http = fakePortal("<html><body><p>Nenhum exame</p></body></html>");

    const outcome = await runMonitorCycle(cycleDeps(http), USER_ID);

    expect(outcome).toMatchObject({
      state: "FAILED",
      failedAt: "PARSED",
      status: "parse_failed: results page has no result table",
    });
  });

  it("keeps the user monitored when the report cannot be extracted", async () => {
    const http = fakePortal(resultsPage([readyRow("Hemograma")], "Laudo em preparação"));

    const outcome = await runMonitorCycle(cycleDeps(http), USER_ID);

    expect(outcome).toMatchObject({
      state: "FAILED",
      failedAt: "EXTRACTED",
      status: "extract_failed: no document link found on the results page",
    });
    expect(delivery.sent).toHaveLength(0);
    expect((await store.get(USER_ID))?.active).toBe(true);
  });

  it("keeps the user monitored when delivery fails", async () => {
    delivery.result = { ok: false, error: "chat not found" };
    const http = fakePortal(resultsPage([readyRow("Hemograma")]));

    const outcome = await runMonitorCycle(cycleDeps(http), USER_ID);

    expect(outcome).toMatchObject({
      state: "FAILED",
      failedAt: "DELIVERED",
      status: `delivery_failed: recording delivery to user ${USER_ID} failed: chat not found`,
    });
    expect((await store.get(USER_ID))?.active).toBe(true);
  });

  it("treats a throwing delivery channel as a delivery failure", async () => {
    const http = fakePortal(resultsPage([readyRow("Hemograma")]));
    const throwing: DeliveryChannel = {
      name: "broken",
      sendDocument: vi.fn(async () => {
        throw new Error("socket hang up");
      }),
      notify: vi.fn(async () => ({ ok: true as const })),
    };

    const outcome = await runMonitorCycle(cycleDeps(http, { delivery: throwing }), USER_ID);

    expect(outcome).toMatchObject({ state: "FAILED", status: "delivery_failed: broken delivery threw: socket hang up" });
    expect((await store.get(USER_ID))?.active).toBe(true);
  });

  it("still returns the outcome when the status write fails", async () => {
    class ReadOnlyStore extends InMemoryCredentialStore {
      async recordCheck(): Promise<void> {
        throw new Error("database is locked");
      }
    }
    store = new ReadOnlyStore();
    await store.upsert({ userId: USER_ID, username: "patient-1", secret: "test-secret" });
    const http = fakePortal(resultsPage([pendingRow("Hemograma")]));

    const outcome = await runMonitorCycle(cycleDeps(http), USER_ID);

    expect(outcome.state).toBe("NOT_READY");
  });

  it("fails at EXTRACTED when the document link has an unusable address", async () => {
    const http = fakePortal(resultsPage([readyRow("Hemograma")], '<a href="http://">Visualizar Laudo</a>'));

    const outcome = await runMonitorCycle(cycleDeps(http), USER_ID);

    expect(outcome).toMatchObject({
      state: "FAILED",
      failedAt: "EXTRACTED",
      status: "extract_failed: no document link found on the results page",
    });
    expect((await store.get(USER_ID))?.active).toBe(true);
  });

  it("retries deregistration once after a delivery", async () => {
    class FlakyStore extends InMemoryCredentialStore {
      failures = 1;

      async deactivate(userId: number): Promise<boolean> {
        if (this.failures > 0) {
          this.failures -= 1;
          throw new Error("database is locked");
        }
        return super.deactivate(userId);
      }
    }
    store = new FlakyStore();
    await store.upsert({ userId: USER_ID, username: "patient-1", secret: "test-secret" });
    const http = fakePortal(resultsPage([readyRow("Hemograma")]));

    const outcome = await runMonitorCycle(cycleDeps(http), USER_ID);

    expect(outcome.state).toBe("DEREGISTERED");
    expect((await store.get(USER_ID))?.active).toBe(false);
  });

  it("surfaces a deregistration that keeps failing after delivery", async () => {
    class LockedStore extends InMemoryCredentialStore {
      async deactivate(): Promise<boolean> {
        throw new Error("database is locked");
      }
    }
    store = new LockedStore();
    await store.upsert({ userId: USER_ID, username: "patient-1", secret: "test-secret" });
    const http = fakePortal(resultsPage([readyRow("Hemograma")]));

    await expect(runMonitorCycle(cycleDeps(http), USER_ID)).rejects.toThrow("database is locked");

    expect(delivery.sent).toHaveLength(1);
    expect(await store.get(USER_ID)).toMatchObject({ active: true, lastStatus: "failed: database is locked" });
  });
});

describe("login failure notice", () => {
  beforeEach(async () => {
    await store.upsert({ userId: USER_ID, username: "patient-1", secret: "stale-secret" });
  });

  it("tells the user once when a scheduled check cannot log in", async () => {
    const http = fakePortal(resultsPage([readyRow("Hemograma")]));
    const deps = cycleDeps(http);

    await runMonitorCycle(deps, USER_ID, "scheduled");
    await runMonitorCycle(deps, USER_ID, "scheduled");

    expect(delivery.notices).toEqual([{ userId: USER_ID, text: LOGIN_FAILED_NOTICE }]);
  });

  it("tells the user again after the status changed in between", async () => {
    const http = fakePortal(resultsPage([readyRow("Hemograma")]));
    const deps = cycleDeps(http);
    await runMonitorCycle(deps, USER_ID, "scheduled");
    await store.recordCheck(USER_ID, "results_pending: 0/1 results ready", CHECKED_AT.toISOString());

    await runMonitorCycle(deps, USER_ID, "scheduled");

    expect(delivery.notices).toHaveLength(2);
  });

  it("leaves manual checks to answer for themselves", async () => {
    const http = fakePortal(resultsPage([readyRow("Hemograma")]));

    const outcome = await runMonitorCycle(cycleDeps(http), USER_ID, "manual");

    expect(outcome.reason).toBe("invalid_credentials");
    expect(delivery.notices).toHaveLength(0);
  });

  it("stays quiet when the portal is unreachable", async () => {
    const http = fakePortal(resultsPage([readyRow("Hemograma")]));
    http.on("GET", "/acesso_paciente", { status: 503, body: "down" });

    const outcome = await runMonitorCycle(cycleDeps(http), USER_ID, "scheduled");

    expect(outcome).toMatchObject({ state: "FAILED", failedAt: "AUTHENTICATED", reason: "unreachable" });
    expect(delivery.notices).toHaveLength(0);
  });

  it("still returns the outcome when the notice cannot be sent", async () => {
    const http = fakePortal(resultsPage([readyRow("Hemograma")]));
    vi.spyOn(delivery, "notify").mockRejectedValue(new Error("chat not found"));

    const outcome = await runMonitorCycle(cycleDeps(http), USER_ID, "scheduled");

    expect(outcome.status).toBe("login_failed: portal rejected the credentials");
  });
});
