import { DEFAULT_CONFIG } from "../../src/config";
import type { AppConfig } from "../../src/config";
import { Logger, MetricsRegistry } from "../../src/observability";
import { FakeHttp } from "./fakeHttp";
import type { FakeResponse } from "./fakeHttp";

export const BASE_URL = "https://portal.test";
export const PDF_BYTES = Buffer.from("%PDF-1.4\n% lab report fixture\n%%EOF\n", "utf-8");

export const LOGIN_PAGE = `
<html><body>
  <form action="/login" method="post">
    <input type="hidden" name="csrf" value="tok-1">
    <input type="text" name="identificacao">
    <input type="password" name="senha">
    <button type="submit">Entrar</button>
  </form>
</body></html>`;

export function readyRow(label: string): string {
  return `<tr bgcolor="#8FF08F"><td>${label}</td><td>Liberado</td></tr>`;
}

export function pendingRow(label: string): string {
  return `<tr><td>${label}</td><td>Em andamento</td></tr>`;
}

export function resultsPage(rows: string[], documentLink = '<a href="/get_laudo?id=42">Visualizar Laudo</a>'): string {
  return `
<html><body>
  <table>
    <tr><th>Exame</th><th>Situação</th></tr>
    ${rows.join("\n    ")}
  </table>
  <p>${documentLink}</p>
</body></html>`;
}

export function embeddedDocumentPage(base64: string): string {
  return `
<html><body>
  <object type="application/pdf" data="#">
    <param id="base64-param" name="base64" value="${base64}">
  </object>
</body></html>`;
}

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    ...DEFAULT_CONFIG,
    portalBaseUrl: BASE_URL,
    requestTimeoutMs: 1_000,
    retryDelayMs: 0,
    storePath: ":memory:",
    ...overrides,
  };
}

export function silentLogger(): Logger {
  return new Logger({ component: "test", runId: "run_test" }, () => undefined);
}

export function testMetrics(): MetricsRegistry {
  return new MetricsRegistry();
}

/**
 * Portal stand-in with one account ("patient-1" / "test-secret"): login sets a
 * session cookie and redirects to /resultados.
 */
export function fakePortal(results: string, documentBody: string | Buffer = embeddedDocumentPage(PDF_BYTES.toString("base64"))): FakeHttp {
  const http = new FakeHttp();
  http.on("GET", "/acesso_paciente", {
    body: LOGIN_PAGE,
    headers: { "content-type": "text/html; charset=utf-8" },
    setCookies: ["PHPSESSID=abc123; Path=/; HttpOnly"],
  });
  http.on("POST", "/login", (request): FakeResponse => {
    const fields = new URLSearchParams(request.body ?? "");
    if (fields.get("identificacao") !== "patient-1" || fields.get("senha") !== "test-secret") {
      return { body: LOGIN_PAGE, headers: { "content-type": "text/html" } };
    }
    return { status: 302, headers: { location: "/resultados" }, setCookies: ["auth=ok; Path=/"] };
  });
  http.on("GET", "/resultados", { body: results, headers: { "content-type": "text/html" } });
  http.on("GET", "/get_laudo?id=42", {
    body: documentBody,
    headers: { "content-type": Buffer.isBuffer(documentBody) ? "application/pdf" : "text/html" },
  });
  return http;
}
