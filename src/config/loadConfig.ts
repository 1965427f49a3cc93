import fs from "node:fs";
import path from "node:path";
import type { AppConfig, ConfigOverrides, DeliveryMode } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  portalBaseUrl: "https://lablaudo.com.br",
  loginPath: "/acesso_paciente",
  resultsPath: undefined,
  userAgent: "lab-results-monitor/1.0",
  ignoreHttpsErrors: false,
  pollIntervalMinutes: 30,
  requestTimeoutMs: 20_000,
  monitorConcurrency: 2,
  maxFetchAttempts: 2,
  retryDelayMs: 1_000,
  storePath: "data/monitor.sqlite",
  deliveryMode: "telegram",
  telegramBotToken: undefined,
  telegramApiBaseUrl: "https://api.telegram.org",
  telegramPollTimeoutSeconds: 30,
  httpDeliveryEndpoint: undefined,
  httpDeliveryToken: undefined,
  portalRules: {
    readyBackgroundColors: ["#8ff08f"],
    readyStatusTokens: ["liberado"],
    ignoredRowTokens: ["visualizar laudo", "assinatura"],
    documentLinkLabels: ["visualizar laudo", "baixar", "download"],
    documentHrefHints: ["/get_laudo"],
    usernameFieldNames: ["username", "identificacao"],
    secretFieldNames: ["password", "senha"],
    defaultFilename: "lab_results.pdf",
  },
};

function isConfigOverrides(value: unknown): value is ConfigOverrides {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  if (!isConfigOverrides(parsed)) {
    throw new Error(`Config file must contain a JSON object: ${absolutePath}`);
  }
  return parsed;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toDeliveryMode(value: string | undefined, fallback: DeliveryMode): DeliveryMode {
  return value === "telegram" || value === "http" ? value : fallback;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    portalRules: {
      ...DEFAULT_CONFIG.portalRules,
      ...(fileConfig.portalRules ?? {}),
    },
  };

  return {
    ...merged,
    portalBaseUrl: env.PORTAL_BASE_URL ?? merged.portalBaseUrl,
    loginPath: env.PORTAL_LOGIN_PATH ?? merged.loginPath,
    resultsPath: env.PORTAL_RESULTS_PATH ?? merged.resultsPath,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    pollIntervalMinutes: toInt(env.POLL_INTERVAL_MINUTES, merged.pollIntervalMinutes),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    monitorConcurrency: toInt(env.MONITOR_CONCURRENCY, merged.monitorConcurrency),
    maxFetchAttempts: toInt(env.MAX_FETCH_ATTEMPTS, merged.maxFetchAttempts),
    retryDelayMs: toInt(env.RETRY_DELAY_MS, merged.retryDelayMs),
    storePath: env.STORE_PATH ?? merged.storePath,
    deliveryMode: toDeliveryMode(env.DELIVERY_MODE, merged.deliveryMode),
    telegramBotToken: env.TELEGRAM_BOT_TOKEN ?? merged.telegramBotToken,
    telegramApiBaseUrl: env.TELEGRAM_API_BASE_URL ?? merged.telegramApiBaseUrl,
    telegramPollTimeoutSeconds: toInt(env.TELEGRAM_POLL_TIMEOUT_SECONDS, merged.telegramPollTimeoutSeconds),
    httpDeliveryEndpoint: env.HTTP_DELIVERY_ENDPOINT ?? merged.httpDeliveryEndpoint,
    httpDeliveryToken: env.HTTP_DELIVERY_TOKEN ?? merged.httpDeliveryToken,
  };
}

export { DEFAULT_CONFIG };
