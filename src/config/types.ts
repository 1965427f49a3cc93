export interface PortalRules {
  readyBackgroundColors: string[];
  readyStatusTokens: string[];
  ignoredRowTokens: string[];
  documentLinkLabels: string[];
  documentHrefHints: string[];
  usernameFieldNames: string[];
  secretFieldNames: string[];
  defaultFilename: string;
}

export type DeliveryMode = "telegram" | "http";

export interface AppConfig {
  portalBaseUrl: string;
  loginPath: string;
  resultsPath?: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  pollIntervalMinutes: number;
  requestTimeoutMs: number;
  monitorConcurrency: number;
  maxFetchAttempts: number;
  retryDelayMs: number;
  storePath: string;
  deliveryMode: DeliveryMode;
  telegramBotToken?: string;
  telegramApiBaseUrl: string;
  telegramPollTimeoutSeconds: number;
  httpDeliveryEndpoint?: string;
  httpDeliveryToken?: string;
  portalRules: PortalRules;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "portalRules">> & {
  portalRules?: Partial<PortalRules>;
};
