export { CookieJar } from "./cookieJar";
export { buildLoginSubmission, hasPasswordInput } from "./loginForm";
export type { LoginFormSubmission } from "./loginForm";
export { pageText, PortalClient } from "./portalClient";
export type { FetchedPage, PortalClientOptions, PortalGateway, PortalPage, PortalSessionHandle } from "./portalClient";
