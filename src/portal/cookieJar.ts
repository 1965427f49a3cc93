import type { HttpHeadersLike } from "../core/fetch";

/** Single-origin cookie store; the portal is one host, so domain and path scoping are not tracked. */
export class CookieJar {
  private readonly cookies = new Map<string, string>();

  storeFrom(headers: HttpHeadersLike): void {
    for (const setCookie of headers.getSetCookie()) {
      this.store(setCookie);
    }
  }

  store(setCookie: string, now = Date.now()): void {
    const [pair, ...attributes] = setCookie.split(";");
    const separator = pair.indexOf("=");
    if (separator <= 0) {
      return;
    }

    const name = pair.slice(0, separator).trim();
    const value = pair.slice(separator + 1).trim();
    const expired = attributes.some((attribute) => {
      const eq = attribute.indexOf("=");
      const key = (eq >= 0 ? attribute.slice(0, eq) : attribute).trim().toLowerCase();
      const raw = eq >= 0 ? attribute.slice(eq + 1).trim() : "";
      if (key === "max-age") {
        return Number.parseInt(raw, 10) <= 0;
      }
      if (key === "expires") {
        const expiresAt = Date.parse(raw);
        return Number.isFinite(expiresAt) && expiresAt <= now;
      }
      return false;
    });

    if (expired || value === "") {
      this.cookies.delete(name);
      return;
    }
    this.cookies.set(name, value);
  }

  get(name: string): string | undefined {
    return this.cookies.get(name);
  }

  get size(): number {
    return this.cookies.size;
  }

  header(): string | undefined {
    if (this.cookies.size === 0) {
      return undefined;
    }
    return [...this.cookies.entries()].map(([name, value]) => `${name}=${value}`).join("; ");
  }
}
