import { load } from "cheerio";
import type { PortalRules } from "../config";
import { AuthError } from "../core/errors";
import { resolveUrl } from "../core/fetch";

export interface LoginFormSubmission {
  actionUrl: string;
  fields: URLSearchParams;
}

const USERNAME_INPUT_TYPES = new Set(["text", "email", "number", "tel"]);

export function hasPasswordInput(html: string): boolean {
  const $ = load(html);
  return $("input")
    .toArray()
    .some((input) => ($(input).attr("type") ?? "").toLowerCase() === "password");
}

export function buildLoginSubmission(
  html: string,
  loginUrl: string,
  username: string,
  secret: string,
  rules: Pick<PortalRules, "usernameFieldNames" | "secretFieldNames">,
): LoginFormSubmission | undefined {
  const $ = load(html);
  const form = $("form").first();
  if (form.length === 0) {
    return undefined;
  }

  const fields = new Map<string, string>();
  let sawUsernameInput = false;
  let sawSecretInput = false;

  for (const input of form.find("input").toArray()) {
    const name = $(input).attr("name");
    if (!name) {
      continue;
    }
    const type = ($(input).attr("type") ?? "text").toLowerCase();

    if (type === "hidden") {
      fields.set(name, $(input).attr("value") ?? "");
    } else if (USERNAME_INPUT_TYPES.has(type)) {
      sawUsernameInput = true;
      fields.set(name, username);
    } else if (type === "password") {
      sawSecretInput = true;
      fields.set(name, secret);
    }
  }

  if (!sawUsernameInput) {
    for (const name of rules.usernameFieldNames) {
      fields.set(name, username);
    }
  }
  if (!sawSecretInput) {
    for (const name of rules.secretFieldNames) {
      fields.set(name, secret);
    }
  }

  const action = form.attr("action")?.trim();
  const actionUrl = action ? resolveUrl(action, loginUrl) : loginUrl;
  if (!actionUrl) {
    throw new AuthError("unexpected_page", `login form has an invalid action: ${action}`);
  }
  return {
    actionUrl,
    fields: new URLSearchParams([...fields.entries()]),
  };
}
