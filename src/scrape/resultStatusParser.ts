import { load } from "cheerio";
import type { PortalRules } from "../config";
import { ParseError } from "../core/errors";
import type { ResultItem, ResultSet } from "../types";
import { collapseWhitespace, containsAny } from "./htmlText";

export type ResultStatusRules = Pick<PortalRules, "readyBackgroundColors" | "readyStatusTokens" | "ignoredRowTokens">;

function normalizeColor(value: string): string {
  return value.replace(/\s+/g, "").toLowerCase();
}

function styleBackgroundColor(style: string | undefined): string | undefined {
  if (!style) {
    return undefined;
  }
  const match = style.match(/(?:^|;)\s*background-color\s*:\s*([^;]+)/i);
  return match ? normalizeColor(match[1]) : undefined;
}

export function buildResultSet(items: ResultItem[]): ResultSet {
  return {
    items,
    allReady: items.length > 0 && items.every((item) => item.ready),
  };
}

export function summarizeResultSet(resultSet: ResultSet): string {
  const total = resultSet.items.length;
  if (total === 0) {
    return "no results listed yet";
  }
  if (resultSet.allReady) {
    return `all ${total} results ready`;
  }
  const ready = resultSet.items.filter((item) => item.ready).length;
  return `${ready}/${total} results ready`;
}

/**
 * Reads the portal's results table. A row counts as ready only when it carries
 * one of the ready background colours and one of the ready status tokens.
 */
export class ResultStatusParser {
  private readonly readyColors: Set<string>;
  private readonly rules: ResultStatusRules;

  constructor(rules: ResultStatusRules) {
    this.rules = rules;
    this.readyColors = new Set(rules.readyBackgroundColors.map(normalizeColor));
  }

  parse(html: string): ResultSet {
    const $ = load(html);
    if ($("table").length === 0) {
      throw new ParseError("results page has no result table");
    }

    const items: ResultItem[] = [];
    for (const row of $("tr").toArray()) {
      const $row = $(row);
      if ($row.children("th").length > 0) {
        continue;
      }
      const cells = $row.children("td").toArray();
      if (cells.length === 0) {
        continue;
      }

      const rowText = collapseWhitespace($row.text());
      if (containsAny(rowText, this.rules.ignoredRowTokens)) {
        continue;
      }

      const colors: string[] = [];
      for (const node of [row, ...cells]) {
        const bgcolor = $(node).attr("bgcolor");
        if (bgcolor) {
          colors.push(normalizeColor(bgcolor));
        }
        const styled = styleBackgroundColor($(node).attr("style"));
        if (styled) {
          colors.push(styled);
        }
      }

      const hasReadyColor = colors.some((color) => this.readyColors.has(color));
      const hasReadyStatus = containsAny(rowText, this.rules.readyStatusTokens);
      const label = cells.map((cell) => collapseWhitespace($(cell).text())).find((text) => text.length > 0) ?? rowText;

      items.push({ label, ready: hasReadyColor && hasReadyStatus });
    }

    return buildResultSet(items);
  }
}
