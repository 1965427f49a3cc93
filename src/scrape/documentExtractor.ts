import { load } from "cheerio";
import type { PortalRules } from "../config";
import { ExtractError } from "../core/errors";
import { resolveUrl } from "../core/fetch";
import { pageText } from "../portal";
import type { FetchedPage, PortalGateway, PortalSessionHandle } from "../portal";
import type { LabDocument } from "../types";
import { collapseWhitespace, containsAny } from "./htmlText";

export type DocumentRules = Pick<PortalRules, "documentLinkLabels" | "documentHrefHints" | "defaultFilename">;

export type DocumentLink = { kind: "inline"; dataUri: string } | { kind: "remote"; url: string };

const PDF_MAGIC = Buffer.from("%PDF");
const PDF_CONTENT_TYPE = "application/pdf";
const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

export function isPdf(content: Buffer): boolean {
  return content.length >= PDF_MAGIC.length && content.subarray(0, PDF_MAGIC.length).equals(PDF_MAGIC);
}

export function decodeBase64Strict(payload: string): Buffer {
  const compact = payload.replace(/\s+/g, "");
  if (compact.length === 0 || compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
    throw new ExtractError("malformed base64 payload");
  }
  return Buffer.from(compact, "base64");
}

export function decodeDataUri(dataUri: string): Buffer {
  const comma = dataUri.indexOf(",");
  if (comma < 0) {
    throw new ExtractError("malformed inline document link");
  }
  const meta = dataUri.slice(5, comma).toLowerCase();
  if (!meta.split(";").includes("base64")) {
    throw new ExtractError("inline document link is not base64 encoded");
  }
  return decodeBase64Strict(dataUri.slice(comma + 1));
}

export function resolveFilename(url: string, contentDisposition: string | undefined, fallback: string): string {
  let filename: string | undefined;

  const match = contentDisposition?.match(/filename\*?=(?:UTF-8'')?["']?([^"';]+)["']?/i);
  if (match) {
    filename = match[1].trim();
  } else {
    const segments = new URL(url).pathname.split("/").reverse();
    filename = segments.find((segment) => segment.includes("."));
  }

  const resolved = filename && filename.length > 0 ? filename : fallback;
  return resolved.toLowerCase().endsWith(".pdf") ? resolved : `${resolved}.pdf`;
}

function toLink(href: string, pageUrl: string): DocumentLink | undefined {
  const trimmed = href.trim();
  const lowered = trimmed.toLowerCase();
  if (lowered.startsWith("data:")) {
    return { kind: "inline", dataUri: trimmed };
  }
  if (lowered.startsWith("javascript:") || lowered.startsWith("#")) {
    return undefined;
  }
  const url = resolveUrl(trimmed, pageUrl);
  return url ? { kind: "remote", url } : undefined;
}

export function locateDocumentLink(html: string, pageUrl: string, rules: DocumentRules): DocumentLink | undefined {
  const $ = load(html);
  const anchors = $("a[href]")
    .toArray()
    .map((anchor) => ({
      href: $(anchor).attr("href") ?? "",
      text: collapseWhitespace($(anchor).text()),
    }));

  for (const anchor of anchors) {
    if (containsAny(anchor.text, rules.documentLinkLabels)) {
      const link = toLink(anchor.href, pageUrl);
      if (link) {
        return link;
      }
    }
  }

  for (const anchor of anchors) {
    if (containsAny(anchor.href, rules.documentHrefHints)) {
      const link = toLink(anchor.href, pageUrl);
      if (link) {
        return link;
      }
    }
  }

  return undefined;
}

function looksLikeHtml(page: FetchedPage): boolean {
  return page.contentType.includes("html") || pageText(page).trimStart().startsWith("<");
}

export class DocumentExtractor {
  private readonly portal: Pick<PortalGateway, "fetch">;
  private readonly rules: DocumentRules;

  constructor(portal: Pick<PortalGateway, "fetch">, rules: DocumentRules) {
    this.portal = portal;
    this.rules = rules;
  }

  async extract(session: PortalSessionHandle, resultsPage: FetchedPage): Promise<LabDocument> {
    const link = locateDocumentLink(pageText(resultsPage), resultsPage.url, this.rules);
    if (!link) {
      throw new ExtractError("no document link found on the results page");
    }

    if (link.kind === "inline") {
      return this.pdfDocument(decodeDataUri(link.dataUri), this.rules.defaultFilename);
    }

    const documentPage = await this.portal.fetch(session, { kind: "document", url: link.url });
    return this.fromDocumentPage(session, documentPage);
  }

  private async fromDocumentPage(session: PortalSessionHandle, page: FetchedPage): Promise<LabDocument> {
    if (isPdf(page.body)) {
      return this.pdfDocument(page.body, resolveFilename(page.url, page.contentDisposition, this.rules.defaultFilename));
    }
    if (!looksLikeHtml(page)) {
      throw new ExtractError(`document response is not a PDF (${page.contentType || "no content type"})`);
    }

    const $ = load(pageText(page));
    const payload = $(`object[type='${PDF_CONTENT_TYPE}'] param#base64-param`).attr("value");
    if (payload !== undefined) {
      return this.pdfDocument(decodeBase64Strict(payload), this.rules.defaultFilename);
    }

    const frameSrc = $(`iframe[type='${PDF_CONTENT_TYPE}']`).attr("src");
    if (frameSrc) {
      const frameUrl = resolveUrl(frameSrc, page.url);
      if (!frameUrl) {
        throw new ExtractError(`embedded document frame has an invalid address: ${frameSrc}`);
      }
      const framed = await this.portal.fetch(session, { kind: "document", url: frameUrl });
      if (!isPdf(framed.body)) {
        throw new ExtractError("embedded document frame did not return a PDF");
      }
      return this.pdfDocument(
        framed.body,
        resolveFilename(framed.url, framed.contentDisposition, this.rules.defaultFilename),
      );
    }

    throw new ExtractError("document page carries no embedded report");
  }

  private pdfDocument(content: Buffer, filename: string): LabDocument {
    if (!isPdf(content)) {
      throw new ExtractError("decoded document is not a PDF");
    }
    return { content, filename, contentType: PDF_CONTENT_TYPE };
  }
}
