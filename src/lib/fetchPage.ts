/* ──────────────────────────────────────────────────────────────────────────
   src/lib/fetchPage.ts
   --------------------------------------------------------------------------
   Best-effort article text for the article-analysis prompt.
     • createPageFetcher() – GET aborted after a hard timeout, body capped;
                             null on any failure
     • htmlToText()        – readable text of the article / main / body
   A null result only means the model has to look the page up itself.
   ------------------------------------------------------------------------ */

import * as cheerio from "cheerio";
import fetch from "node-fetch";
import { toError } from "./errors.js";
import { log } from "./log.js";

export type PageFetcher = (url: string) => Promise<string | null>;

/*──────────────────────── CONSTANTS ──────────────────────*/
const FETCH_TIMEOUT_MS  = 20_000;
const MAX_BODY_BYTES    = 2_000_000;
const MIN_USEFUL_CHARS  = 200;
const USER_AGENT        = "Mozilla/5.0 (compatible; company-intel/1.0)";

const NOISE_SELECTOR = "script, style, noscript, svg, nav, footer, header, iframe, form";
const BLOCK_SELECTOR = "p, div, h1, h2, h3, h4, h5, h6, li, tr, article, section, blockquote";
const ROOT_SELECTORS = ["article", "main", "body"];

/*──────────────────────── HELPERS ────────────────────────*/
export function htmlToText(html: string): string {
  const $ = cheerio.load(html);
  $(NOISE_SELECTOR).remove();
  $("br").replaceWith("\n");
  $(BLOCK_SELECTOR).append("\n");

  const root = ROOT_SELECTORS.map((sel) => $(sel).first()).find((el) => el.length > 0);
  const text = root ? root.text() : $.root().text();
  return text
    .replace(/[ \t\u00a0]+/g, " ")
    .replace(/\s*\n\s*/g, "\n")
    .trim();
}

const isHttpUrl = (url: string): boolean => {
  try {
    const { protocol } = new URL(url);
    return protocol === "http:" || protocol === "https:";
  } catch {
    return false;
  }
};

/*──────────────────────── FETCH ──────────────────────────*/
/**
 * The abort timer stays armed until the whole body has been read, so a server
 * that sends headers and then stalls still ends in null.
 */
export function createPageFetcher(
  timeoutMs: number = FETCH_TIMEOUT_MS,
  maxBytes: number = MAX_BODY_BYTES,
): PageFetcher {
  return async (url) => {
    if (!isHttpUrl(url)) {
      log.debug(`[FetchPage] skip ${url}: not an http(s) URL`);
      return null;
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const resp = await fetch(url, {
        headers: { "User-Agent": USER_AGENT, Accept: "text/html" },
        signal : controller.signal,
        size   : maxBytes,
      });
      if (!resp.ok) {
        log.debug(`[FetchPage] ${url} → HTTP ${resp.status}`);
        return null;
      }
      const text = htmlToText(await resp.text());
      return text.length >= MIN_USEFUL_CHARS ? text : null;
    } catch (e: unknown) {
      log.debug(`[FetchPage] ${url} failed: ${toError(e).message}`);
      return null;
    } finally {
      clearTimeout(timer);
    }
  };
}
