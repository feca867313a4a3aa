/**
 * Flyer ("locandina") extraction.
 *
 * Seminar flyers are PDFs whose layout is roughly:
 *
 *   TITLE IN CAPITALS
 *   Prof. Name Surname
 *   short bio …
 *   12 ottobre 2025
 *   Dalle ore 09:00 alle 13:00
 *   Polo Didattico …
 *   Via …
 *   ABSTRACT
 *
 * Location and speaker are recovered from the text with line heuristics
 * tuned to that layout. Each step degrades to null instead of throwing.
 */

import pdf from "pdf-parse/lib/pdf-parse.js";
import type { FlyerExtract } from "@ianuacal/core";
import { fetchBuffer } from "./fetch.js";

export type PdfTextReader = (data: Buffer) => Promise<string>;

export interface FlyerExtractorOptions {
  timeoutMs?: number;
  /** Turns the downloaded document into plain text. Defaults to pdf-parse. */
  readText?: PdfTextReader;
}

const EMPTY: FlyerExtract = { text: null, location: null, speaker: null };

const MAX_LOCATION_LINES = 3;
const MAX_BIO_LINES = 3;

const TIME_ANNOUNCEMENT = /Dalle ore[\s\S]*?alle[\s\S]*?(?=\n\n|\n[A-Z]|$)/;

const SPEAKER_TITLES = ["Prof", "Dott", "Dr", "Direzione", "Segretario"];
const EXCLUDED_TOKENS = ["INDIRIZZO", "ANNO", "CL3", "LMCU", "ISB", "DIFAR"];
/** Lines at which the scheduling/location block starts. */
const METADATA_MARKERS = ["Dalle ore", "Polo Didattico", "Via "];
const BIO_STOP_MARKERS = ["Dalle ore", "Polo Didattico"];

/** One positioned run of text from pdf.js `getTextContent()`. */
export interface PdfTextItem {
  str: string;
  /** [a, b, c, d, x, y] */
  transform: number[];
}

/**
 * Extract the document text, one page after another separated by a single
 * newline. pdf-parse's own join puts a blank line between pages, which would
 * cut a location block running over a page break.
 */
export async function readPdfText(data: Buffer): Promise<string> {
  const pages: string[] = [];
  await pdf(data, {
    // `page` is a pdf.js page proxy; pdf-parse awaits what this returns, one page at a time
    pagerender: (page) =>
      page
        .getTextContent({ normalizeWhitespace: false, disableCombineTextItems: false })
        .then((content: { items: PdfTextItem[] }) => {
          const text = joinTextItems(content.items);
          pages.push(text);
          return text;
        }),
  });
  return joinPages(pages);
}

/** Page text with a line break wherever the baseline moves. */
export function joinTextItems(items: readonly PdfTextItem[]): string {
  let text = "";
  let lastY: number | undefined;
  for (const item of items) {
    const y = item.transform[5];
    text += lastY === undefined || y === lastY ? item.str : `\n${item.str}`;
    lastY = y;
  }
  return text;
}

export function joinPages(pages: readonly string[]): string {
  return pages.join("\n");
}

export class FlyerExtractor {
  private readonly timeoutMs: number;
  private readonly readText: PdfTextReader;

  constructor(options: FlyerExtractorOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.readText = options.readText ?? readPdfText;
  }

  /** Download a flyer and pull text, location and speaker out of it. */
  async extract(flyerUrl: string): Promise<FlyerExtract> {
    let data: Buffer;
    try {
      data = await fetchBuffer(flyerUrl, this.timeoutMs);
    } catch (err) {
      console.error(`[flyer] Error downloading ${flyerUrl}: ${err instanceof Error ? err.message : err}`);
      return { ...EMPTY };
    }

    let text: string | null;
    try {
      text = normalizeText(await this.readText(data));
    } catch (err) {
      console.error(`[flyer] Error extracting text from ${flyerUrl}: ${err instanceof Error ? err.message : err}`);
      return { ...EMPTY };
    }

    if (text === null) return { ...EMPTY };

    return {
      text,
      location: extractLocation(text),
      speaker: extractSpeaker(text),
    };
  }
}

/** Trimmed text, or null when the document had none. */
export function normalizeText(raw: string): string | null {
  const text = raw.replace(/\r\n?/g, "\n").trim();
  return text ? text : null;
}

/**
 * The lines right after the "Dalle ore X alle Y" announcement, up to a blank
 * line or the ABSTRACT heading.
 */
export function extractLocation(text: string): string | null {
  const match = TIME_ANNOUNCEMENT.exec(text);
  if (!match) return null;

  const after = text.slice(match.index + match[0].length).trim();
  const lines: string[] = [];
  for (const raw of after.split("\n")) {
    const line = raw.trim();
    if (!line || line.toUpperCase().includes("ABSTRACT")) break;
    lines.push(line);
  }

  const location = lines.slice(0, MAX_LOCATION_LINES).join("\n");
  return location ? location : null;
}

/**
 * The first name-like line between the headline and the scheduling block,
 * followed by up to three lines of bio.
 */
export function extractSpeaker(text: string): string | null {
  const lines = text.split("\n");

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;
    if (isHeadline(line)) continue;
    if (startsWithDigit(line)) break;
    if (METADATA_MARKERS.some((marker) => line.includes(marker))) break;
    if (!isSpeakerLine(line)) continue;

    const speaker = [line];
    for (const next of lines.slice(i + 1, i + 1 + MAX_BIO_LINES)) {
      const bio = next.trim();
      if (!isBioLine(bio)) break;
      speaker.push(bio);
    }
    const joined = speaker.join("\n").trim();
    return joined ? joined : null;
  }

  return null;
}

// ---- line predicates ----

/** Has cased characters and all of them are uppercase. */
export function isAllCaps(line: string): boolean {
  return line === line.toUpperCase() && line !== line.toLowerCase();
}

function startsWithDigit(line: string): boolean {
  return /^\d/.test(line);
}

function isHeadline(line: string): boolean {
  return isAllCaps(line) && line.length > 10 && !/\d/.test(line);
}

function isSpeakerLine(line: string): boolean {
  const words = line.split(/\s+/);
  if (words.length < 2 || isAllCaps(line)) return false;

  const upper = line.toUpperCase();
  if (EXCLUDED_TOKENS.some((token) => upper.includes(token))) return false;

  if (SPEAKER_TITLES.some((title) => line.includes(title))) return true;
  // Bare "Name Surname"
  return words.length === 2 && !/\d/.test(line);
}

function isBioLine(line: string): boolean {
  return (
    line.length > 0 &&
    !isAllCaps(line) &&
    !startsWithDigit(line) &&
    !BIO_STOP_MARKERS.some((marker) => line.includes(marker))
  );
}
