import { MalformedDocumentError } from "./errors";

export type DocumentPage = {
  page: number;
  text: string;
};

const PDF_SIGNATURE = "%PDF-";
const FORM_FEED = "\f";

function decodeUtf8(bytes: Uint8Array): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (error) {
    throw new MalformedDocumentError("Document is not valid UTF-8 text.", [], error);
  }
}

/**
 * Splits a text export of a report into pages. Pages are separated by form
 * feeds, numbered from 1; trailing empty pages are dropped.
 */
export function readDocumentPages(bytes: Uint8Array): DocumentPage[] {
  if (bytes.length === 0) {
    throw new MalformedDocumentError("Document is empty.");
  }

  const raw = decodeUtf8(bytes).replace(/^\uFEFF/, "");
  if (raw.startsWith(PDF_SIGNATURE)) {
    throw new MalformedDocumentError("Document is a binary PDF; upload its text export instead.", ["pdf_signature"]);
  }
  if (raw.includes("\u0000")) {
    throw new MalformedDocumentError("Document contains binary data.", ["nul_byte"]);
  }

  const pages = raw
    .replace(/\r\n?/g, "\n")
    .split(FORM_FEED)
    .map((text, index) => ({ page: index + 1, text }));

  while (pages.length > 0 && !pages[pages.length - 1].text.trim()) {
    pages.pop();
  }
  if (pages.length === 0) {
    throw new MalformedDocumentError("Document has no readable text.");
  }
  return pages;
}
