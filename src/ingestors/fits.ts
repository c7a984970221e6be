/**
 * FITS primary header reading.
 *
 * A header is a run of 2880-byte blocks, each holding 36 cards of 80 ASCII
 * characters: a keyword in columns 1-8, "= " in columns 9-10, then a value
 * with an optional "/ comment". The header ends at the END card.
 * COMMENT, HISTORY, blank and CONTINUE cards carry no value and are skipped.
 */

import { open } from "node:fs/promises";

export const FITS_BLOCK_SIZE = 2880;
export const FITS_CARD_SIZE = 80;

/** Upper bound on header blocks read before giving up on finding END */
const MAX_HEADER_BLOCKS = 200;

const VALUELESS_KEYWORDS = new Set(["", "COMMENT", "HISTORY", "CONTINUE"]);

export type FitsValue = string | number | boolean | null;

/** Keyword → value, in header order */
export type FitsHeader = Map<string, FitsValue>;

function parseQuoted(text: string): string {
  let value = "";
  for (let i = 1; i < text.length; i++) {
    if (text[i] !== "'") {
      value += text[i];
    } else if (text[i + 1] === "'") {
      value += "'";
      i++;
    } else {
      break;
    }
  }
  return value.trimEnd();
}

/**
 * Value field of a card (everything after "= ").
 * Strings lose their quotes and trailing blanks, T and F become booleans,
 * numbers (Fortran "D" exponents included) become numbers, and an empty
 * field is null. Anything else, such as a complex value, is kept as text.
 */
export function parseFitsValue(field: string): FitsValue {
  const text = field.trimStart();
  if (text.startsWith("'")) return parseQuoted(text);

  const slash = text.indexOf("/");
  const raw = (slash === -1 ? text : text.slice(0, slash)).trim();
  if (raw === "") return null;
  if (raw === "T") return true;
  if (raw === "F") return false;

  const n = Number(raw.replace(/[dD]/, "E"));
  return Number.isFinite(n) ? n : raw;
}

/** Keyword and value of one card, or null for a card without a value */
export function parseFitsCard(card: string): [string, FitsValue] | null {
  const keyword = card.slice(0, 8).trim();
  if (VALUELESS_KEYWORDS.has(keyword)) return null;

  if (keyword === "HIERARCH") {
    const rest = card.slice(8);
    const eq = rest.indexOf("=");
    if (eq === -1) return null;
    return [rest.slice(0, eq).trim(), parseFitsValue(rest.slice(eq + 1))];
  }

  if (card.slice(8, 10) !== "= ") return null;
  return [keyword, parseFitsValue(card.slice(10))];
}

/**
 * Read the primary header of a FITS file. Only the header blocks are read.
 * Throws when the file does not start with SIMPLE or ends before END.
 */
export async function readFitsHeader(path: string): Promise<FitsHeader> {
  const handle = await open(path, "r");
  try {
    const header: FitsHeader = new Map();
    const block = Buffer.alloc(FITS_BLOCK_SIZE);

    for (let n = 0; n < MAX_HEADER_BLOCKS; n++) {
      const { bytesRead } = await handle.read(block, 0, FITS_BLOCK_SIZE, n * FITS_BLOCK_SIZE);
      if (n === 0 && block.toString("latin1", 0, 9) !== "SIMPLE  =") {
        throw new Error(`${path} is not a FITS file`);
      }
      if (bytesRead < FITS_BLOCK_SIZE) {
        throw new Error(`${path} ends inside its FITS header`);
      }

      const text = block.toString("latin1");
      for (let offset = 0; offset < FITS_BLOCK_SIZE; offset += FITS_CARD_SIZE) {
        const card = text.slice(offset, offset + FITS_CARD_SIZE);
        if (card.slice(0, 8).trimEnd() === "END") return header;
        const entry = parseFitsCard(card);
        if (entry) header.set(entry[0], entry[1]);
      }
    }
    throw new Error(`${path} has no END card in its first ${MAX_HEADER_BLOCKS} header blocks`);
  } finally {
    await handle.close();
  }
}
