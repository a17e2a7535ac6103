/**
 * Profile save (`*_PRFLDB`) decoder
 *
 * ## Layout
 *   Bytes 0..3    magic "EVAS"
 *   Bytes 4..19   header (sizes, flags) - not needed, discarded
 *   Bytes 20..    AES-256 ciphertext, fixed key, 16-byte blocks
 *
 * ## Pipeline
 *   1. Check magic.
 *   2. Drop the header; truncate the payload to a whole number of blocks.
 *   3. Decrypt every 16-byte block on its own: the format has no chaining
 *      and no IV, so block N depends only on ciphertext block N.
 *   4. zlib inflate (the stream carries a zlib header).
 *   5. UTF-8, strip trailing NULs / whitespace, parse the first JSON value.
 *      Anything after that value is padding and is ignored.
 */
import { createCipheriv, createDecipheriv } from "node:crypto";
import { readFile } from "node:fs/promises";
import { deflateSync, inflateSync } from "node:zlib";
import { DecodeError, errorMessage } from "../errors.js";

export const SAVE_MAGIC = Buffer.from("EVAS", "ascii");
export const SAVE_HEADER_SIZE = 20;
export const SAVE_BLOCK_SIZE = 16;

/** Fixed key embedded in the game client */
const SAVE_KEY = Buffer.from("728B369E24ED0134768511021812AFC0A3C25D02065F166B4BCC58CD2644F29E", "hex");

/**
 * Decrypt each fixed-size block independently. ECB is exactly that: no
 * chaining and no IV. Input must be block-aligned.
 */
export function decryptIndependentBlocks(ciphertext: Buffer): Buffer {
  const decipher = createDecipheriv("aes-256-ecb", SAVE_KEY, null);
  decipher.setAutoPadding(false);
  return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
}

export function encryptIndependentBlocks(plaintext: Buffer): Buffer {
  const cipher = createCipheriv("aes-256-ecb", SAVE_KEY, null);
  cipher.setAutoPadding(false);
  return Buffer.concat([cipher.update(plaintext), cipher.final()]);
}

/** Drop trailing NUL padding and whitespace */
function trimTrailing(text: string): string {
  let end = text.length;
  while (end > 0 && (text[end - 1] === "\0" || /\s/.test(text[end - 1]))) end--;
  return text.slice(0, end);
}

const JSON_SCALAR = /^(?:-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?|true|false|null)/;

/**
 * Index just past the first complete JSON value in `text`, or -1.
 * A bare scalar ends where the number or literal grammar stops.
 */
export function firstJsonValueEnd(text: string): number {
  let start = 0;
  while (start < text.length && /\s/.test(text[start])) start++;
  if (start >= text.length) return -1;

  const first = text[start];
  if (first !== "{" && first !== "[") {
    if (first === '"') {
      let esc = false;
      for (let i = start + 1; i < text.length; i++) {
        const c = text[i];
        if (esc) esc = false;
        else if (c === "\\") esc = true;
        else if (c === '"') return i + 1;
      }
      return -1;
    }
    const m = JSON_SCALAR.exec(text.slice(start));
    return m ? start + m[0].length : -1;
  }

  let depth = 0;
  let inStr = false;
  let esc = false;
  for (let i = start; i < text.length; i++) {
    const c = text[i];
    if (inStr) {
      if (esc) esc = false;
      else if (c === "\\") esc = true;
      else if (c === '"') inStr = false;
      continue;
    }
    if (c === '"') inStr = true;
    else if (c === "{" || c === "[") depth++;
    else if (c === "}" || c === "]") {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return -1;
}

/** Parse the first JSON value of `text`, ignoring whatever follows it. */
export function parseFirstJsonValue(text: string): unknown {
  const end = firstJsonValueEnd(text);
  if (end < 0) throw new SyntaxError("no complete JSON value found");
  return JSON.parse(text.slice(0, end));
}

export function decodeSaveBuffer(data: Buffer): unknown {
  const magic = data.subarray(0, SAVE_MAGIC.length);
  if (!magic.equals(SAVE_MAGIC)) {
    throw new DecodeError("magic", `unrecognized save format (magic=${JSON.stringify(magic.toString("latin1"))}, hex ${magic.toString("hex")})`);
  }

  const payload = data.subarray(SAVE_HEADER_SIZE);
  const aligned = payload.subarray(0, payload.length - (payload.length % SAVE_BLOCK_SIZE));

  let plain: Buffer;
  try {
    plain = decryptIndependentBlocks(aligned);
  } catch (e) {
    throw new DecodeError("decrypt", errorMessage(e), { cause: e });
  }

  let inflated: Buffer;
  try {
    inflated = inflateSync(plain);
  } catch (e) {
    throw new DecodeError("decompress", errorMessage(e), { cause: e });
  }

  const text = trimTrailing(inflated.toString("utf8"));
  try {
    return parseFirstJsonValue(text);
  } catch (e) {
    throw new DecodeError("json", errorMessage(e), { cause: e });
  }
}

export async function decodeSave(file: string): Promise<unknown> {
  let data: Buffer;
  try {
    data = await readFile(file);
  } catch (e) {
    throw new DecodeError("read", `cannot read ${file}: ${errorMessage(e)}`, { cause: e });
  }
  return decodeSaveBuffer(data);
}

/**
 * Build a save file around `text`. Used for fixtures and tests; the header
 * bytes are zero and the compressed stream is NUL-padded to a block boundary.
 */
export function encodeSaveText(text: string): Buffer {
  const compressed = deflateSync(Buffer.from(text, "utf8"));
  const padded = Buffer.alloc(Math.ceil(compressed.length / SAVE_BLOCK_SIZE) * SAVE_BLOCK_SIZE);
  compressed.copy(padded);
  return Buffer.concat([
    SAVE_MAGIC,
    Buffer.alloc(SAVE_HEADER_SIZE - SAVE_MAGIC.length),
    encryptIndependentBlocks(padded),
  ]);
}

export function encodeSave(value: unknown, trailing = ""): Buffer {
  return encodeSaveText(JSON.stringify(value) + trailing);
}
