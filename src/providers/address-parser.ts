/**
 * Address header parsing.
 *
 * Splits `From`/`To`/`Cc` header values such as `Jane Doe <jane@example.com>`
 * into name and address.
 */

import type { EmailAddress } from "../types/email.js";

const NAME_AND_ADDRESS = /^(.*?)\s*<\s*([^<>]+?)\s*>$/;
const BARE_ADDRESS = /^[^@\s<>]+@[^@\s<>]+\.[^@\s<>]+$/;

function unquote(name: string): string {
  const trimmed = name.trim();
  if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    return trimmed.slice(1, -1).trim();
  }
  return trimmed;
}

/**
 * Parse a single address. A bare address has no name; text that is not an
 * address becomes the name.
 */
export function parseAddress(value: string | null | undefined): EmailAddress {
  const input = (value ?? "").trim();
  if (input === "") return { name: null, email: null };

  const match = NAME_AND_ADDRESS.exec(input);
  if (match) {
    const name = unquote(match[1] ?? "");
    return { name: name === "" ? null : name, email: match[2] ?? null };
  }

  if (BARE_ADDRESS.test(input)) return { name: null, email: input };

  return { name: unquote(input), email: null };
}

/**
 * Split a comma-separated header into addresses. Commas inside a quoted
 * display name do not split.
 */
export function splitAddressList(value: string): string[] {
  const parts: string[] = [];
  let current = "";
  let inQuotes = false;
  let inAngle = false;

  for (const char of value) {
    if (char === '"' && !inAngle) inQuotes = !inQuotes;
    else if (char === "<" && !inQuotes) inAngle = true;
    else if (char === ">" && !inQuotes) inAngle = false;

    if (char === "," && !inQuotes && !inAngle) {
      parts.push(current);
      current = "";
    } else {
      current += char;
    }
  }
  parts.push(current);

  return parts.map((part) => part.trim()).filter((part) => part !== "");
}

export function parseAddressList(value: string | null | undefined): EmailAddress[] {
  if (!value) return [];
  return splitAddressList(value).map(parseAddress);
}
