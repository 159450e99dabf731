/**
 * String-list columns (depends_on, contributors, confirmed_by, infra_changes)
 * are stored as JSON array text. Decoding happens here and nowhere else.
 */

import { z } from "zod";
import { ParseError } from "./errors.js";

const StringList = z.array(z.string());

/** Decode a stored list. Empty/NULL text is an empty list. */
export function decodeStringList(
  field: string,
  raw: string | null | undefined
): string[] {
  if (raw === null || raw === undefined || raw === "") return [];

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ParseError(
      field,
      error instanceof Error ? error.message : String(error)
    );
  }

  // A stored JSON null means "never set"
  if (parsed === null) return [];

  const result = StringList.safeParse(parsed);
  if (!result.success) {
    throw new ParseError(field, "expected a JSON array of strings");
  }
  return result.data;
}

export function encodeStringList(values: readonly string[]): string {
  return JSON.stringify(values);
}
