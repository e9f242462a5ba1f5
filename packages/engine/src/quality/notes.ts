/**
 * Ordered, append-only tag lists collected while assessing a segment.
 *
 * Rules never share a mutable list: each returns the notes it raised and
 * the pipeline merges them in rule order.
 */

import type { MissingMarker } from "@cqi/types";
import { splitDelimited } from "../tags/index.js";

export interface Notes {
  readonly missing: readonly MissingMarker[];
  readonly bonus: readonly string[];
  readonly malus: readonly string[];
}

export const EMPTY_NOTES: Notes = Object.freeze({ missing: [], bonus: [], malus: [] });

/** Delimiter used when tag lists are serialized */
export const TAG_LIST_DELIMITER = ";";

/** Append values that are not in the list yet, keeping first-seen order. */
export function appendUnique<T extends string>(list: readonly T[], ...values: T[]): T[] {
  const result = [...list];
  for (const value of values) {
    if (!result.includes(value)) result.push(value);
  }
  return result;
}

/** Merge notes in order, de-duplicating each list. */
export function mergeNotes(...parts: Partial<Notes>[]): Notes {
  let missing: MissingMarker[] = [];
  let bonus: string[] = [];
  let malus: string[] = [];
  for (const part of parts) {
    missing = appendUnique(missing, ...(part.missing ?? []));
    bonus = appendUnique(bonus, ...(part.bonus ?? []));
    malus = appendUnique(malus, ...(part.malus ?? []));
  }
  return { missing, bonus, malus };
}

export function joinTagList(list: readonly string[]): string {
  return list.join(TAG_LIST_DELIMITER);
}

export function parseTagList(value: string | null | undefined): string[] {
  return splitDelimited(value ?? undefined, TAG_LIST_DELIMITER);
}
