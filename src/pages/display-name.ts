/**
 * Display-name rules for pages (and sections): the service rejects names
 * containing any of ?*\/:<>|&#'%~.
 */

import { InvalidNameError } from "../errors.js";

const REPLACEMENTS: Record<string, string> = {
  "?": ".",
  "*": ".",
  "\\": "-",
  "/": "-",
  ":": "-",
  "<": "(",
  ">": ")",
  "|": "-",
  "&": "and",
  "#": "number",
  "'": "-",
  "%": "percent",
  "~": "-",
};

export const ILLEGAL_NAME_CHARACTERS: readonly string[] = Object.keys(REPLACEMENTS);

export function replacementFor(character: string): string {
  return REPLACEMENTS[character] ?? "-";
}

/** Replace every illegal character with its readable substitute. */
export function suggestValidName(name: string): string {
  let suggestion = name;
  for (const character of ILLEGAL_NAME_CHARACTERS) {
    suggestion = suggestion.split(character).join(replacementFor(character));
  }
  return suggestion;
}

/**
 * Throw InvalidNameError naming the first illegal character found, in the
 * order of ILLEGAL_NAME_CHARACTERS.
 */
export function validateDisplayName(name: string, label = "display name"): void {
  const character = ILLEGAL_NAME_CHARACTERS.find((c) => name.includes(c));
  if (character === undefined) return;
  throw new InvalidNameError(
    label,
    character,
    replacementFor(character),
    suggestValidName(name),
    ILLEGAL_NAME_CHARACTERS.join(""),
  );
}
