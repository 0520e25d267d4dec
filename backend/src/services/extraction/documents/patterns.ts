/** Regex source fragments shared by the document definitions. */

export const DATE = String.raw`\d{1,2}[/-]\d{1,2}[/-]\d{2,4}|\d{4}[/-]\d{1,2}[/-]\d{1,2}`;

/** Group 1 is the number, group 2 an optional unit word. */
export const AMOUNT = String.raw`\$?[ \t]*([0-9][0-9,]*(?:\.[0-9]{1,2})?)[ \t]*(M|Million|K|Thousand)?\b`;

export const LABEL_GAP = String.raw`[ \t]*:?[ \t]*`;

export function labelled(label: string, value: string, flags = 'gi'): RegExp {
  return new RegExp(String.raw`\b(?:${label})${LABEL_GAP}(?:${value})`, flags);
}
