import type { RawLineItem } from "./lineItem.js";
import { parseLocaleNumber } from "../../utils/money.js";

export const HEURISTIC_ITEM_CAP = 10;
const MIN_VALUE = 0.01;
const MAX_VALUE = 1_000_000;
// Lines read after the identifier's own line
const LOOKAHEAD = 2;

const IDENTIFIER_TOKEN = /\b[A-Z0-9][A-Z0-9.-]{2,18}[A-Z0-9]\b/g;
const NUMBER_TOKEN = /\d[\d.,]*\d|\d/g;

const looksLikeIdentifier = (token: string): boolean =>
  /[A-Z]/.test(token) && /\d/.test(token);

const identifiersIn = (line: string): string[] =>
  [...line.matchAll(IDENTIFIER_TOKEN)].map((match) => match[0]).filter(looksLikeIdentifier);

/**
 * Last-resort scan for layouts without field labels: an identifier-looking
 * token (letters and digits) followed by at least two plausible amounts on
 * its line or the next two lines becomes a line item. The window stops at
 * the next line carrying an identifier. First amount is the quantity, last
 * is the line total.
 */
export const scanForLineItems = (
  text: string,
  cap = HEURISTIC_ITEM_CAP
): RawLineItem[] => {
  const lines = text.split(/\r?\n/);
  const items: RawLineItem[] = [];
  const seen = new Set<string>();

  for (let i = 0; i < lines.length && items.length < cap; i++) {
    const identifier = identifiersIn(lines[i]).find((token) => !seen.has(token));
    if (!identifier) continue;

    const windowLines = [lines[i]];
    for (let j = i + 1; j <= i + LOOKAHEAD && j < lines.length; j++) {
      if (identifiersIn(lines[j]).length > 0) break;
      windowLines.push(lines[j]);
    }
    const window = windowLines
      .join("\n")
      .replace(IDENTIFIER_TOKEN, (token) => (looksLikeIdentifier(token) ? " " : token));

    const numbers = [...window.matchAll(NUMBER_TOKEN)]
      .map((match) => parseLocaleNumber(match[0]))
      .filter(
        (value): value is number =>
          value !== null && value >= MIN_VALUE && value <= MAX_VALUE
      );
    if (numbers.length < 2) continue;

    seen.add(identifier);
    const quantity = numbers[0];
    const lineTotal = numbers[numbers.length - 1];
    const lineNumber = items.length + 1;

    items.push({
      lineNumber,
      referenceCode: identifier,
      description: `EXTRACTED_PRODUCT_${lineNumber}`,
      quantity,
      unit: "001",
      tariffCode: "00000000",
      unitValue: quantity > 0 ? lineTotal / quantity : 0,
      lineTotal,
    });
  }

  return items;
};
