// Amounts travel as decimal strings with two fractional digits ("1234.50")
// so cache entries and checkpoints never carry floating-point drift.
export type Amount = string;

export const AMOUNT_PATTERN = /^-?\d+\.\d{2}$/;

export const ZERO_AMOUNT: Amount = "0.00";

export const toCents = (amount: Amount): number => {
  const match = /^(-?)(\d+)(?:\.(\d{1,2}))?$/.exec(amount.trim());
  if (!match) {
    throw new Error(`Invalid amount: ${amount}`);
  }
  const [, sign, whole, fraction = ""] = match;
  const cents = parseInt(whole, 10) * 100 + parseInt(fraction.padEnd(2, "0"), 10);
  return sign === "-" ? -cents : cents;
};

export const fromCents = (cents: number): Amount => {
  const sign = cents < 0 ? "-" : "";
  const absolute = Math.abs(Math.round(cents));
  const whole = Math.floor(absolute / 100);
  const fraction = String(absolute % 100).padStart(2, "0");
  return `${sign}${whole}.${fraction}`;
};

export const amountFromNumber = (value: number): Amount => {
  if (!Number.isFinite(value)) {
    throw new Error(`Invalid amount: ${value}`);
  }
  const rounded = Math.round(Math.abs(value) * 100 + Number.EPSILON);
  return fromCents(value < 0 ? -rounded : rounded);
};

export const amountToNumber = (amount: Amount): number => toCents(amount) / 100;

export const sumAmounts = (amounts: readonly Amount[]): Amount =>
  fromCents(amounts.reduce((total, amount) => total + toCents(amount), 0));

/**
 * Parses numbers as they appear in scanned invoices: "1,234.50", "1.234,50",
 * "$ 12,5", "1 000". With both separators present the rightmost one is the
 * decimal mark. A lone comma followed by one or two digits is a decimal mark,
 * otherwise it groups thousands.
 */
export const parseLocaleNumber = (raw: string): number | null => {
  let text = raw.replace(/[\s$€]/g, "");
  if (text === "") return null;

  const lastComma = text.lastIndexOf(",");
  const lastDot = text.lastIndexOf(".");

  if (lastComma >= 0 && lastDot >= 0) {
    if (lastComma > lastDot) {
      text = text.replace(/\./g, "").replace(",", ".");
    } else {
      text = text.replace(/,/g, "");
    }
  } else if (lastComma >= 0) {
    const commaCount = text.split(",").length - 1;
    text =
      commaCount === 1 && /,\d{1,2}$/.test(text)
        ? text.replace(",", ".")
        : text.replace(/,/g, "");
  } else if (text.split(".").length - 1 > 1) {
    text = text.replace(/\./g, "");
  }

  if (!/^-?\d*\.?\d+$/.test(text)) return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
};
