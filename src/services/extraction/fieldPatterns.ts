import type { RawLineItem } from "./lineItem.js";
import { parseLocaleNumber } from "../../utils/money.js";

export const LINE_FIELDS = [
  "referenceCode",
  "description",
  "quantity",
  "unit",
  "tariffCode",
  "unitValue",
  "lineTotal",
] as const;
export type LineField = (typeof LINE_FIELDS)[number];

// Matches per field, in document order
export type FieldMatchLists = Record<LineField, string[]>;

export interface ZippedRow {
  values: Record<LineField, string>;
  // Fields filled with a placeholder because their list was too short
  padded: LineField[];
}

// Labels as printed on customs invoices. Each captures one value per line item.
export const FIELD_PATTERNS: Record<LineField, RegExp> = {
  referenceCode: /N[uú]mero de identificaci[oó]n[:|\s]*([A-Z0-9\-._]+)/gi,
  description: /Descripci[oó]n de la mercanc[ií]a[:|\s]*([^\n|]+)/gi,
  quantity: /Cantidad aduanera[:|\s]*([\d.,]+)/gi,
  unit: /Unidad aduana[:|\s]*(\d+)/gi,
  tariffCode: /Fracci[oó]n arancelaria[:|\s]*(\d{8,10})/gi,
  unitValue: /Valor unitario aduana[:|\s]*([\d.,]+)/gi,
  lineTotal: /Valor d[oó]lares[:|\s]*([\d.,]+)/gi,
};

export const PLACEHOLDER_REFERENCE_PREFIX = "REF_EXTRACTED_";

const PLACEHOLDERS: Record<LineField, (lineNumber: number) => string> = {
  referenceCode: (n) => `${PLACEHOLDER_REFERENCE_PREFIX}${n}`,
  description: (n) => `PRODUCT_EXTRACTED_${n}`,
  quantity: () => "1",
  unit: () => "001",
  tariffCode: () => "00000000",
  unitValue: () => "0",
  lineTotal: () => "0",
};

export const isPlaceholderReference = (referenceCode: string): boolean =>
  new RegExp(`^${PLACEHOLDER_REFERENCE_PREFIX}\\d+$`).test(referenceCode);

export const emptyFieldMatchLists = (): FieldMatchLists => ({
  referenceCode: [],
  description: [],
  quantity: [],
  unit: [],
  tariffCode: [],
  unitValue: [],
  lineTotal: [],
});

export const matchFieldLists = (text: string): FieldMatchLists => {
  const lists = emptyFieldMatchLists();
  for (const field of LINE_FIELDS) {
    for (const match of text.matchAll(FIELD_PATTERNS[field])) {
      const value = match[1]?.trim();
      if (value) lists[field].push(value);
    }
  }
  return lists;
};

export const hasAnyMatch = (lists: FieldMatchLists): boolean =>
  LINE_FIELDS.some((field) => lists[field].length > 0);

/**
 * Aligns independently matched field lists by position. The row count is
 * the longest list; shorter lists are padded with placeholders for the
 * missing positions.
 */
export const zipFieldMatches = (lists: FieldMatchLists): ZippedRow[] => {
  const count = Math.max(...LINE_FIELDS.map((field) => lists[field].length));
  const rows: ZippedRow[] = [];

  for (let index = 0; index < count; index++) {
    const lineNumber = index + 1;
    const padded: LineField[] = [];
    const values = emptyRowValues();

    for (const field of LINE_FIELDS) {
      if (index < lists[field].length) {
        values[field] = lists[field][index];
      } else {
        values[field] = PLACEHOLDERS[field](lineNumber);
        padded.push(field);
      }
    }

    rows.push({ values, padded });
  }

  return rows;
};

const emptyRowValues = (): Record<LineField, string> => ({
  referenceCode: "",
  description: "",
  quantity: "",
  unit: "",
  tariffCode: "",
  unitValue: "",
  lineTotal: "",
});

// Unparseable numbers become NaN and are zeroed by normalizeLineItem.
export const rowToRawLineItem = (row: ZippedRow, lineNumber: number): RawLineItem => ({
  lineNumber,
  referenceCode: row.values.referenceCode,
  description: row.values.description,
  quantity: parseLocaleNumber(row.values.quantity) ?? Number.NaN,
  unit: row.values.unit,
  tariffCode: row.values.tariffCode,
  unitValue: parseLocaleNumber(row.values.unitValue) ?? Number.NaN,
  lineTotal: parseLocaleNumber(row.values.lineTotal) ?? Number.NaN,
});

export interface HeaderFields {
  supplier: string;
  invoiceNumber: string;
  date: string;
}

const SUPPLIER_PATTERNS = [
  /(?:VENDEDOR|EXPORTADOR|SUPPLIER|SELLER)[:|\s]+([^\n\r]+)/i,
  /RAZ[OÓ]N SOCIAL[:|\s]+([^\n\r]+)/i,
  /NOMBRE[:|\s]+([^\n\r]+)/i,
];

const INVOICE_NUMBER_PATTERNS = [
  /N[UÚ]MERO DE FACTURA[:|\s]*([A-Z0-9-]*\d[A-Z0-9-]*)/i,
  /(?:FACTURA|INVOICE)\s*(?:NO\.?|N[UÚ]M(?:ERO)?\.?|#)?[:|\s]*([A-Z0-9-]*\d[A-Z0-9-]*)/i,
];

const DATE_PATTERNS = [
  /(?:FECHA|DATE)[^\d\n]{0,20}(\d{1,2}[/.-]\d{1,2}[/.-]\d{2,4})/i,
  /(?:FECHA|DATE)[^\d\n]{0,20}(\d{4}-\d{2}-\d{2})/i,
  /\b(\d{1,2}[/.-]\d{1,2}[/.-]\d{2,4})\b/,
];

const firstMatch = (text: string, patterns: readonly RegExp[]): string | null => {
  for (const pattern of patterns) {
    const value = pattern.exec(text)?.[1]?.trim();
    if (value) return value;
  }
  return null;
};

export const extractHeaderFields = (text: string): HeaderFields => ({
  supplier: firstMatch(text, SUPPLIER_PATTERNS)?.slice(0, 120) ?? "SUPPLIER_NOT_FOUND",
  invoiceNumber: firstMatch(text, INVOICE_NUMBER_PATTERNS) ?? "INV_NOT_FOUND",
  date: firstMatch(text, DATE_PATTERNS) ?? "DATE_NOT_FOUND",
});
