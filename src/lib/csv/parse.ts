import Papa from "papaparse";

// Tried only when the bytes are not valid UTF-8.
const FALLBACK_ENCODINGS = ["windows-1252", "utf-16le", "utf-16be"] as const;
const DELIMITER_CANDIDATES = [",", ";", "\t", "|"] as const;

type CsvRow = Record<string, string>;

interface ParseCandidate {
  columns: string[];
  rows: CsvRow[];
  score: number;
}

export interface ParsedCsv {
  columns: string[];
  rows: CsvRow[];
}

function textQualityScore(text: string): number {
  if (!text) {
    return -1000;
  }

  let replacement = 0;
  let control = 0;
  let readable = 0;

  for (const ch of text) {
    const code = ch.charCodeAt(0);
    if (ch === "�") {
      replacement += 1;
      continue;
    }
    if ((code >= 0 && code <= 8) || (code >= 11 && code <= 12) || (code >= 14 && code <= 31)) {
      control += 1;
      continue;
    }
    if (/[À-ɏA-Za-z0-9\s_()[\]{}\-\/,.:$#@+]/.test(ch)) {
      readable += 1;
    }
  }

  return readable - replacement * 12 - control * 12;
}

function rowsQualityScore(rows: CsvRow[]): number {
  if (rows.length === 0) {
    return -1000;
  }

  const first = rows[0] ?? {};
  const headerText = Object.keys(first).join(" ");
  const valueText = rows
    .slice(0, 8)
    .flatMap((row) => Object.values(row).slice(0, 6))
    .join(" ");

  return textQualityScore(`${headerText} ${valueText}`);
}

function decodeWithEncoding(buffer: ArrayBufferLike, encoding: string, fatal = false): string | null {
  try {
    const decoded = new TextDecoder(encoding, { fatal }).decode(new Uint8Array(buffer));
    return normalizeText(decoded);
  } catch {
    return null;
  }
}

function normalizeText(text: string): string {
  const withoutBom = text.replace(/^\uFEFF/, "");
  const withoutExcelSep = withoutBom.replace(/^sep=.+\r?\n/i, "");
  return withoutExcelSep.replace(/\r\n/g, "\n").replace(/\r/g, "\n");
}

function normalizeRows(rows: Record<string, unknown>[]): CsvRow[] {
  return rows
    .map((row) => {
      const normalized: CsvRow = {};
      for (const [key, value] of Object.entries(row)) {
        normalized[key.trim()] = String(value ?? "").trim();
      }
      return normalized;
    })
    .filter((row) => Object.values(row).some((value) => value.length > 0));
}

function parseWithHeader(text: string, delimiter?: string): ParseCandidate | null {
  const result = Papa.parse<Record<string, unknown>>(text, {
    header: true,
    delimiter,
    skipEmptyLines: "greedy",
    transformHeader: (header) => header.trim()
  });

  const rows = normalizeRows(result.data);
  const columns = (result.meta.fields ?? Object.keys(rows[0] ?? {})).map((field) => field.trim());
  const headerCount = columns.length;

  if (headerCount < 2 || rows.length === 0) {
    return null;
  }

  const mismatchCount = result.errors.filter((error) => error.type === "FieldMismatch").length;
  const errorCount = result.errors.length;
  const quality = rowsQualityScore(rows);
  const score = rows.length * 10 + headerCount * 3 - mismatchCount - errorCount * 2 + quality;

  return { columns, rows, score };
}

function uniqueHeaders(headers: string[]): string[] {
  const used = new Map<string, number>();

  return headers.map((rawHeader, index) => {
    const base = rawHeader.trim() || `col_${index + 1}`;
    const count = used.get(base) ?? 0;
    used.set(base, count + 1);
    return count === 0 ? base : `${base}_${count + 1}`;
  });
}

function parseWithMatrix(text: string, delimiter?: string): ParseCandidate | null {
  const result = Papa.parse<string[]>(text, {
    header: false,
    delimiter,
    skipEmptyLines: "greedy"
  });

  const matrix = result.data.filter((row): row is string[] => Array.isArray(row));
  if (matrix.length < 2) {
    return null;
  }

  const headerIndex = matrix.findIndex((row) => row.filter((value) => String(value ?? "").trim().length > 0).length >= 2);
  if (headerIndex < 0 || headerIndex >= matrix.length - 1) {
    return null;
  }

  const headers = uniqueHeaders(matrix[headerIndex].map((cell) => String(cell ?? "").trim()));
  if (headers.length < 2) {
    return null;
  }

  const rows: CsvRow[] = matrix
    .slice(headerIndex + 1)
    .map((row) => {
      const record: CsvRow = {};
      headers.forEach((header, index) => {
        record[header] = String(row[index] ?? "").trim();
      });
      return record;
    })
    .filter((row) => Object.values(row).some((value) => value.length > 0));

  if (rows.length === 0) {
    return null;
  }

  const quality = rowsQualityScore(rows);
  const score = rows.length * 8 + headers.length * 3 - result.errors.length * 2 + quality;
  return { columns: headers, rows, score };
}

function bomEncoding(buffer: ArrayBufferLike): string | null {
  const bytes = new Uint8Array(buffer);
  if (bytes.length >= 3 && bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf) {
    return "utf-8";
  }
  if (bytes.length >= 2 && bytes[0] === 0xff && bytes[1] === 0xfe) {
    return "utf-16le";
  }
  if (bytes.length >= 2 && bytes[0] === 0xfe && bytes[1] === 0xff) {
    return "utf-16be";
  }
  return null;
}

function isLikelyXlsx(buffer: ArrayBufferLike): boolean {
  const bytes = new Uint8Array(buffer);
  return bytes.length >= 4 && bytes[0] === 0x50 && bytes[1] === 0x4b && bytes[2] === 0x03 && bytes[3] === 0x04;
}

function decodeCandidates(buffer: ArrayBufferLike): string[] {
  const bom = bomEncoding(buffer);
  if (bom) {
    const text = decodeWithEncoding(buffer, bom);
    return text ? [text] : [];
  }

  const utf8 = decodeWithEncoding(buffer, "utf-8", true);
  if (utf8 !== null) {
    return utf8 ? [utf8] : [];
  }

  return FALLBACK_ENCODINGS.map((encoding) => decodeWithEncoding(buffer, encoding)).filter(
    (text): text is string => Boolean(text)
  );
}

export async function parseCsvFile(file: File): Promise<ParsedCsv> {
  const buffer = await file.arrayBuffer();
  return parseCsvBuffer(buffer);
}

export function parseCsvBuffer(buffer: ArrayBufferLike): ParsedCsv {
  if (isLikelyXlsx(buffer)) {
    throw new Error("CSV parse error: the uploaded file looks like XLSX. Save it as CSV (comma separated) and upload again.");
  }

  const candidates: ParseCandidate[] = [];

  for (const text of decodeCandidates(buffer)) {
    const autoHeaderCandidate = parseWithHeader(text);
    if (autoHeaderCandidate) {
      candidates.push(autoHeaderCandidate);
    }

    for (const delimiter of DELIMITER_CANDIDATES) {
      const headerCandidate = parseWithHeader(text, delimiter);
      if (headerCandidate) {
        candidates.push(headerCandidate);
      }

      const matrixCandidate = parseWithMatrix(text, delimiter);
      if (matrixCandidate) {
        candidates.push(matrixCandidate);
      }
    }
  }

  if (candidates.length === 0) {
    throw new Error("CSV parse error: unrecognized format. Check the encoding (UTF-8/UTF-16/Windows-1252) and delimiter (, ; tab |).");
  }

  const best = candidates.sort((a, b) => b.score - a.score)[0];
  return { columns: best.columns, rows: best.rows };
}
