import * as XLSX from "xlsx";
import { readFile } from "fs/promises";
import { extname } from "path";
import { TabularData, TabularRow } from "../types";
import { WORKBOOK_EXTENSIONS } from "../constants";
import { EmptyInputError, ParseError } from "../errors";

type SheetCell = string | number | boolean | Date | null | undefined;

// ============================================================================
// Helpers
// ============================================================================

/** Separator candidates, in the order ties are broken. */
const DELIMITER_CANDIDATES: readonly string[] = [",", "\t", ";", "|"];

/** Characters inspected when guessing the separator. */
const DELIMITER_SAMPLE_LENGTH = 1024;

/**
 * Guesses the field separator the way the spreadsheet reader does: the
 * candidate seen most often outside quotes near the top of the text, with
 * comma as the fallback.
 */
function detectDelimiter(text: string): string {
  const counts = new Map<string, number>();
  let inQuotes = false;
  for (const ch of text.slice(0, DELIMITER_SAMPLE_LENGTH)) {
    if (ch === '"') {
      inQuotes = !inQuotes;
    } else if (!inQuotes && DELIMITER_CANDIDATES.includes(ch)) {
      counts.set(ch, (counts.get(ch) ?? 0) + 1);
    }
  }

  let best = ",";
  let bestCount = 0;
  for (const candidate of DELIMITER_CANDIDATES) {
    const count = counts.get(candidate) ?? 0;
    if (count > bestCount) {
      best = candidate;
      bestCount = count;
    }
  }
  return best;
}

interface ScannedText {
  /** Records joined by "\n", with empty lines left out. */
  content: string;
  /** 1-based line where a quoted field opens and never closes. */
  unterminatedLine: number | null;
}

/**
 * Walks the text once, splitting records on line breaks outside quotes.
 * Only `delimiter` starts a new field, so a quote in the middle of a field
 * is literal.
 */
function scanRecords(text: string, delimiter: string): ScannedText {
  const records: string[] = [];
  let current = "";
  let line = 1;
  let openedAt = 0;
  let inQuotes = false;
  let atFieldStart = true;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inQuotes) {
      current += ch;
      if (ch === '"') {
        if (text[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else if (ch === "\n") {
        line++;
      }
      continue;
    }

    if (ch === "\r" && text[i + 1] === "\n") {
      continue;
    }
    if (ch === "\n") {
      if (current !== "") {
        records.push(current);
      }
      current = "";
      line++;
      atFieldStart = true;
      continue;
    }

    current += ch;
    if (ch === '"' && atFieldStart) {
      inQuotes = true;
      openedAt = line;
      atFieldStart = false;
    } else {
      atFieldStart = ch === delimiter;
    }
  }
  if (current !== "") {
    records.push(current);
  }

  return { content: records.join("\n"), unterminatedLine: inQuotes ? openedAt : null };
}

function cellText(value: SheetCell): string {
  if (value === null || value === undefined) return "";
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

/**
 * Turns the raw sheet matrix (header row first) into rows keyed by header.
 */
function matrixToTabularData(matrix: SheetCell[][]): TabularData {
  if (matrix.length === 0) {
    throw new EmptyInputError("Input has no header row");
  }

  const [headerCells, ...dataCells] = matrix;
  const headers = headerCells.map(cellText);
  const data = dataCells.map((cells) => cells.map(cellText));

  // The sheet range is as wide as the longest row, so the header gets padded
  // with empty names whenever a record carries extra fields.
  while (headers.length > 0 && headers[headers.length - 1] === "") {
    const column = headers.length - 1;
    const overflow = data.findIndex((cells) => (cells[column] ?? "") !== "");
    if (overflow !== -1) {
      throw new ParseError(
        `Row ${overflow + 1} has more fields than the header (${column} columns)`
      );
    }
    headers.pop();
  }

  if (headers.length === 0) {
    throw new EmptyInputError("Input has no header row");
  }

  const seen = new Set<string>();
  for (const header of headers) {
    if (seen.has(header)) {
      throw new ParseError(`Duplicate column name '${header}' in header`);
    }
    seen.add(header);
  }

  const rows: TabularRow[] = data.map((cells) => {
    const row = new Map<string, string>();
    headers.forEach((header, index) => {
      row.set(header, cells[index] ?? "");
    });
    return row;
  });

  if (rows.length === 0) {
    throw new EmptyInputError();
  }

  return { headers, rows };
}

function sheetToTabularData(worksheet: XLSX.WorkSheet, keepBlankRows: boolean): TabularData {
  const matrix = XLSX.utils.sheet_to_json<SheetCell[]>(worksheet, {
    header: 1,
    defval: "",
    raw: true,
    blankrows: keepBlankRows,
  });
  return matrixToTabularData(matrix);
}

function firstSheet(workbook: XLSX.WorkBook): XLSX.WorkSheet | undefined {
  const firstSheetName = workbook.SheetNames[0];
  return firstSheetName ? workbook.Sheets[firstSheetName] : undefined;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Reads the first sheet of a workbook into headers + rows. Empty sheet rows
 * are skipped.
 *
 * @throws ParseError if the workbook has no sheets
 * @throws EmptyInputError if there is no header or no data row
 */
export function parseWorkbook(workbook: XLSX.WorkBook): TabularData {
  const worksheet = firstSheet(workbook);
  if (!worksheet) {
    throw new ParseError("Workbook contains no sheets");
  }
  return sheetToTabularData(worksheet, false);
}

/**
 * Parses delimited text (comma, tab, semicolon or pipe separated, header
 * row first). Cell values are kept as written: nothing is converted to
 * numbers or dates.
 */
export function parseDelimitedText(text: string): TabularData {
  const content = text.replace(/^\uFEFF/, "");
  if (content.trim().length === 0) {
    throw new EmptyInputError("Input is empty");
  }

  const delimiter = detectDelimiter(content);
  const scanned = scanRecords(content, delimiter);
  if (scanned.unterminatedLine !== null) {
    throw new ParseError(`Unterminated quoted field starting on line ${scanned.unterminatedLine}`);
  }

  const readOptions = { type: "string" as const, raw: true, FS: delimiter };
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(scanned.content, readOptions);
  } catch (err) {
    throw new ParseError(
      `Could not parse input as delimited text: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }

  // Text that looks like markup is picked up by the HTML/XML readers instead
  const worksheet = firstSheet(workbook);
  if (!worksheet) {
    throw new ParseError("Could not parse input as delimited text");
  }

  // Rows of empty cells (",,") are records; empty lines are already gone
  return sheetToTabularData(worksheet, true);
}

/**
 * Loads a tabular file from disk. Spreadsheet workbooks are read by
 * extension; everything else is treated as UTF-8 delimited text.
 */
export async function readTabularFile(filePath: string): Promise<TabularData> {
  let content: Buffer;
  try {
    content = await readFile(filePath);
  } catch (err) {
    throw new ParseError(
      `Could not read ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }

  if (!WORKBOOK_EXTENSIONS.includes(extname(filePath).toLowerCase())) {
    return parseDelimitedText(content.toString("utf8"));
  }

  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(content, { type: "buffer" });
  } catch (err) {
    throw new ParseError(
      `Could not read workbook ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }
  return parseWorkbook(workbook);
}
