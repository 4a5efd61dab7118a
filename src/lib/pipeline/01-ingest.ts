import fs from 'node:fs/promises';
import path from 'node:path';
import * as XLSX from 'xlsx';
import Papa from 'papaparse';
import { InputError } from './errors';
import type { Table } from './types';

const EXCEL_EXTENSIONS = new Set(['.xlsx', '.xlsm', '.xls']);

function toCell(value: unknown): string {
  if (value == null) return '';
  return String(value);
}

function toTable(grid: unknown[][], source: string): Table {
  if (grid.length === 0) {
    throw new InputError(`No rows found in ${source}`);
  }

  // Array.from fills sparse holes left by xlsx for blank cells
  const [header, ...rows] = grid.map((row) => Array.from(row, toCell));
  return { header, rows };
}

function parseCsv(fileBuffer: Buffer, filename: string): Table {
  const parsed = Papa.parse<string[]>(fileBuffer.toString('utf-8'), {
    header: false,
    skipEmptyLines: true,
    dynamicTyping: false
  });

  const seen = new Set<string>();
  for (const error of parsed.errors) {
    if (seen.has(error.code)) continue;
    seen.add(error.code);
    console.warn(`[ingest] ${filename}: ${error.message} (row ${error.row ?? '?'})`);
  }

  return toTable(parsed.data, filename);
}

function parseWorkbook(fileBuffer: Buffer, filename: string): Table {
  // raw: true keeps numeric cells as numbers so coordinates are not reformatted
  const workbook = XLSX.read(fileBuffer, {
    type: 'buffer',
    cellDates: false,
    raw: true
  });

  const sheets = workbook.SheetNames;
  console.log(`[ingest] ${filename}: available sheets: [${sheets.join(', ')}]`);
  if (sheets.length === 0) {
    throw new InputError(`No sheets found in the Excel file ${filename}`);
  }

  const sheetName = sheets[0];
  console.log(`[ingest] ${filename}: using sheet "${sheetName}"`);

  const sheet = workbook.Sheets[sheetName];
  if (!sheet) {
    throw new InputError(`Sheet "${sheetName}" is missing from ${filename}`);
  }

  const grid = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, raw: true, blankrows: false });
  return toTable(grid, `${filename} (sheet "${sheetName}")`);
}

export function parseTableFile(fileBuffer: Buffer, filename: string): Table {
  const extension = path.extname(filename).toLowerCase();

  if (extension === '.csv') {
    return parseCsv(fileBuffer, filename);
  }

  if (EXCEL_EXTENSIONS.has(extension)) {
    return parseWorkbook(fileBuffer, filename);
  }

  throw new InputError(`Unsupported file type "${extension || '(none)'}" for ${filename}`);
}

export async function loadTable(filePath: string): Promise<Table> {
  let fileBuffer: Buffer;
  try {
    fileBuffer = await fs.readFile(filePath);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InputError(`Error opening ${filePath}: ${reason}`, { cause: error });
  }

  return parseTableFile(fileBuffer, path.basename(filePath));
}
