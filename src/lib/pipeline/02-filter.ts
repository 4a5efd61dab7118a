import type { Table } from './types';

function sameCountry(cell: string, country: string): boolean {
  return cell.trim().toLowerCase() === country.trim().toLowerCase();
}

/**
 * Keeps the header and the data rows whose `countryCol` matches `country`,
 * ignoring case and leading or trailing whitespace on either side.
 */
export function filterByCountry(table: Table, countryCol: number, country: string): Table {
  return {
    header: table.header,
    rows: table.rows.filter((row) => countryCol < row.length && sameCountry(row[countryCol], country))
  };
}
