import { parse } from "csv/sync";
import { MashDistRow } from "./mash-types";

const SHARED_HASHES_REGEX = /^(\d+)\/(\d+)$/;

/**
 * Turn the fields of one mash dist line
 *   referenceId  queryId  distance  pValue  numerator/denominator
 * into a row - or null if the fields are not of that shape (in which case
 * the line is skipped by the caller).
 *
 * @param fields
 */
export function parseMashDistRecord(fields: string[]): MashDistRow | null {
  if (fields.length !== 5) return null;

  const [referenceId, queryId, distanceText, pValueText, sharedText] = fields;

  if (!referenceId || !queryId || !distanceText.trim() || !pValueText.trim())
    return null;

  const distance = Number(distanceText);
  const pValue = Number(pValueText);

  if (!Number.isFinite(distance) || !Number.isFinite(pValue)) return null;

  if (distance < 0 || distance > 1) return null;

  const shared = SHARED_HASHES_REGEX.exec(sharedText);

  if (!shared) return null;

  const sharedNumerator = parseInt(shared[1], 10);
  const sharedDenominator = parseInt(shared[2], 10);

  if (sharedNumerator > sharedDenominator) return null;

  return {
    referenceId,
    queryId,
    distance,
    pValue,
    sharedNumerator,
    sharedDenominator,
  };
}

/**
 * Parse the (tab separated) text output of mash dist. Lines that are not
 * distance rows (blank lines, headers, partial lines) are skipped.
 *
 * @param tsv
 */
export function parseMashDistTsv(tsv: string): MashDistRow[] {
  const records: string[][] = parse(tsv, {
    delimiter: "\t",
    quote: false,
    relax_column_count: true,
    skip_empty_lines: true,
  });

  const rows: MashDistRow[] = [];

  for (const record of records) {
    const row = parseMashDistRecord(record);
    if (row) rows.push(row);
  }

  return rows;
}

/**
 * Convenience for a single line of output (with or without its newline).
 *
 * @param line
 */
export function parseMashDistLine(line: string): MashDistRow | null {
  return parseMashDistTsv(line)[0] ?? null;
}
