import { stringify } from "csv/sync";
import { table } from "table";
import { DistanceMap } from "./mash-types";

export type DistanceRow = {
  queryId: string;
  referenceId: string;
  distance: number;
  pValue: number;
  sharedHashes: string;
};

/**
 * Flatten a distance map into rows - sorted by query id and then
 * closest reference first.
 *
 * @param distances
 */
export function distancesToRows(distances: DistanceMap): DistanceRow[] {
  const rows: DistanceRow[] = [];

  for (const [queryId, hits] of Object.entries(distances)) {
    for (const [referenceId, hit] of Object.entries(hits)) {
      rows.push({
        queryId,
        referenceId,
        distance: hit.distance,
        pValue: hit.pValue,
        sharedHashes: `${hit.sharedNumerator}/${hit.sharedDenominator}`,
      });
    }
  }

  rows.sort((a, b) => {
    if (a.queryId !== b.queryId) return a.queryId < b.queryId ? -1 : 1;
    if (a.distance !== b.distance) return a.distance - b.distance;
    return a.referenceId < b.referenceId ? -1 : 1;
  });

  return rows;
}

const HEADER = ["query", "reference", "distance", "p-value", "shared hashes"];

function rowToArray(r: DistanceRow): string[] {
  return [
    r.queryId,
    r.referenceId,
    r.distance.toString(),
    r.pValue.toString(),
    r.sharedHashes,
  ];
}

/**
 * The distances as TSV text (with a header row).
 *
 * @param distances
 */
export function distancesToTsv(distances: DistanceMap): string {
  return stringify(
    [HEADER, ...distancesToRows(distances).map(rowToArray)],
    { delimiter: "\t" }
  );
}

/**
 * A plain text table of the distances for display on a terminal.
 *
 * @param distances
 */
export function reportDistances(distances: DistanceMap): string {
  const rows = distancesToRows(distances);

  if (rows.length === 0) return "No Mash hits within the distance thresholds\n";

  return table([HEADER, ...rows.map(rowToArray)], {});
}
