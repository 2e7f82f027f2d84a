import { parse } from "csv/sync";
import { SketchEntry } from "./mash-types";

const COUNT_REGEX = /^\d+$/;

/**
 * Parse the tabular output of "mash info -t" into the entries of the sketch
 * keyed by the path the genome had when it was sketched.
 *
 * The output looks like
 *   #Hashes  Length  ID  Comment
 *   5000  2345678  /data/genomes/a.fna  some fasta header
 * where the header and anything else not of that shape is ignored.
 *
 * @param tsv
 */
export function parseMashInfoTsv(tsv: string): { [path: string]: SketchEntry } {
  const records: string[][] = parse(tsv, {
    delimiter: "\t",
    quote: false,
    relax_column_count: true,
    skip_empty_lines: true,
  });

  const entries = new Map<string, SketchEntry>();

  for (const [hashes, length, path] of records) {
    if (!COUNT_REGEX.test(hashes ?? "") || !COUNT_REGEX.test(length ?? ""))
      continue;

    if (!path) continue;

    entries.set(path, {
      hashes: parseInt(hashes, 10),
      length: parseInt(length, 10),
    });
  }

  return Object.fromEntries(entries);
}
