import { readdir, readFile } from "fs/promises";
import { join, resolve } from "path";
import { parse } from "csv/sync";
import { ConfigurationError } from "./errors";
import { GenomeSet } from "./mash-types";

/**
 * Parse the content of a batch file - one genome per line as
 *   path<TAB>genome id
 *
 * @param tsv
 * @param source a name for the content to use in error messages
 */
export function parseGenomeBatchfile(tsv: string, source: string): GenomeSet {
  const records: string[][] = parse(tsv, {
    delimiter: "\t",
    quote: false,
    relax_column_count: true,
    skip_empty_lines: true,
    trim: true,
  });

  const genomes = new Map<string, string>();

  records.forEach((record, index) => {
    const [path, genomeId] = record;

    if (record.length < 2 || !path || !genomeId)
      throw new ConfigurationError(
        `Batch file ${source} row ${index + 1} must be a path and a genome id separated by a tab`
      );

    if (genomes.has(genomeId))
      throw new ConfigurationError(
        `Batch file ${source} contains the genome id ${genomeId} more than once`
      );

    genomes.set(genomeId, path);
  });

  return Object.fromEntries(genomes);
}

/**
 * Read a batch file from disk.
 *
 * @param batchfilePath
 */
export async function readGenomeBatchfile(
  batchfilePath: string
): Promise<GenomeSet> {
  return parseGenomeBatchfile(
    await readFile(batchfilePath, "utf8"),
    batchfilePath
  );
}

/**
 * Build a genome set from all the files in a folder with the given
 * extension - the genome id being the file name minus the extension.
 *
 * @param genomeDir
 * @param extension e.g. "fna" (with or without the dot)
 */
export async function genomesFromDirectory(
  genomeDir: string,
  extension: string
): Promise<GenomeSet> {
  const suffix = extension.startsWith(".") ? extension : `.${extension}`;

  const entries = await readdir(genomeDir, { withFileTypes: true });

  const names = entries
    .filter((d) => d.isFile() && d.name.endsWith(suffix))
    .map((d) => d.name)
    .sort();

  return Object.fromEntries(
    names.map((name) => [
      name.slice(0, -suffix.length),
      resolve(join(genomeDir, name)),
    ])
  );
}
