#!/usr/bin/env -S npx tsx

import { Command, InvalidArgumentError } from "commander";
import { writeFile } from "fs/promises";
import { join } from "path";
import { MASH_DESCRIPTION, MashSettings } from "../mash-settings";
import { getMashSettingsFromEnv } from "../artifacts/mash/lib/environment-constants";
import {
  genomesFromDirectory,
  readGenomeBatchfile,
} from "../artifacts/mash/lib/genome-batchfile";
import { defaultMashContext } from "../artifacts/mash/lib/mash-context";
import { mashRun } from "../artifacts/mash/lib/mash-run";
import { mashVersion } from "../artifacts/mash/lib/mash-version";
import { GenomeSet } from "../artifacts/mash/lib/mash-types";
import { loadSketchEntries } from "../artifacts/mash/lib/sketch-file";
import {
  distancesToTsv,
  reportDistances,
} from "../artifacts/mash/lib/report-distances";
import { ConfigurationError } from "../artifacts/mash/lib/errors";

const HITS_FILE_NAME = "mash_hits.tsv";

function parseNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n)) throw new InvalidArgumentError("Not a number.");
  return n;
}

function parseInteger(value: string): number {
  const n = parseInt(value, 10);
  if (isNaN(n) || n.toString() !== value.trim())
    throw new InvalidArgumentError("Not an integer.");
  return n;
}

/**
 * Work out a genome set from either a batch file or a folder of FASTA files.
 *
 * @param label
 * @param batchfile
 * @param dir
 * @param extension
 */
async function resolveGenomes(
  label: string,
  batchfile: string | undefined,
  dir: string | undefined,
  extension: string
): Promise<GenomeSet> {
  if (batchfile && dir)
    throw new ConfigurationError(
      `Only one of a ${label} batch file or a ${label} directory can be specified`
    );

  if (batchfile) return readGenomeBatchfile(batchfile);

  if (dir) return genomesFromDirectory(dir, extension);

  throw new ConfigurationError(
    `One of a ${label} batch file or a ${label} directory must be specified`
  );
}

type DistOptions = {
  queryBatchfile?: string;
  queryDir?: string;
  referenceBatchfile?: string;
  referenceDir?: string;
  extension: string;
  outDir: string;
  prefix: string;
  cpus?: number;
  kmerSize?: number;
  sketchSize?: number;
  maxDistance?: number;
  maxPValue?: number;
  maxMashDistance?: number;
  mashDb?: string;
};

const envSettings = getMashSettingsFromEnv();

const program = new Command();

program.name("mash-distance").description(MASH_DESCRIPTION).version("1.0.0");

program
  .command("dist")
  .description(
    "Sketch the query and reference genomes and report the Mash distances between them"
  )
  .option("--query-batchfile <file>", "TSV of query path<TAB>genome id")
  .option("--query-dir <dir>", "folder of query FASTA files")
  .option("--reference-batchfile <file>", "TSV of reference path<TAB>genome id")
  .option("--reference-dir <dir>", "folder of reference FASTA files")
  .option("--extension <ext>", "FASTA extension used in folders", "fna")
  .option("--out-dir <dir>", "folder for sketches and results", envSettings.outDir)
  .option("--prefix <prefix>", "prefix for output files", envSettings.prefix)
  .option("--cpus <n>", "CPUs available to mash", parseInteger)
  .option("--kmer-size <k>", "k-mer size", parseInteger)
  .option("--sketch-size <s>", "maximum non-redundant hashes", parseInteger)
  .option("--max-distance <d>", "maximum distance mash reports", parseNumber)
  .option("--max-p-value <v>", "maximum p-value mash reports", parseNumber)
  .option(
    "--max-mash-distance <d>",
    "maximum distance kept when reading results",
    parseNumber
  )
  .option("--mash-db <path>", "read/write the reference sketch here")
  .action(async (options: DistOptions) => {
    const queryGenomes = await resolveGenomes(
      "query",
      options.queryBatchfile,
      options.queryDir,
      options.extension
    );
    const referenceGenomes = await resolveGenomes(
      "reference",
      options.referenceBatchfile,
      options.referenceDir,
      options.extension
    );

    const settings: MashSettings = {
      cpus: options.cpus ?? envSettings.cpus,
      outDir: options.outDir,
      prefix: options.prefix,
      kmerSize: options.kmerSize ?? envSettings.kmerSize,
      sketchSize: options.sketchSize ?? envSettings.sketchSize,
      maxDistance: options.maxDistance ?? envSettings.maxDistance,
      maxPValue: options.maxPValue ?? envSettings.maxPValue,
      maxMashDistance: options.maxMashDistance ?? envSettings.maxMashDistance,
      mashDb: options.mashDb,
    };

    console.log(
      `Comparing ${Object.keys(queryGenomes).length} query genomes against ${
        Object.keys(referenceGenomes).length
      } reference genomes`
    );

    const distances = await mashRun(queryGenomes, referenceGenomes, settings);

    const hitsPath = join(settings.outDir, `${settings.prefix}.${HITS_FILE_NAME}`);
    await writeFile(hitsPath, distancesToTsv(distances), "utf8");

    console.log(reportDistances(distances));
    console.log(`Hits written to ${hitsPath}`);
  });

program
  .command("info")
  .description("List the genomes recorded inside a Mash sketch file")
  .argument("<sketch>", "path of the .msh file")
  .action(async (sketch: string) => {
    const entries = await loadSketchEntries(sketch, defaultMashContext());

    for (const [path, e] of Object.entries(entries))
      console.log(`${e.hashes}\t${e.length}\t${path}`);
  });

program
  .command("version")
  .description("Print the version of the mash binary in use")
  .action(async () => {
    console.log(await mashVersion());
  });

program.parseAsync().catch((e: unknown) => {
  console.error(e instanceof Error ? e.message : e);
  process.exit(1);
});
