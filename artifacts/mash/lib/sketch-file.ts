import { mkdir, mkdtemp, rm, stat, writeFile } from "fs/promises";
import { Stats } from "fs";
import { dirname, join } from "path";
import { mashWork } from "./environment-constants";
import { ConfigurationError, ExternalToolError } from "./errors";
import { MashContext } from "./mash-context";
import { parseMashInfoTsv } from "./mash-info-parse";
import { GenomeSet, SketchEntry } from "./mash-types";
import { basenameSet, setsEqual } from "./misc";

export const QUERY_SKETCH_NAME = "user_query_sketch.msh";
export const REFERENCE_SKETCH_NAME = "ref_sketch.msh";
export const MASH_DB_SUFFIX = ".msh";

export type SketchParameters = {
  cpus: number;
  kmerSize: number;
  sketchSize: number;
};

type SketchFileCommon = {
  // where the sketch lives on disk
  path: string;

  // the genomes the sketch represents
  genomes: GenomeSet;
};

/**
 * A sketch we generated during this run.
 */
export type FreshSketchFile = SketchFileCommon & {
  type: "Fresh";
};

/**
 * A sketch that already existed on disk and that we have checked against
 * the genomes we were given.
 */
export type CachedSketchFile = SketchFileCommon & {
  type: "Cached";

  // the genomes as recorded inside the sketch, keyed by their path at sketching time
  entries: { [path: string]: SketchEntry };
};

export type SketchFile = FreshSketchFile | CachedSketchFile;

/**
 * Returns true if a sketch with these (embedded) paths was generated from
 * these genome paths. Only the file names are compared - sketch databases get
 * moved between filesystems so the folders are expected to differ.
 *
 * @param sketchPaths the paths recorded inside the sketch
 * @param genomePaths the paths of the genomes we are processing
 */
export function isSketchConsistent(
  sketchPaths: Iterable<string>,
  genomePaths: Iterable<string>
): boolean {
  return setsEqual(basenameSet(sketchPaths), basenameSet(genomePaths));
}

async function statOrUndefined(path: string): Promise<Stats | undefined> {
  try {
    return await stat(path);
  } catch (e) {
    // fs errors are not instances of this realm's Error under jest
    if (
      typeof e === "object" &&
      e !== null &&
      "code" in e &&
      e.code === "ENOENT"
    )
      return undefined;
    throw e;
  }
}

/**
 * Loads the per genome metadata out of an existing sketch file (mash info).
 *
 * @param path
 * @param context
 */
export async function loadSketchEntries(
  path: string,
  context: MashContext
): Promise<{ [path: string]: SketchEntry }> {
  const args = ["info", "-t", path];

  const { exitCode, stdout, stderr } = await context.invoker.invoke(args);

  if (exitCode !== 0)
    throw new ExternalToolError(
      `Error reading Mash sketch file ${path}`,
      args,
      exitCode,
      stderr
    );

  return parseMashInfoTsv(stdout);
}

/**
 * Runs mash sketch over all the genomes, writing the sketch to path.
 * The genome list is passed to mash in a manifest file that lives in a
 * scratch folder which is always removed afterwards.
 *
 * @param genomes
 * @param path
 * @param parameters
 * @param context
 */
export async function generateSketch(
  genomes: GenomeSet,
  path: string,
  parameters: SketchParameters,
  context: MashContext
): Promise<void> {
  const scratch = await mkdtemp(join(mashWork, "mash_tmp_"));

  try {
    const manifestPath = join(scratch, "genomes.txt");

    await writeFile(
      manifestPath,
      Object.values(genomes)
        .map((p) => `${p}\n`)
        .join(""),
      "utf8"
    );

    const args = [
      "sketch",
      "-l",
      "-p",
      parameters.cpus.toString(),
      manifestPath,
      "-o",
      path,
      "-k",
      parameters.kmerSize.toString(),
      "-s",
      parameters.sketchSize.toString(),
    ];

    context.logger.time(`mash sketch ${path}`);
    context.progress.start(Object.keys(genomes).length, "genome");

    const result = await context.invoker
      .invoke(args, {
        onStderrLine: (line) => {
          if (line.startsWith("Sketching")) context.progress.tick();
        },
      })
      .finally(() => {
        context.progress.stop();
        context.logger.timeEnd(`mash sketch ${path}`);
      });

    const produced = await statOrUndefined(path);

    if (result.exitCode !== 0 || !produced || !produced.isFile())
      throw new ExternalToolError(
        `Error generating Mash sketch ${path}`,
        args,
        result.exitCode,
        result.stderr
      );
  } finally {
    await rm(scratch, { recursive: true, force: true });
  }
}

/**
 * Produce the sketch for a set of genomes at the given path - re-using the
 * file already there if it was made from the same genomes.
 *
 * @param genomes the genomes to sketch (genome id -> FASTA path)
 * @param path the path of the sketch file
 * @param parameters
 * @param context
 */
export async function sketchFile(
  genomes: GenomeSet,
  path: string,
  parameters: SketchParameters,
  context: MashContext
): Promise<SketchFile> {
  await mkdir(dirname(path), { recursive: true });

  const existing = await statOrUndefined(path);

  if (existing && existing.isDirectory())
    throw new ConfigurationError(
      `The Mash sketch path ${path} is a directory`
    );

  if (existing) {
    context.logger.log(`Loading data from existing Mash sketch file: ${path}`);

    const entries = await loadSketchEntries(path, context);

    if (!isSketchConsistent(Object.keys(entries), Object.values(genomes)))
      throw new ConfigurationError(
        `The sketch file ${path} is not consistent with the input genomes. ` +
          `Remove the existing sketch file or specify a new output directory.`
      );

    return { type: "Cached", path, genomes, entries };
  }

  context.logger.log(`Creating Mash sketch file: ${path}`);

  await generateSketch(genomes, path, parameters, context);

  return { type: "Fresh", path, genomes };
}

/**
 * The sketch of the query genomes - always lives in the output folder.
 *
 * @param genomes
 * @param outDir
 * @param prefix
 * @param parameters
 * @param context
 */
export async function querySketchFile(
  genomes: GenomeSet,
  outDir: string,
  prefix: string,
  parameters: SketchParameters,
  context: MashContext
): Promise<SketchFile> {
  return sketchFile(
    genomes,
    join(outDir, `${prefix}.${QUERY_SKETCH_NAME}`),
    parameters,
    context
  );
}

/**
 * Strip trailing separators from a user supplied sketch database path and
 * make sure it ends in .msh (mash itself would add it otherwise).
 *
 * @param mashDb
 */
export function normaliseMashDbPath(mashDb: string): string {
  let exportMsh = mashDb.replace(/[\\/]+$/, "");

  if (!exportMsh.endsWith(MASH_DB_SUFFIX)) exportMsh = exportMsh + MASH_DB_SUFFIX;

  return exportMsh;
}

/**
 * The sketch of the reference genomes. If mashDb is given the sketch is
 * read from/written to there so it can be re-used across runs, otherwise it
 * lives in the output folder.
 *
 * @param genomes
 * @param outDir
 * @param prefix
 * @param parameters
 * @param context
 * @param mashDb the path to read/write a pre-computed reference sketch
 */
export async function referenceSketchFile(
  genomes: GenomeSet,
  outDir: string,
  prefix: string,
  parameters: SketchParameters,
  context: MashContext,
  mashDb?: string
): Promise<SketchFile> {
  let path: string;

  if (mashDb !== undefined) {
    path = normaliseMashDbPath(mashDb);

    const existing = await statOrUndefined(path);

    if (existing && existing.isDirectory())
      throw new ConfigurationError(`${path} is a directory`);
  } else {
    path = join(outDir, `${prefix}.${REFERENCE_SKETCH_NAME}`);
  }

  return sketchFile(genomes, path, parameters, context);
}
