import { readFile, rm } from "fs/promises";
import { basename, join } from "path";
import { ExternalToolError } from "./errors";
import { MashContext } from "./mash-context";
import { MashInvokeResult } from "./mash-invoker";
import { parseMashDistTsv } from "./mash-dist-parse";
import { DistanceMap, MashHit } from "./mash-types";
import { SketchFile } from "./sketch-file";

export const DISTANCE_FILE_NAME = "mash_distances.tsv";

export type DistanceParameters = {
  cpus: number;

  // the -d passed to mash dist
  maxDistance: number;

  // the -v passed to mash dist
  maxPValue: number;
};

export type DistanceFile = {
  path: string;
  querySketch: SketchFile;
  referenceSketch: SketchFile;
};

/**
 * Runs mash dist between the reference and query sketches, with the
 * output streamed into a distance file in the output folder (which is
 * overwritten every run). On failure the distance file is removed so a
 * later read cannot pick up a partial result.
 *
 * @param querySketch
 * @param referenceSketch
 * @param outDir
 * @param prefix
 * @param parameters
 * @param context
 */
export async function calculateDistanceFile(
  querySketch: SketchFile,
  referenceSketch: SketchFile,
  outDir: string,
  prefix: string,
  parameters: DistanceParameters,
  context: MashContext
): Promise<DistanceFile> {
  const path = join(outDir, `${prefix}.${DISTANCE_FILE_NAME}`);

  context.logger.log("Calculating Mash distances.");

  // the reference sketch goes first - mash reports the reference id in the first column
  const args = [
    "dist",
    "-p",
    parameters.cpus.toString(),
    "-d",
    parameters.maxDistance.toString(),
    "-v",
    parameters.maxPValue.toString(),
    referenceSketch.path,
    querySketch.path,
  ];

  context.logger.time("mash dist");

  let result: MashInvokeResult;
  try {
    result = await context.invoker.invoke(args, { stdoutPath: path });
  } catch (e) {
    await rm(path, { force: true });
    throw e;
  } finally {
    context.logger.timeEnd("mash dist");
  }

  if (result.exitCode !== 0) {
    await rm(path, { force: true });

    throw new ExternalToolError(
      "Error running Mash dist",
      args,
      result.exitCode,
      result.stderr
    );
  }

  return { path, querySketch, referenceSketch };
}

/**
 * Reads the distance file back as query id -> reference file name -> hit,
 * keeping only hits with a distance no greater than maxMashDistance.
 *
 * @param path the distance file
 * @param maxMashDistance
 */
export async function readDistanceFile(
  path: string,
  maxMashDistance: number = 100
): Promise<DistanceMap> {
  const tsv = await readFile(path, "utf8");

  const result = new Map<string, Map<string, MashHit>>();

  for (const row of parseMashDistTsv(tsv)) {
    if (row.distance > maxMashDistance) continue;

    let hits = result.get(row.queryId);
    if (!hits) result.set(row.queryId, (hits = new Map()));

    hits.set(basename(row.referenceId), {
      distance: row.distance,
      pValue: row.pValue,
      sharedNumerator: row.sharedNumerator,
      sharedDenominator: row.sharedDenominator,
    });
  }

  return Object.fromEntries(
    [...result].map(([queryId, hits]): [string, { [id: string]: MashHit }] => [
      queryId,
      Object.fromEntries(hits),
    ])
  );
}
