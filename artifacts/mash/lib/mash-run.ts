import { basename } from "path";
import { MashSettings } from "../../../mash-settings";
import { ConfigurationError } from "./errors";
import { calculateDistanceFile, readDistanceFile } from "./distance-file";
import { defaultMashContext, MashContext } from "./mash-context";
import { DistanceMap, GenomeSet, MashHit } from "./mash-types";
import { querySketchFile, referenceSketchFile } from "./sketch-file";

/**
 * Invert a genome set to path -> genome id, failing if two genomes share a path
 * (we could not then tell which genome a hit belonged to).
 *
 * @param genomes
 * @param label used in the error message
 */
function pathToGenomeId(
  genomes: GenomeSet,
  label: string
): Map<string, string> {
  const result = new Map<string, string>();

  for (const [genomeId, path] of Object.entries(genomes)) {
    const other = result.get(path);
    if (other !== undefined)
      throw new ConfigurationError(
        `The ${label} genomes ${other} and ${genomeId} have the same path ${path}`
      );
    result.set(path, genomeId);
  }

  return result;
}

/**
 * Map file name -> path, failing if two genomes share a file name (mash dist
 * results for references are only distinguishable by file name).
 *
 * @param genomes
 * @param label used in the error message
 */
function basenameToPath(
  genomes: GenomeSet,
  label: string
): Map<string, string> {
  const result = new Map<string, string>();

  for (const path of Object.values(genomes)) {
    const name = basename(path);
    const other = result.get(name);
    if (other !== undefined && other !== path)
      throw new ConfigurationError(
        `The ${label} genome paths ${other} and ${path} have the same file name ${name}`
      );
    result.set(name, path);
  }

  return result;
}

/**
 * Check in advance that the results of a run can be translated back to
 * genome ids without any ambiguity.
 *
 * @param queryGenomes
 * @param referenceGenomes
 */
export function assertUnambiguousGenomes(
  queryGenomes: GenomeSet,
  referenceGenomes: GenomeSet
) {
  pathToGenomeId(queryGenomes, "query");
  pathToGenomeId(referenceGenomes, "reference");
  basenameToPath(queryGenomes, "query");
  basenameToPath(referenceGenomes, "reference");
}

/**
 * Convert the results as reported by mash (query path -> reference file name)
 * back into the genome ids we were given.
 *
 * The reference sketch may have been built somewhere else entirely (and moved), so
 * reference hits are matched by file name to the *current* reference path. A query
 * path is matched exactly and then (for a query sketch made from the same files
 * in another folder) by file name.
 *
 * @param queryGenomes
 * @param referenceGenomes
 * @param results
 */
export function rekeyDistances(
  queryGenomes: GenomeSet,
  referenceGenomes: GenomeSet,
  results: DistanceMap
): DistanceMap {
  const currentReference = basenameToPath(referenceGenomes, "reference");
  const pathToQuery = pathToGenomeId(queryGenomes, "query");
  const pathToReference = pathToGenomeId(referenceGenomes, "reference");

  // file names are unique within the query set so the fallback can only ever match one genome
  const queryByName = new Map<string, string>();
  for (const [name, path] of basenameToPath(queryGenomes, "query")) {
    const genomeId = pathToQuery.get(path);
    if (genomeId !== undefined) queryByName.set(name, genomeId);
  }

  // genome ids are arbitrary strings (even "constructor") so collect in maps
  const out = new Map<string, Map<string, MashHit>>();

  for (const [queryPath, referenceHits] of Object.entries(results)) {
    const queryId =
      pathToQuery.get(queryPath) ?? queryByName.get(basename(queryPath));

    if (queryId === undefined)
      throw new Error(
        `Mash reported a query ${queryPath} that is not one of the query genomes`
      );

    for (const [referenceName, hit] of Object.entries(referenceHits)) {
      const currentReferencePath = currentReference.get(referenceName);
      const referenceId =
        currentReferencePath !== undefined
          ? pathToReference.get(currentReferencePath)
          : undefined;

      if (referenceId === undefined)
        throw new Error(
          `Mash reported a reference ${referenceName} that is not one of the reference genomes`
        );

      let hits = out.get(queryId);
      if (!hits) out.set(queryId, (hits = new Map()));
      hits.set(referenceId, hit);
    }
  }

  return Object.fromEntries(
    [...out].map(([queryId, hits]): [string, { [id: string]: MashHit }] => [
      queryId,
      Object.fromEntries(hits),
    ])
  );
}

/**
 * Run Mash on a set of query and reference genomes - sketching both sets,
 * computing the distances between them and returning the hits keyed by
 * our genome ids.
 *
 * @param queryGenomes the query genomes (genome id -> FASTA path)
 * @param referenceGenomes the reference genomes (genome id -> FASTA path)
 * @param settings
 * @param context
 * @return query genome id -> reference genome id -> hit
 */
export async function mashRun(
  queryGenomes: GenomeSet,
  referenceGenomes: GenomeSet,
  settings: MashSettings,
  context: MashContext = defaultMashContext()
): Promise<DistanceMap> {
  assertUnambiguousGenomes(queryGenomes, referenceGenomes);

  const cpus = Math.max(settings.cpus, 1);
  const sketchParameters = {
    cpus,
    kmerSize: settings.kmerSize,
    sketchSize: settings.sketchSize,
  };

  const querySketch = await querySketchFile(
    queryGenomes,
    settings.outDir,
    settings.prefix,
    sketchParameters,
    context
  );

  const referenceSketch = await referenceSketchFile(
    referenceGenomes,
    settings.outDir,
    settings.prefix,
    sketchParameters,
    context,
    settings.mashDb
  );

  const distanceFile = await calculateDistanceFile(
    querySketch,
    referenceSketch,
    settings.outDir,
    settings.prefix,
    {
      cpus,
      maxDistance: settings.maxDistance,
      maxPValue: settings.maxPValue,
    },
    context
  );

  const results = await readDistanceFile(
    distanceFile.path,
    settings.maxMashDistance
  );

  return rekeyDistances(queryGenomes, referenceGenomes, results);
}
