/**
 * A set of genomes - genome id to the path of its FASTA.
 */
export type GenomeSet = { [genomeId: string]: string };

/**
 * What mash info reports for each genome inside a sketch file
 */
export type SketchEntry = {
  hashes: number;
  length: number;
};

/**
 * The values reported by mash dist between a reference and a query
 */
export type MashHit = {
  distance: number;
  pValue: number;
  sharedNumerator: number;
  sharedDenominator: number;
};

/**
 * A single parsed line of mash dist output
 */
export type MashDistRow = MashHit & {
  referenceId: string;
  queryId: string;
};

/**
 * Sparse query -> reference -> hit. An absent pair means no hit within
 * the thresholds (NOT a zero distance).
 */
export type DistanceMap = {
  [queryId: string]: { [referenceId: string]: MashHit };
};
