/**
 * The description used for the CLI and reports
 */
export const MASH_DESCRIPTION =
  "Mash distance is a tool for sketching query and reference genomes with Mash and reporting the close pairs between them";

export interface MashSettings {
  /**
   * The maximum number of CPUs available to Mash (passed through as -p).
   * Values below 1 are raised to 1.
   */
  readonly cpus: number;

  /**
   * The directory where the query sketch, the default reference sketch and
   * the distance file are written
   */
  readonly outDir: string;

  /**
   * The prefix for all files written into outDir
   */
  readonly prefix: string;

  /**
   * The k-mer size used when sketching (-k)
   */
  readonly kmerSize: number;

  /**
   * The maximum number of non-redundant hashes per sketch (-s)
   */
  readonly sketchSize: number;

  /**
   * The maximum distance that mash dist itself will report (-d)
   */
  readonly maxDistance: number;

  /**
   * The maximum p-value that mash dist itself will report (-v)
   */
  readonly maxPValue: number;

  /**
   * The maximum distance we keep when reading the distance file back. This
   * is applied independently of maxDistance - whichever is stricter wins.
   */
  readonly maxMashDistance: number;

  /**
   * If set, the path to read/write a pre-computed reference sketch database so
   * that it can be re-used across runs (".msh" is appended if missing)
   */
  readonly mashDb?: string;
}

export const DEFAULT_MASH_SETTINGS: MashSettings = {
  cpus: 1,
  outDir: ".",
  prefix: "mash",
  kmerSize: 16,
  sketchSize: 5000,
  maxDistance: 0.1,
  maxPValue: 1.0,
  maxMashDistance: 0.15,
};
