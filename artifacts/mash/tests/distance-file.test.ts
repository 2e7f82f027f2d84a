import { copyFile, mkdtemp, readFile, rm, stat, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { calculateDistanceFile, readDistanceFile } from "../lib/distance-file";
import { ExternalToolError } from "../lib/errors";
import { SketchFile } from "../lib/sketch-file";
import { fakeContext, FakeMashInvoker } from "./fake-mash";
import { SAMPLE_DIST_PATH } from "./sample";

const QUERY_SKETCH: SketchFile = {
  type: "Fresh",
  path: "/out/run.user_query_sketch.msh",
  genomes: { q1: "/queries/q1.fna" },
};

const REFERENCE_SKETCH: SketchFile = {
  type: "Cached",
  path: "/db/reference.msh",
  genomes: { r1: "/refs/GCF_000001.fna" },
  entries: { "/refs/GCF_000001.fna": { hashes: 1000, length: 5000000 } },
};

const PARAMETERS = { cpus: 8, maxDistance: 0.1, maxPValue: 1.0 };

describe("Mash distance file", () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), "mash-dist-test-"));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it("runs mash dist with the reference sketch first and saves stdout", async () => {
    const invoker = new FakeMashInvoker(() => ({
      stdout: "/refs/GCF_000001.fna\t/queries/q1.fna\t0.01\t0\t900/1000\n",
    }));

    const distanceFile = await calculateDistanceFile(
      QUERY_SKETCH,
      REFERENCE_SKETCH,
      workDir,
      "run",
      PARAMETERS,
      fakeContext(invoker)
    );

    expect(distanceFile.path).toBe(join(workDir, "run.mash_distances.tsv"));
    expect(invoker.calls[0].args).toEqual([
      "dist",
      "-p",
      "8",
      "-d",
      "0.1",
      "-v",
      "1",
      "/db/reference.msh",
      "/out/run.user_query_sketch.msh",
    ]);
    expect(invoker.calls[0].options.stdoutPath).toBe(distanceFile.path);
    expect(await readFile(distanceFile.path, "utf8")).toBe(
      "/refs/GCF_000001.fna\t/queries/q1.fna\t0.01\t0\t900/1000\n"
    );
  });

  it("fails with the diagnostics and removes the distance file", async () => {
    const path = join(workDir, "run.mash_distances.tsv");

    // a result from some earlier run that must not survive
    await writeFile(path, "/refs/a.fna\t/queries/q1.fna\t0.01\t0\t900/1000\n");

    const invoker = new FakeMashInvoker(() => ({
      exitCode: 1,
      stdout: "/refs/a.fna\t/queries/q1.fna\t0.01\t0\t900/1000\n",
      stderr: "ERROR: sketches have different k-mer sizes",
    }));

    const promise = calculateDistanceFile(
      QUERY_SKETCH,
      REFERENCE_SKETCH,
      workDir,
      "run",
      PARAMETERS,
      fakeContext(invoker)
    );

    await expect(promise).rejects.toThrow(ExternalToolError);
    await expect(promise).rejects.toThrow(
      "ERROR: sketches have different k-mer sizes"
    );
    await expect(stat(path)).rejects.toThrow();
  });

  it("reads the hits keyed by query and reference file name", async () => {
    const result = await readDistanceFile(SAMPLE_DIST_PATH, 0.1);

    expect(result).toEqual({
      "/queries/q1.fna": {
        "GCF_000001.fna": {
          distance: 0.0123,
          pValue: 0,
          sharedNumerator: 812,
          sharedDenominator: 1000,
        },
        "GCF_000002.fna": {
          distance: 0.0871,
          pValue: 1.2e-120,
          sharedNumerator: 120,
          sharedDenominator: 1000,
        },
      },
      "/queries/q2.fna": {
        "GCF_000001.fna": {
          distance: 0.05,
          pValue: 2.5e-200,
          sharedNumerator: 390,
          sharedDenominator: 1000,
        },
      },
    });
  });

  it("applies the read threshold independently of the mash threshold", async () => {
    const strict = await readDistanceFile(SAMPLE_DIST_PATH, 0.02);

    expect(Object.keys(strict)).toEqual(["/queries/q1.fna"]);
    expect(Object.keys(strict["/queries/q1.fna"])).toEqual(["GCF_000001.fna"]);

    const loose = await readDistanceFile(SAMPLE_DIST_PATH);

    expect(Object.keys(loose["/queries/q1.fna"]).sort()).toEqual([
      "GCF_000001.fna",
      "GCF_000002.fna",
      "GCF_000003.fna",
    ]);
  });

  it("keeps a single line hit below the threshold and drops it above", async () => {
    const path = join(workDir, "single.tsv");
    await writeFile(path, "refA\tqryA\t0.05\t0.0001\t10/400\n", "utf8");

    expect((await readDistanceFile(path, 0.1))["qryA"]["refA"]).toEqual({
      distance: 0.05,
      pValue: 0.0001,
      sharedNumerator: 10,
      sharedDenominator: 400,
    });
    expect(await readDistanceFile(path, 0.01)).toEqual({});
  });

  it("keeps queries and references named like object properties", async () => {
    const path = join(workDir, "names.tsv");
    await writeFile(
      path,
      "/refs/toString\tconstructor\t0.05\t0.0001\t10/400\n",
      "utf8"
    );

    const result = await readDistanceFile(path, 0.1);

    expect(Object.keys(result)).toEqual(["constructor"]);
    expect(Object.entries(Object.entries(result)[0][1])).toEqual([
      [
        "toString",
        {
          distance: 0.05,
          pValue: 0.0001,
          sharedNumerator: 10,
          sharedDenominator: 400,
        },
      ],
    ]);
  });

  it("keeps a hit exactly at the threshold", async () => {
    const path = join(workDir, "sample.tsv");
    await copyFile(SAMPLE_DIST_PATH, path);

    const result = await readDistanceFile(path, 0.05);

    expect(result["/queries/q2.fna"]["GCF_000001.fna"].distance).toBe(0.05);
  });
});
