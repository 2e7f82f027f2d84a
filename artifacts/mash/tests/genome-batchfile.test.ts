import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import {
  genomesFromDirectory,
  parseGenomeBatchfile,
  readGenomeBatchfile,
} from "../lib/genome-batchfile";
import { ConfigurationError } from "../lib/errors";
import { SAMPLE_BATCHFILE_PATH } from "./sample";

describe("Genome batch files", () => {
  it("reads path and genome id pairs skipping blank lines", async () => {
    expect(await readGenomeBatchfile(SAMPLE_BATCHFILE_PATH)).toEqual({
      alpha: "/data/genomes/alpha.fna",
      beta: "/data/genomes/beta.fna",
      gamma: "/data/genomes/gamma.fna",
    });
  });

  it("refuses a row without a genome id", () => {
    expect(() =>
      parseGenomeBatchfile("/data/a.fna\ta\n/data/b.fna\n", "test.tsv")
    ).toThrow("Batch file test.tsv row 2 must be a path and a genome id");
  });

  it("accepts genome ids that are also object property names", () => {
    const genomes = parseGenomeBatchfile(
      "/a/x.fna\ttoString\n/a/y.fna\tconstructor\n",
      "b"
    );

    expect(Object.keys(genomes)).toEqual(["toString", "constructor"]);
    expect(Object.values(genomes)).toEqual(["/a/x.fna", "/a/y.fna"]);
  });

  it("refuses a duplicated genome id", () => {
    expect(() =>
      parseGenomeBatchfile("/data/a.fna\ta\n/data/b.fna\ta\n", "test.tsv")
    ).toThrow(ConfigurationError);
  });
});

describe("Genomes from a directory", () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), "mash-genomes-test-"));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it("keys the matching files by name without extension", async () => {
    await writeFile(join(workDir, "b.fna"), ">b\nACGT\n");
    await writeFile(join(workDir, "a.fna"), ">a\nACGT\n");
    await writeFile(join(workDir, "notes.txt"), "not a genome");
    await mkdir(join(workDir, "folder.fna"));

    expect(await genomesFromDirectory(workDir, "fna")).toEqual({
      a: join(workDir, "a.fna"),
      b: join(workDir, "b.fna"),
    });
    expect(Object.keys(await genomesFromDirectory(workDir, ".fna"))).toEqual([
      "a",
      "b",
    ]);
  });
});
