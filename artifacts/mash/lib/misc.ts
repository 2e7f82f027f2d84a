import { Readable } from "stream";
import { basename } from "path";

export function streamToBuffer(stream: Readable): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    stream.on("data", (chunk: Buffer | string) =>
      chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk)
    );
    stream.on("error", reject);
    stream.on("end", () => resolve(Buffer.concat(chunks)));
  });
}

/**
 * The set of file names (no folders) for a list of paths.
 *
 * @param paths
 */
export function basenameSet(paths: Iterable<string>): Set<string> {
  const result = new Set<string>();

  for (const p of paths) result.add(basename(p));

  return result;
}

export function setsEqual<T>(a: Set<T>, b: Set<T>): boolean {
  if (a.size !== b.size) return false;

  for (const v of a) if (!b.has(v)) return false;

  return true;
}
