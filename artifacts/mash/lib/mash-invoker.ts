import { spawn } from "child_process";
import { createWriteStream } from "fs";
import { pipeline } from "node:stream/promises";
import { createInterface } from "readline";
import { mashBinary } from "./environment-constants";
import { streamToBuffer } from "./misc";
import { ExternalToolError } from "./errors";

export type MashInvokeOptions = {
  // if present, stdout is streamed into this file rather than captured
  stdoutPath?: string;

  // if present, called for every line written to stderr while the process runs
  onStderrLine?: (line: string) => void;
};

export type MashInvokeResult = {
  exitCode: number | null;

  // empty when stdout was redirected to a file
  stdout: string;

  stderr: string;
};

/**
 * The boundary between us and the mash binary. Everything mash does for us
 * goes through a single invoke() so that tests can substitute a fake.
 */
export interface MashInvoker {
  invoke(args: string[], options?: MashInvokeOptions): Promise<MashInvokeResult>;
}

/**
 * Invokes the real mash binary as a child process. The process is always
 * waited on until it exits - there is no timeout.
 */
export class ProcessMashInvoker implements MashInvoker {
  constructor(private readonly binary: string = mashBinary) {}

  async invoke(
    args: string[],
    options: MashInvokeOptions = {}
  ): Promise<MashInvokeResult> {
    const child = spawn(this.binary, args, {
      stdio: ["ignore", "pipe", "pipe"],
    });

    const stderrLines: string[] = [];

    const stderrReader = createInterface({ input: child.stderr });
    stderrReader.on("line", (line) => {
      stderrLines.push(line);
      if (options.onStderrLine) options.onStderrLine(line);
    });

    const exited = new Promise<number | null>((resolve, reject) => {
      child.on("error", reject);
      child.on("close", (code) => resolve(code));
    });

    const stdoutDone: Promise<string> = options.stdoutPath
      ? pipeline(child.stdout, createWriteStream(options.stdoutPath)).then(
          () => ""
        )
      : streamToBuffer(child.stdout).then((b) => b.toString("utf8"));

    try {
      const [exitCode, stdout] = await Promise.all([exited, stdoutDone]);

      return { exitCode, stdout, stderr: stderrLines.join("\n") };
    } catch (e) {
      throw new ExternalToolError(
        `Unable to invoke ${this.binary} ${args.join(" ")}`,
        args,
        null,
        e instanceof Error ? e.message : String(e)
      );
    } finally {
      stderrReader.close();
    }
  }
}
