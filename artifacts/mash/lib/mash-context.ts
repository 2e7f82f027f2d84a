import { MashInvoker, ProcessMashInvoker } from "./mash-invoker";

export type MashLogger = Pick<Console, "log" | "error" | "time" | "timeEnd">;

/**
 * Receives progress events while mash is working through a set of genomes.
 * Purely informational - nothing depends on it for correctness.
 */
export interface ProgressReporter {
  start(total: number, unit: string): void;
  tick(): void;
  stop(): void;
}

/**
 * Reports progress as a log line per tick i.e. "Sketching genomes 3/10".
 */
export class ConsoleProgressReporter implements ProgressReporter {
  private total = 0;
  private count = 0;
  private unit = "";

  constructor(private readonly logger: MashLogger = console) {}

  start(total: number, unit: string): void {
    this.total = total;
    this.count = 0;
    this.unit = unit;
  }

  tick(): void {
    this.count++;
    this.logger.log(`Sketching ${this.unit}s ${this.count}/${this.total}`);
  }

  stop(): void {
    if (this.count !== this.total)
      this.logger.log(
        `Sketching finished after ${this.count} of ${this.total} ${this.unit}s`
      );
  }
}

/**
 * The collaborators every mash step is handed (rather than reaching for globals).
 */
export type MashContext = {
  invoker: MashInvoker;
  logger: MashLogger;
  progress: ProgressReporter;
};

export function defaultMashContext(): MashContext {
  return {
    invoker: new ProcessMashInvoker(),
    logger: console,
    progress: new ConsoleProgressReporter(console),
  };
}
