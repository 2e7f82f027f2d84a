import { MashInvoker, ProcessMashInvoker } from "./mash-invoker";

export const UNKNOWN_VERSION = "unknown";

/**
 * Returns the version of mash, or "unknown" if it cannot be determined
 * (binary missing, failed, or printed nothing). Never throws.
 *
 * @param invoker
 */
export async function mashVersion(
  invoker: MashInvoker = new ProcessMashInvoker()
): Promise<string> {
  try {
    const { stdout } = await invoker.invoke(["--version"]);

    const version = stdout.trim();

    return version.length > 0 ? version : UNKNOWN_VERSION;
  } catch (e) {
    return UNKNOWN_VERSION;
  }
}
