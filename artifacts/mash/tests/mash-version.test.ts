import { mashVersion } from "../lib/mash-version";
import { ProcessMashInvoker } from "../lib/mash-invoker";
import { ExternalToolError } from "../lib/errors";
import { FakeMashInvoker, simulatedMash } from "./fake-mash";

describe("Mash version lookup", () => {
  it("returns the trimmed version", async () => {
    const invoker = new FakeMashInvoker(simulatedMash());

    expect(await mashVersion(invoker)).toBe("2.3");
    expect(invoker.calls[0].args).toEqual(["--version"]);
  });

  it("returns unknown when nothing is printed", async () => {
    expect(await mashVersion(new FakeMashInvoker(() => ({ stdout: "  \n" })))).toBe(
      "unknown"
    );
  });

  it("returns unknown when the invoke throws", async () => {
    const invoker = new FakeMashInvoker(() => {
      throw new ExternalToolError("Unable to invoke", ["--version"], null, "ENOENT");
    });

    expect(await mashVersion(invoker)).toBe("unknown");
  });

  it("returns unknown when the binary does not exist", async () => {
    expect(
      await mashVersion(new ProcessMashInvoker("/nonexistent/folder/mash"))
    ).toBe("unknown");
  });
});
