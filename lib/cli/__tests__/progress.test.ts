import { PassThrough } from "node:stream";
import { describe, it, expect } from "vitest";
import { of, throwError } from "rxjs";
import { parseFlags, runWithProgress } from "../progress";

function capture() {
  const stream = new PassThrough();
  const chunks: string[] = [];
  stream.on("data", (c: Buffer) => chunks.push(c.toString()));
  return { stream, text: () => chunks.join("") };
}

describe("parseFlags", () => {
  it("reads --config and ignores other arguments", () => {
    expect(parseFlags(["extra", "--config", "alt.yaml", "-v"])).toEqual({
      config: "alt.yaml",
    });
  });

  it("ignores a trailing --config without a value", () => {
    expect(parseFlags(["--config"])).toEqual({ config: undefined });
  });
});

describe("runWithProgress", () => {
  it("resolves with the last value and prints the final bar", async () => {
    const { stream, text } = capture();
    const last = await runWithProgress(
      of({ current: 1, total: 2 }, { current: 2, total: 2 }),
      (p) => p,
      { label: "preprocess", barWidth: 4, stream }
    );

    expect(last).toEqual({ current: 2, total: 2 });
    await new Promise((r) => setImmediate(r));
    expect(text()).toBe("\r✔ preprocess  ████  2/2 images\n");
  });

  it("rejects with the source error", async () => {
    const { stream, text } = capture();
    await expect(
      runWithProgress(
        throwError(() => new Error("boom")),
        () => ({ current: 0, total: 0 }),
        { label: "extract", stream }
      )
    ).rejects.toThrow("boom");
    await new Promise((r) => setImmediate(r));
    expect(text()).toBe("\n✗ extract  boom\n");
  });
});
