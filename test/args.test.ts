import { describe, expect, test } from "vitest";
import { parseCliArgs } from "../src/bootstrap/args.ts";
import { ConfigError } from "../src/errors.ts";

const argv = (...flags: string[]) => ["node", "index.ts", ...flags];

describe("parseCliArgs", () => {
  test("no flags means every page", async () => {
    const args = await parseCliArgs(argv());
    expect(args.start).toBeUndefined();
    expect(args.end).toBeUndefined();
    expect(args.verbose).toBe(false);
  });

  test("reads the page range", async () => {
    const args = await parseCliArgs(argv("--start", "2", "--end", "5"));
    expect(args.start).toBe(2);
    expect(args.end).toBe(5);
  });

  test("reads directory, provider and model overrides", async () => {
    const args = await parseCliArgs(
      argv("--input", "books", "--output", "out", "--provider", "gemini", "--model", "gemini-2.5-pro", "--verbose"),
    );
    expect(args).toEqual({
      start: undefined,
      end: undefined,
      input: "books",
      output: "out",
      provider: "gemini",
      model: "gemini-2.5-pro",
      verbose: true,
    });
  });

  test("unknown flags are a configuration error", async () => {
    await expect(parseCliArgs(argv("--pages", "3"))).rejects.toThrow(ConfigError);
  });
});
