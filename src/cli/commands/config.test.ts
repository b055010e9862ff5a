import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { MockInstance } from "vitest";
import { mkdir, writeFile } from "fs/promises";
import { join } from "node:path";
import { configCommand } from "./config";
import { loadDefaultConfig } from "../../utils/load-config";
import { createScratch } from "../../testing/fixtures";

describe("configCommand", () => {
  let scratch: ReturnType<typeof createScratch>;
  let log: MockInstance<typeof console.log>;
  let warn: MockInstance<typeof console.warn>;
  let userConfig: string;

  beforeEach(() => {
    scratch = createScratch();
    vi.stubEnv("XDG_CONFIG_HOME", scratch.dir);
    userConfig = join(scratch.dir, "pdf-assemble", "config.json");
    log = vi.spyOn(console, "log").mockImplementation(() => {});
    warn = vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    await scratch.cleanup();
  });

  it("prints the defaults when there is no user config", async () => {
    await configCommand();

    expect(log.mock.calls).toEqual([
      [`User config: ${userConfig} (not found)`],
      ["Effective configuration:"],
      [JSON.stringify(loadDefaultConfig(), null, 2)],
    ]);
  });

  it("layers the user config and a custom file over the defaults", async () => {
    await mkdir(join(scratch.dir, "pdf-assemble"));
    await writeFile(userConfig, JSON.stringify({ text: { pageSize: "Letter" } }));
    const custom = join(scratch.dir, "custom.json");
    await writeFile(custom, JSON.stringify({ logging: { level: "debug" } }));

    await configCommand(custom);

    const expected = loadDefaultConfig();
    expected.text.pageSize = "Letter";
    expected.logging.level = "debug";
    expect(log.mock.calls).toEqual([
      [`User config: ${userConfig} (found)`],
      [`Custom config: ${custom}`],
      ["Effective configuration:"],
      [JSON.stringify(expected, null, 2)],
    ]);
    expect(warn).not.toHaveBeenCalled();
  });

  it("warns about a user config that does not parse", async () => {
    await mkdir(join(scratch.dir, "pdf-assemble"));
    await writeFile(userConfig, "{ nope");

    await configCommand();

    expect(warn).toHaveBeenCalledWith(expect.stringContaining(`Ignoring config ${userConfig}`));
    expect(log).toHaveBeenLastCalledWith(JSON.stringify(loadDefaultConfig(), null, 2));
  });
});
