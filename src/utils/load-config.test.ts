import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { ZodError } from "zod";
import { loadConfig, loadDefaultConfig, mergeConfig } from "./load-config";
import { UnknownDialectError } from "./errors";

describe("loadConfig", () => {
  let root: string;
  let userConfigPath: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), "book-summary-config-"));
    userConfigPath = path.join(root, "user", "config.json");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("ships the built-in defaults", async () => {
    expect(await loadDefaultConfig()).toEqual({
      format: "md",
      title: "Summary",
      output: "SUMMARY.md",
      directory: ".",
      overwrite: false,
      logging: { level: "info" },
    });
  });

  it("falls back to defaults when no user config exists", async () => {
    const { config, errors } = await loadConfig(undefined, userConfigPath);
    expect(config.title).toBe("Summary");
    expect(errors).toEqual([]);
  });

  it("layers the custom config over the user config", async () => {
    const userPath = path.join(root, "user.json");
    const customPath = path.join(root, "custom.json");
    await writeFile(
      userPath,
      JSON.stringify({ format: "git", title: "User", sort: ["intro"] }),
    );
    await writeFile(
      customPath,
      JSON.stringify({ title: "Custom", logging: { level: "warn" } }),
    );

    const { config, errors } = await loadConfig(customPath, userPath);

    expect(errors).toEqual([]);
    expect(config).toEqual({
      format: "git",
      title: "Custom",
      sort: ["intro"],
      output: "SUMMARY.md",
      directory: ".",
      overwrite: false,
      logging: { level: "warn" },
    });
  });

  it("reports an invalid config and keeps going", async () => {
    const customPath = path.join(root, "custom.json");
    await writeFile(
      customPath,
      JSON.stringify({ overwrite: "yes", title: "Ignored" }),
    );

    const { config, errors } = await loadConfig(customPath, userConfigPath);

    expect(config.title).toBe("Summary");
    expect(errors).toHaveLength(1);
    expect(errors[0].path).toBe(customPath);
    expect(errors[0].error).toBeInstanceOf(ZodError);
  });

  it("fails on an unknown format in the custom config", async () => {
    const customPath = path.join(root, "custom.json");
    await writeFile(customPath, JSON.stringify({ format: "pdf", title: "Mine" }));

    await expect(loadConfig(customPath, userConfigPath)).rejects.toThrow(
      new UnknownDialectError("pdf"),
    );
  });

  it("fails on an unknown format in the user config", async () => {
    const userPath = path.join(root, "user.json");
    await writeFile(userPath, JSON.stringify({ format: 3 }));

    await expect(loadConfig(undefined, userPath)).rejects.toBeInstanceOf(
      UnknownDialectError,
    );
  });

  it("reports a config that is not JSON", async () => {
    const customPath = path.join(root, "custom.json");
    await writeFile(customPath, "{ title: ");

    const { errors } = await loadConfig(customPath, userConfigPath);

    expect(errors[0].error).toBeInstanceOf(SyntaxError);
  });
});

describe("mergeConfig", () => {
  it("keeps base values the override leaves out", async () => {
    const base = await loadDefaultConfig();
    expect(mergeConfig(base, { overwrite: true })).toEqual({
      ...base,
      overwrite: true,
    });
  });
});
