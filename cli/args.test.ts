import { describe, it, expect } from "vitest";
import { ConfigurationError } from "../src/errors.js";
import { parseArgs } from "./args.js";

describe("parseArgs", () => {
  it("should parse init", () => {
    expect(parseArgs(["init", "root.json", "--metadata-dir", "meta"])).toEqual({
      kind: "init",
      rootPath: "root.json",
      metadataDir: "meta",
      verbose: false,
    });
  });

  it("should accept --flag=value and --verbose", () => {
    expect(
      parseArgs([
        "refresh",
        "--metadata-dir=meta",
        "--metadata-url=https://example.com/metadata/?mirror=eu",
        "--verbose",
      ]),
    ).toEqual({
      kind: "refresh",
      metadataDir: "meta",
      metadataUrl: "https://example.com/metadata/?mirror=eu",
      verbose: true,
    });
  });

  it("should parse download", () => {
    expect(
      parseArgs([
        "download",
        "--metadata-dir",
        "meta",
        "--metadata-url",
        "https://example.com/metadata/",
        "--gateway",
        "http://127.0.0.1:8080",
        "--target-name",
        "file.txt",
        "--target-dir",
        "out",
      ]),
    ).toEqual({
      kind: "download",
      metadataDir: "meta",
      metadataUrl: "https://example.com/metadata/",
      gateway: "http://127.0.0.1:8080",
      targetName: "file.txt",
      targetDir: "out",
      verbose: false,
    });
  });

  it("should return help before validating anything", () => {
    expect(parseArgs(["download", "--help"])).toEqual({ kind: "help" });
  });

  it("should name a missing required option", () => {
    expect(() =>
      parseArgs(["download", "--metadata-dir", "meta", "--metadata-url", "u"]),
    ).toThrow("Missing required option --gateway");
  });

  it("should reject a flag without a value", () => {
    expect(() => parseArgs(["refresh", "--metadata-dir"])).toThrow(
      "Missing value for --metadata-dir",
    );
  });

  it("should reject unknown options and commands", () => {
    expect(() => parseArgs(["refresh", "--mirror", "x"])).toThrow(
      "Unknown option: --mirror",
    );
    expect(() => parseArgs(["publish", "--metadata-dir", "meta"])).toThrow(
      "Unknown command: publish",
    );
    expect(() => parseArgs(["--metadata-dir", "meta"])).toThrow(ConfigurationError);
  });

  it("should report a missing command before missing options", () => {
    expect(() => parseArgs([])).toThrow(
      "No command provided. Expected 'init', 'refresh' or 'download'.",
    );
    expect(() => parseArgs(["publish"])).toThrow("Unknown command: publish");
  });

  it("should require the root file for init", () => {
    expect(() => parseArgs(["init", "--metadata-dir", "meta"])).toThrow(
      "init expects exactly one ROOT_JSON argument",
    );
  });
});
