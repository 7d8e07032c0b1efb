import { ConfigurationError } from "../src/errors.js";

export type Command =
  | { kind: "help" }
  | { kind: "init"; rootPath: string; metadataDir: string; verbose: boolean }
  | {
      kind: "refresh";
      metadataDir: string;
      metadataUrl: string;
      verbose: boolean;
    }
  | {
      kind: "download";
      metadataDir: string;
      metadataUrl: string;
      gateway: string;
      targetName: string;
      targetDir: string;
      verbose: boolean;
    };

interface Options {
  metadataDir?: string;
  metadataUrl?: string;
  gateway?: string;
  targetName?: string;
  targetDir?: string;
  verbose: boolean;
}

const VALUE_OPTIONS: Record<string, Exclude<keyof Options, "verbose">> = {
  "--metadata-dir": "metadataDir",
  "--metadata-url": "metadataUrl",
  "--gateway": "gateway",
  "--target-name": "targetName",
  "--target-dir": "targetDir",
};

export const USAGE = `Usage:
  tuf-ipfs init ROOT_JSON --metadata-dir DIR
  tuf-ipfs refresh --metadata-dir DIR --metadata-url URL
  tuf-ipfs download --metadata-dir DIR --metadata-url URL --gateway URL --target-name PATH --target-dir DIR

Options:
  --verbose    log every metadata update`;

function required(value: string | undefined, flag: string): string {
  if (!value) {
    throw new ConfigurationError(`Missing required option ${flag}`);
  }
  return value;
}

export function parseArgs(argv: string[]): Command {
  const options: Options = { verbose: false };
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const current = argv[i];

    if (current === "--help" || current === "-h") {
      return { kind: "help" };
    }

    if (!current.startsWith("--")) {
      positionals.push(current);
      continue;
    }

    const separator = current.indexOf("=");
    const name = separator === -1 ? current : current.slice(0, separator);
    const providedValue = separator === -1 ? undefined : current.slice(separator + 1);
    if (name === "--verbose") {
      options.verbose = true;
      continue;
    }

    const key = Object.hasOwn(VALUE_OPTIONS, name) ? VALUE_OPTIONS[name] : undefined;
    if (key === undefined) {
      throw new ConfigurationError(`Unknown option: ${name}`);
    }
    const value = providedValue ?? argv[++i];
    if (!value) {
      throw new ConfigurationError(`Missing value for ${name}`);
    }
    options[key] = value;
  }

  const [command, ...rest] = positionals;
  if (command === undefined) {
    throw new ConfigurationError(
      "No command provided. Expected 'init', 'refresh' or 'download'.",
    );
  }
  if (command !== "init" && command !== "refresh" && command !== "download") {
    throw new ConfigurationError(`Unknown command: ${command}`);
  }

  const metadataDir = required(options.metadataDir, "--metadata-dir");

  if (command === "init") {
    if (rest.length !== 1) {
      throw new ConfigurationError("init expects exactly one ROOT_JSON argument");
    }
    return { kind: "init", rootPath: rest[0], metadataDir, verbose: options.verbose };
  }

  if (rest.length > 0) {
    throw new ConfigurationError(`Unexpected argument: ${rest[0]}`);
  }
  const metadataUrl = required(options.metadataUrl, "--metadata-url");
  if (command === "refresh") {
    return { kind: "refresh", metadataDir, metadataUrl, verbose: options.verbose };
  }
  return {
    kind: "download",
    metadataDir,
    metadataUrl,
    gateway: required(options.gateway, "--gateway"),
    targetName: required(options.targetName, "--target-name"),
    targetDir: required(options.targetDir, "--target-dir"),
    verbose: options.verbose,
  };
}
