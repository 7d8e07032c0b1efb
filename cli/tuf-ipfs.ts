#!/usr/bin/env node
import { mkdir, readFile } from "node:fs/promises";
import path from "node:path";

import { consoleLogger } from "../src/logger.js";
import { writeFileAtomic } from "../src/storage/filesystem.js";
import { TrustStore } from "../src/trust.js";
import { TUFClient } from "../src/tuf.js";
import { parseArgs, USAGE } from "./args.js";
import type { Command } from "./args.js";

// Installs a self-signed root as the trust anchor of a metadata directory
async function init(rootPath: string, metadataDir: string): Promise<void> {
  const raw = new Uint8Array(await readFile(path.resolve(rootPath)));
  const root = await new TrustStore().bootstrap(raw);

  await mkdir(metadataDir, { recursive: true });
  await writeFileAtomic(path.join(metadataDir, "root.json"), raw);
  console.log(`Trusted root v${root.version} installed in ${metadataDir}`);
}

async function run(command: Command): Promise<void> {
  switch (command.kind) {
    case "help":
      console.log(USAGE);
      return;
    case "init":
      await init(command.rootPath, command.metadataDir);
      return;
    case "refresh": {
      const client = new TUFClient({
        metadataDir: command.metadataDir,
        metadataBaseUrl: command.metadataUrl,
        logger: consoleLogger(command.verbose),
      });
      await client.refresh();
      console.log(`Metadata refreshed: ${(await client.listTargets()).length} targets`);
      return;
    }
    case "download": {
      const client = new TUFClient({
        metadataDir: command.metadataDir,
        metadataBaseUrl: command.metadataUrl,
        gateway: command.gateway,
        targetDir: command.targetDir,
        logger: consoleLogger(command.verbose),
      });
      await client.refresh();

      const info = await client.getTargetInfo(command.targetName);
      if (info === undefined) {
        throw new Error(`Target ${command.targetName} is not listed in trusted metadata`);
      }

      const cached = await client.findCachedTarget(info);
      if (cached !== undefined) {
        console.log(`Target already present at ${cached}`);
        return;
      }
      console.log(`Target saved to ${await client.downloadTarget(info)}`);
      return;
    }
  }
}

async function main(): Promise<void> {
  try {
    await run(parseArgs(process.argv.slice(2)));
  } catch (error) {
    if (error instanceof Error) {
      console.error(error.message);
    } else {
      console.error(error);
    }
    process.exitCode = 1;
  }
}

await main();
