#!/usr/bin/env node
/**
 * index.ts - CLI entry point for azapi-schema-docs
 *
 * Commands:
 *
 * 1. generate [--force] [--tag <tag>] [--data-dir <dir>]
 *    Loads the cached schemas, regenerating them when a newer azapi provider
 *    release exists (or always, with --force). With --tag, regenerates from
 *    that specific release.
 *
 * 2. schema <resourceType> [--data-dir <dir>]
 *    Prints the documentation block for one resource type.
 *
 * 3. parent <resourceType>
 *    Prints the parent resource type. Offline.
 *
 * 4. render <dir> [--out <file>]
 *    Runs the pipeline over a local directory of Bicep types files and prints
 *    (or writes) the resulting JSON map. Offline.
 */

// Initialize OpenTelemetry tracing before any other imports
import "./tracing";

import * as fs from "fs";
import { Command } from "commander";
import { GitHubReleaseFetcher } from "./fetcher";
import { SchemaGenerator, generateFromDirectory } from "./pipeline";
import {
  SchemaProvider,
  getAzapiParentType,
  getAzapiSchema,
} from "./tools/core";

function createGenerator(dataDir?: string): SchemaGenerator {
  return new SchemaGenerator({
    fetcher: new GitHubReleaseFetcher(),
    dataDir,
  });
}

function fail(prefix: string, error: unknown): never {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`\n${prefix}: ${message}`);
  process.exit(1);
}

async function main() {
  const program = new Command();

  program
    .name("azapi-schema-docs")
    .description(
      "Generates AzAPI resource schema documentation from Bicep type definitions"
    )
    .version("0.1.0");

  // -------------------------------------------------------------------------
  // generate: load or regenerate the cached schemas
  // -------------------------------------------------------------------------

  program
    .command("generate")
    .description("Load cached schemas, regenerating them when out of date")
    .option("--force", "Regenerate even when the cache is current")
    .option("--tag <tag>", "Regenerate from a specific release tag")
    .option(
      "--data-dir <dir>",
      "Schema data directory (default: AZAPI_DATA_DIR env or ./data)"
    )
    .action(
      async (options: { force?: boolean; tag?: string; dataDir?: string }) => {
        const generator = createGenerator(options.dataDir);

        try {
          if (options.tag) {
            const result = await generator.generate(options.tag);
            console.log(
              `\n${Object.keys(result.schemas).length} schemas for ${result.version} written to ${result.file}`
            );
            return;
          }

          const schemas = await generator.loadOrGenerate(options.force ?? false);
          console.log(
            `\n${Object.keys(schemas).length} schemas available (${generator.currentVersion ?? "unknown version"}).`
          );
        } catch (error) {
          fail("Generate failed", error);
        }
      }
    );

  // -------------------------------------------------------------------------
  // schema: print one documentation block
  // -------------------------------------------------------------------------

  program
    .command("schema")
    .description("Print the AzAPI schema reference for a resource type")
    .argument("<resourceType>", "e.g. Microsoft.Storage/storageAccounts")
    .option(
      "--data-dir <dir>",
      "Schema data directory (default: AZAPI_DATA_DIR env or ./data)"
    )
    .action(async (resourceType: string, options: { dataDir?: string }) => {
      // Progress goes to stderr so stdout holds only the documentation
      const generator = new SchemaGenerator({
        fetcher: new GitHubReleaseFetcher({
          onProgress: (message) => console.error(message),
        }),
        dataDir: options.dataDir,
        onProgress: (message) => console.error(message),
      });

      const result = await getAzapiSchema(
        { resourceType },
        new SchemaProvider(generator)
      ).catch((error: unknown) => fail("Schema lookup failed", error));

      if (result.isError) {
        console.error(result.output);
        process.exit(1);
      }
      process.stdout.write(result.output);
    });

  // -------------------------------------------------------------------------
  // parent: print the parent resource type
  // -------------------------------------------------------------------------

  program
    .command("parent")
    .description("Print the parent resource type of a resource type")
    .argument("<resourceType>", "e.g. Microsoft.Network/virtualNetworks/subnets")
    .action(async (resourceType: string) => {
      const result = await getAzapiParentType({ resourceType });
      console.log(result.output);
    });

  // -------------------------------------------------------------------------
  // render: run the pipeline over a local directory
  // -------------------------------------------------------------------------

  program
    .command("render")
    .description("Render schemas from a local directory of Bicep types files")
    .argument("<dir>", "Directory containing Bicep types JSON files")
    .option("--out <file>", "Write the JSON map to a file instead of stdout")
    .action((dir: string, options: { out?: string }) => {
      if (!fs.existsSync(dir)) {
        console.error(`Error: directory not found: ${dir}`);
        process.exit(1);
      }

      const schemas = generateFromDirectory(dir, {
        onProgress: (message) => console.error(message),
      });
      const json = JSON.stringify(schemas, null, 2);

      if (options.out) {
        fs.writeFileSync(options.out, json + "\n", "utf-8");
        console.error(`Wrote ${Object.keys(schemas).length} schemas to ${options.out}`);
      } else {
        console.log(json);
      }
    });

  await program.parseAsync(process.argv);
}

main().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error("Error:", message);
  process.exit(1);
});
