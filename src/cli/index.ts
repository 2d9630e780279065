#!/usr/bin/env node
/**
 * CLI entrypoint: Commander-based CLI for schemaweave.
 * Commands: init, check, resolve, compose, generate, validate, hierarchy, export, diff
 */

import { existsSync, writeFileSync } from "node:fs";
import { Command } from "commander";
import chalk from "chalk";
import { SchemaWeave, loadConfig } from "../index.js";
import { loadSchema } from "../schema/loader.js";
import { compareSchemas, type SectionDiff } from "../schema/diff.js";
import { formatSchema } from "../schema/export.js";
import { isSchemaWeaveError } from "../schema/errors.js";
import { formatComposed, stripCategoryPrefix } from "../api/format.js";
import type { PromotionWarning } from "../schema/types.js";

const program = new Command();

program
  .name("schemaweave")
  .description("Resolve category schemas and generate wiki templates and forms")
  .version("0.1.0");

async function open(configPath: string | undefined): Promise<SchemaWeave> {
  return SchemaWeave.fromConfig(await loadConfig(configPath));
}

function categories(raw: string[]): string[] {
  return raw.map(stripCategoryPrefix).filter((name) => name !== "");
}

function printWarnings(warnings: PromotionWarning[]): void {
  for (const w of warnings) {
    console.error(chalk.yellow(`warning: [${w.category}] ${w.message}`));
  }
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/** Report errors in red and set the process exit code from the error */
function run<A extends unknown[]>(action: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (e) {
      if (!isSchemaWeaveError(e)) throw e;
      console.error(chalk.red(`error ${e.errorCode}: ${e.message}`));
      process.exitCode = e.getExitCode();
    }
  };
}

const EXAMPLE_CONFIG = `import { defineConfig } from "schemaweave";

export default defineConfig({
  schema: "./schema.yaml",
  output: {
    dir: "./wiki",
    separator: ";",
    displayStubs: true,
  },
});
`;

const EXAMPLE_SCHEMA = `schemaVersion: "1.0"
properties:
  Has name: { datatype: Text }
  Has email: { datatype: Email }
categories:
  Person:
    properties:
      required: [Has name]
      optional: [Has email]
`;

// init
program
  .command("init")
  .description("Create a schemaweave.config.ts and an example schema in the current directory")
  .action(() => {
    if (existsSync("schemaweave.config.ts")) {
      console.log(chalk.yellow("schemaweave.config.ts already exists"));
      return;
    }
    writeFileSync("schemaweave.config.ts", EXAMPLE_CONFIG, "utf-8");
    console.log(chalk.green("Created schemaweave.config.ts"));
    if (!existsSync("schema.yaml")) {
      writeFileSync("schema.yaml", EXAMPLE_SCHEMA, "utf-8");
      console.log(chalk.green("Created schema.yaml"));
    }
  });

// check
program
  .command("check")
  .description("Check the schema for missing references and broken inheritance")
  .option("-c, --config <path>", "Config file path")
  .action(
    run(async (opts: { config?: string }) => {
      const sw = await open(opts.config);
      const report = sw.check();
      report.warnings.forEach((w) => console.log(chalk.yellow(`  warning: ${w}`)));
      report.errors.forEach((e) => console.log(chalk.red(`  error: ${e}`)));
      if (report.valid) {
        console.log(chalk.green("Schema is consistent"));
      } else {
        console.log(chalk.red(`${report.errors.length} error(s)`));
        process.exitCode = 1;
      }
    })
  );

// resolve
program
  .command("resolve")
  .description("Print the effective schema of one category")
  .argument("<category>", "Category name")
  .option("-c, --config <path>", "Config file path")
  .action(
    run(async (category: string, opts: { config?: string }) => {
      const sw = await open(opts.config);
      const effective = sw.resolve(stripCategoryPrefix(category));
      printWarnings(effective.warnings);
      printJson(effective);
    })
  );

// compose
program
  .command("compose")
  .description("Compose several categories into one deduplicated schema")
  .argument("<categories...>", "Category names, in priority order")
  .option("-c, --config <path>", "Config file path")
  .action(
    run(async (names: string[], opts: { config?: string }) => {
      const sw = await open(opts.config);
      const composed = sw.compose(categories(names));
      printWarnings(composed.warnings);
      printJson(formatComposed(composed));
    })
  );

// generate
program
  .command("generate")
  .description("Generate templates and the composite form for a selection")
  .argument("<categories...>", "Category names, in priority order")
  .option("-c, --config <path>", "Config file path")
  .option("-o, --out <dir>", "Output directory")
  .option("--force", "Overwrite generated files edited by hand")
  .option("--display-stubs", "Also create editable display templates")
  .option("--dry-run", "List artifacts without writing them")
  .action(
    run(
      async (
        names: string[],
        opts: { config?: string; out?: string; force?: boolean; displayStubs?: boolean; dryRun?: boolean }
      ) => {
        const sw = await open(opts.config);
        const selection = categories(names);
        printWarnings(sw.compose(selection).warnings);

        if (opts.dryRun) {
          for (const artifact of sw.generate(selection, { displayStubs: opts.displayStubs })) {
            console.log(`  ${artifact.title} ${chalk.dim(`(${artifact.path})`)}`);
          }
          console.log(chalk.yellow("  (dry run, nothing written)"));
          return;
        }

        const summary = sw.write(selection, {
          dir: opts.out,
          force: opts.force,
          displayStubs: opts.displayStubs,
        });
        console.log(chalk.green("Generation complete:"));
        console.log(`  Written:   ${summary.written.length}`);
        console.log(`  Unchanged: ${summary.unchanged.length}`);
        if (summary.skipped.length) {
          console.log(chalk.yellow(`  Skipped:   ${summary.skipped.length}`));
          summary.skipped.forEach((s) => console.log(`    ${s.path}: ${s.reason}`));
        }
      }
    )
  );

// validate
program
  .command("validate")
  .description("Validate page data against a selection; data is keyed by category")
  .argument("<json>", 'JSON object, e.g. {"Person":{"name":"Ada"}}')
  .argument("<categories...>", "Category names, in priority order")
  .option("-c, --config <path>", "Config file path")
  .action(
    run(async (json: string, names: string[], opts: { config?: string }) => {
      const sw = await open(opts.config);
      let data: unknown;
      try {
        data = JSON.parse(json);
      } catch (e) {
        console.log(chalk.red(`Invalid JSON: ${e instanceof Error ? e.message : String(e)}`));
        process.exitCode = 1;
        return;
      }
      if (data === null || typeof data !== "object" || Array.isArray(data)) {
        console.log(chalk.red("Page data must be a JSON object"));
        process.exitCode = 1;
        return;
      }
      const byCategory: Record<string, unknown> = Object.fromEntries(Object.entries(data));
      for (const { category, result } of sw.validate(categories(names), byCategory)) {
        if (result.success) {
          console.log(chalk.green(`${category}: valid`));
        } else {
          console.log(chalk.red(`${category}: invalid: ${result.error}`));
          process.exitCode = 1;
        }
      }
    })
  );

// hierarchy
program
  .command("hierarchy")
  .description("Print the ancestor tree and inherited properties of a category")
  .argument("<category>", "Category name")
  .option("-c, --config <path>", "Config file path")
  .action(
    run(async (category: string, opts: { config?: string }) => {
      const sw = await open(opts.config);
      printJson(sw.hierarchy(stripCategoryPrefix(category)));
    })
  );

// export
program
  .command("export")
  .description("Print the schema with sorted keys")
  .option("-c, --config <path>", "Config file path")
  .option("--inherited", "List each category's inherited fields too")
  .option("-f, --format <format>", "yaml or json", "yaml")
  .action(
    run(async (opts: { config?: string; inherited?: boolean; format: string }) => {
      const format = opts.format === "json" || opts.format === "yaml" ? opts.format : undefined;
      if (!format) {
        console.error(chalk.red(`Unknown format "${opts.format}" (expected yaml or json)`));
        process.exitCode = 1;
        return;
      }
      const sw = await open(opts.config);
      process.stdout.write(formatSchema(sw.export({ includeInherited: opts.inherited }), format));
    })
  );

function printSection(title: string, diff: SectionDiff): void {
  if (diff.added.length + diff.removed.length + diff.modified.length === 0) return;
  console.log(chalk.bold(title));
  diff.added.forEach((n) => console.log(chalk.green(`  + ${n}`)));
  diff.removed.forEach((n) => console.log(chalk.red(`  - ${n}`)));
  for (const m of diff.modified) {
    console.log(chalk.yellow(`  ~ ${m.name}`));
    m.changes.forEach((c) =>
      console.log(`      ${c.field}: ${JSON.stringify(c.old)} -> ${JSON.stringify(c.new)}`)
    );
  }
}

// diff
program
  .command("diff")
  .description("Compare two schema files or directories")
  .argument("<old>", "Old schema file or directory")
  .argument("<new>", "New schema file or directory")
  .option("--json", "Print the diff as JSON")
  .action(
    run(async (oldPath: string, newPath: string, opts: { json?: boolean }) => {
      const diff = compareSchemas(await loadSchema(oldPath), await loadSchema(newPath));
      if (opts.json) {
        printJson(diff);
        return;
      }
      if (!diff.changed) {
        console.log(chalk.green("No changes"));
        return;
      }
      printSection("Categories", diff.categories);
      printSection("Properties", diff.properties);
      printSection("Subobjects", diff.subobjects);
    })
  );

await program.parseAsync();
