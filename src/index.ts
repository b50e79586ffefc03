#!/usr/bin/env node
import { Command } from "commander";
import { parseUnique, runKeywords, runTokens, type TokensOptions } from "./commands.js";

const program = new Command()
  .name("plclex")
  .description("Lexer for the lambda/builtin intermediate language: token stream and identifier handles")
  .version("0.1.0");

program
  .command("tokens [file]")
  .description("Print the token stream of a source file (defaults to the single source file in the current directory)")
  .option("--json", "Print tokens as JSON")
  .option("--start-unique <n>", "First identifier handle to allocate", parseUnique)
  .option("--show-identifiers", "Print the identifier table after the tokens")
  .action(async (file: string | undefined, opts: TokensOptions) => {
    process.exitCode = await runTokens(file, opts);
  });

program
  .command("keywords")
  .description("List the reserved words in keyword order")
  .action(() => {
    process.exitCode = runKeywords();
  });

program.parseAsync().catch((e: unknown) => {
  console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
  process.exitCode = 1;
});
