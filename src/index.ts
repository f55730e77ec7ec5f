#!/usr/bin/env node
import { Command } from "commander";
import { config } from "./config.js";
import { logger } from "./logger.js";
import { installGlobalErrorHandlers } from "./infra/global-errors.js";
import { DEFAULT_QUIZ_BLUEPRINT } from "./domain/policy.js";
import { recordService } from "./services/record.service.js";
import { readKeys } from "./tui/keys.js";
import { CommandFactory } from "./cli/commandFactory.js";
import type { CommandContext } from "./cli/commands/baseCommand.js";
import { RecordCommand } from "./cli/commands/recordCommand.js";
import { ShowCommand } from "./cli/commands/showCommand.js";
import { ListCommand } from "./cli/commands/listCommand.js";

async function main(): Promise<void> {
  installGlobalErrorHandlers();

  const ctx: CommandContext = {
    config,
    blueprint: DEFAULT_QUIZ_BLUEPRINT,
    recordService,
    out: process.stdout,
    keySource: () => readKeys(process.stdin),
  };

  const factory = new CommandFactory(ctx);
  factory.registerCommand(RecordCommand, true);
  factory.registerCommand(ShowCommand);
  factory.registerCommand(ListCommand);

  const program = new Command()
    .name("tus-sheet")
    .description("Record and review multiple-choice exam answer sheets");
  factory.submit(program);

  logger.debug(`Records directory: ${config.QUIZ_RECORDS_DIR}`);
  await program.parseAsync(process.argv);
}

main().catch((e: unknown) => {
  logger.error("Fatal error", { err: e instanceof Error ? e.stack : String(e) });
  process.exitCode = 1;
});
