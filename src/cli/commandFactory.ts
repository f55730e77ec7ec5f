import type { Command } from "commander";
import type { BaseCommand, CommandContext } from "./commands/baseCommand.js";

type CommandClass = new (
  ctx: CommandContext,
  args: readonly string[]
) => BaseCommand;

export class CommandFactory {
  #commands: Map<string, CommandClass> = new Map();
  #defaultId: string | undefined;
  #ctx: CommandContext;

  constructor(ctx: CommandContext) {
    this.#ctx = ctx;
  }

  registerCommand(CommandClass: CommandClass, isDefault = false): void {
    const id: string = this.createCommand(CommandClass, []).getCommandId();
    this.#commands.set(id, CommandClass);
    if (isDefault) this.#defaultId = id;
  }

  /** Attach every registered command to the commander program. */
  submit(program: Command): void {
    for (const [id, CommandClass] of this.#commands) {
      const probe: BaseCommand = this.createCommand(CommandClass, []);
      const spec: string = probe.getArgumentSpec();
      program
        .command(spec ? `${id} ${spec}` : id, {
          isDefault: id === this.#defaultId,
        })
        .description(probe.getDescription())
        .action(async (...actionArgs: unknown[]) => {
          const positional: string[] = actionArgs.filter(
            (a): a is string => typeof a === "string"
          );
          const code: number = await this.createCommand(
            CommandClass,
            positional
          ).execute();
          process.exitCode = code;
        });
    }
  }

  createCommand(CommandClass: CommandClass, args: readonly string[]): BaseCommand {
    return new CommandClass(this.#ctx, args);
  }

  get commandIds(): string[] {
    return [...this.#commands.keys()];
  }
}
