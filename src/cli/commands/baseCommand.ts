import type { AppConfig } from "../../config.js";
import {
  AnswerSheetError,
  type AnswerSheetErrorCode,
} from "../../domain/errors.js";
import type { QuizBlueprint } from "../../domain/types.js";
import { logger } from "../../logger.js";
import type { RecordService } from "../../services/record.service.js";
import type { TextSink } from "../../tui/terminal.js";

export interface CommandContext {
  config: Pick<AppConfig, "QUIZ_RECORDS_DIR">;
  blueprint: QuizBlueprint;
  recordService: RecordService;
  out: TextSink;
  keySource: () => AsyncIterable<string>;
  now?: () => Date;
}

const REPORTED: ReadonlySet<AnswerSheetErrorCode> =
  new Set<AnswerSheetErrorCode>(["RECORD_INVALID", "CONFIGURATION_INVALID"]);

export abstract class BaseCommand {
  protected ctx: CommandContext;
  protected args: readonly string[];

  constructor(ctx: CommandContext, args: readonly string[]) {
    this.ctx = ctx;
    this.args = args;
  }

  protected println(text: string = ""): void {
    this.ctx.out.write(`${text}\n`);
  }

  /** @returns the process exit code */
  public async execute(): Promise<number> {
    try {
      if (!(await this.validate())) {
        return 2;
      }
      return await this.process();
    } catch (error) {
      // Index and cursor errors are contract violations and propagate.
      if (!(error instanceof AnswerSheetError) || !REPORTED.has(error.code)) {
        throw error;
      }
      logger.error(`Error in command ${this.getCommandId()}: ${error.message}`, {
        code: error.code,
      });
      this.println(`Error: ${error.message}`);
      return 1;
    }
  }

  protected abstract validate(): Promise<boolean>;

  protected abstract process(): Promise<number>;

  public abstract getCommandId(): string;

  public abstract getDescription(): string;

  /** Commander argument syntax, e.g. `<file>`. */
  public getArgumentSpec(): string {
    return "";
  }
}
