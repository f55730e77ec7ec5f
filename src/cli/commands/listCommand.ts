import { BaseCommand } from "./baseCommand.js";

export class ListCommand extends BaseCommand {
  protected validate(): Promise<boolean> {
    return Promise.resolve(true);
  }

  protected process(): Promise<number> {
    const dir: string = this.ctx.config.QUIZ_RECORDS_DIR;
    const files: string[] = this.ctx.recordService.listQuizRecords(dir);
    if (files.length === 0) {
      this.println(`No quiz records in ${dir}`);
      return Promise.resolve(0);
    }
    for (const f of files) this.println(f);
    return Promise.resolve(0);
  }

  public getCommandId(): string {
    return "list";
  }

  public getDescription(): string {
    return "List saved answer sheets";
  }
}
