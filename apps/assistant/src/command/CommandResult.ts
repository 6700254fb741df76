export class CommandResult {
  private constructor(
    private readonly _message: string,
    private readonly _exit: boolean,
  ) {}

  static reply(message: string) {
    return new CommandResult(message, false);
  }

  static exit(message: string) {
    return new CommandResult(message, true);
  }

  get message(): string {
    return this._message;
  }

  get exit(): boolean {
    return this._exit;
  }
}
