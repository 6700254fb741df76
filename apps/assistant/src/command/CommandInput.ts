export class CommandInput {
  private constructor(
    private readonly _command: string,
    private readonly _args: string[],
  ) {}

  static parse(line: string): CommandInput {
    const [command = '', ...args] = line.trim().split(/\s+/);

    return new CommandInput(command.toLowerCase(), args);
  }

  get isEmpty(): boolean {
    return this._command === '';
  }

  get command(): string {
    return this._command;
  }

  get args(): string[] {
    return [...this._args];
  }
}
