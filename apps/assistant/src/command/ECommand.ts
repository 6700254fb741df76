import { CommandException } from './CommandException';

export class ECommand {
  static readonly HELLO = new ECommand(['hello']);
  static readonly ADD = new ECommand(['add'], ['<name>', '<phone>']);
  static readonly CHANGE = new ECommand(
    ['change'],
    ['<name>', '<old phone>', '<new phone>'],
  );
  static readonly PHONE = new ECommand(['phone'], ['<name>']);
  static readonly DELETE = new ECommand(['delete'], ['<name>']);
  static readonly ALL = new ECommand(['all']);
  static readonly ADD_BIRTHDAY = new ECommand(
    ['add-birthday'],
    ['<name>', '<DD.MM.YYYY>'],
  );
  static readonly SHOW_BIRTHDAY = new ECommand(['show-birthday'], ['<name>']);
  static readonly BIRTHDAYS = new ECommand(['birthdays'], [], ['[days]']);
  static readonly EXIT = new ECommand(['close', 'exit']);

  private constructor(
    readonly _names: string[],
    readonly _requiredArgs: string[] = [],
    readonly _optionalArgs: string[] = [],
  ) {}

  static values(): ECommand[] {
    return [
      ECommand.HELLO,
      ECommand.ADD,
      ECommand.CHANGE,
      ECommand.PHONE,
      ECommand.DELETE,
      ECommand.ALL,
      ECommand.ADD_BIRTHDAY,
      ECommand.SHOW_BIRTHDAY,
      ECommand.BIRTHDAYS,
      ECommand.EXIT,
    ];
  }

  static of(name: string): ECommand | undefined {
    return ECommand.values().find((command) => command._names.includes(name));
  }

  static names(): string[] {
    return ECommand.values().flatMap((command) => command._names);
  }

  get name(): string {
    return this._names[0];
  }

  get usage(): string {
    return [this.name, ...this._requiredArgs, ...this._optionalArgs].join(' ');
  }

  /**
   * Arguments beyond the required and optional ones are ignored.
   */
  requireArgs(args: string[]): string[] {
    if (args.length < this._requiredArgs.length) {
      throw CommandException.InvalidArguments(
        `Enter the command and its arguments: ${this.usage}`,
        { command: this.name, args },
      );
    }

    return args.slice(0, this._requiredArgs.length + this._optionalArgs.length);
  }
}
