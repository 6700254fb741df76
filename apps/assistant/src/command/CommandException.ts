export enum ECommandError {
  INVALID_ARGUMENTS = 'INVALID_ARGUMENTS',
}

export class CommandException extends Error {
  private readonly _code: ECommandError;
  private readonly _parameter?: object;

  constructor(code: ECommandError, message: string, parameter?: object) {
    super(message);
    this.name = 'CommandException';
    this._code = code;
    this._parameter = parameter;
  }

  static InvalidArguments(message: string, parameter?: object) {
    return new CommandException(
      ECommandError.INVALID_ARGUMENTS,
      message,
      parameter,
    );
  }

  get code(): ECommandError {
    return this._code;
  }

  get parameter(): object | undefined {
    return this._parameter;
  }
}
