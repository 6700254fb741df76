import { EAddressBookError } from '@app/address-book/exception/EAddressBookError';

interface AddressBookExceptionArg {
  message: string;
  parameter?: object;
}

export class AddressBookException extends Error {
  private readonly _code: EAddressBookError;
  private readonly _parameter?: object;

  constructor(code: EAddressBookError, arg: AddressBookExceptionArg) {
    super(arg.message);
    this.name = code;
    this._code = code;
    this._parameter = arg.parameter;
  }

  static Validation(arg: AddressBookExceptionArg) {
    return new AddressBookException(EAddressBookError.VALIDATION, arg);
  }

  static DuplicatePhone(arg: AddressBookExceptionArg) {
    return new AddressBookException(EAddressBookError.DUPLICATE_PHONE, arg);
  }

  static PhoneNotFound(arg: AddressBookExceptionArg) {
    return new AddressBookException(EAddressBookError.PHONE_NOT_FOUND, arg);
  }

  static NotFound(arg: AddressBookExceptionArg) {
    return new AddressBookException(EAddressBookError.NOT_FOUND, arg);
  }

  get code(): EAddressBookError {
    return this._code;
  }

  get parameter(): object | undefined {
    return this._parameter;
  }
}
