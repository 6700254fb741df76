import { isNotEmpty } from 'class-validator';
import { AddressBookException } from '@app/address-book/exception/AddressBookException';

export class ContactName {
  private readonly _value: string;

  constructor(value: string) {
    // kept as given: the address book looks contacts up by this exact text
    if (!isNotEmpty(value.trim())) {
      throw AddressBookException.Validation({
        message: 'Contact name must not be empty.',
        parameter: { name: value },
      });
    }

    this._value = value;
  }

  get value(): string {
    return this._value;
  }

  toString(): string {
    return this._value;
  }
}
