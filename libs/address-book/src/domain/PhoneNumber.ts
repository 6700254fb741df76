import { matches } from 'class-validator';
import { AddressBookException } from '@app/address-book/exception/AddressBookException';

export class PhoneNumber {
  // \d without the u flag only matches 0-9
  private static readonly PATTERN = /^\d{10}$/;

  private readonly _phoneNumber: string;

  constructor(phoneNumber: string) {
    if (!matches(phoneNumber, PhoneNumber.PATTERN)) {
      throw AddressBookException.Validation({
        message: `Phone number must contain exactly 10 digits: ${phoneNumber}`,
        parameter: { phoneNumber },
      });
    }

    this._phoneNumber = phoneNumber;
  }

  get phoneNumber(): string {
    return this._phoneNumber;
  }

  equals(phoneNumber: string): boolean {
    return this._phoneNumber === phoneNumber;
  }

  toString(): string {
    return this._phoneNumber;
  }
}
