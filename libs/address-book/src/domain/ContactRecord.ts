import { ContactName } from '@app/address-book/domain/ContactName';
import { PhoneNumber } from '@app/address-book/domain/PhoneNumber';
import { Birthday } from '@app/address-book/domain/Birthday';
import { AddressBookException } from '@app/address-book/exception/AddressBookException';

export class ContactRecord {
  static readonly NO_PHONES = 'no phones';
  static readonly NO_BIRTHDAY = 'not set';

  private readonly _name: ContactName;
  private readonly _phones: PhoneNumber[] = [];
  private _birthday?: Birthday;

  constructor(name: string) {
    this._name = new ContactName(name);
  }

  static create(name: string, phones: string[] = [], birthday?: string) {
    const record = new ContactRecord(name);
    phones.forEach((phone) => record.addPhone(phone));

    if (birthday !== undefined) {
      record.setBirthday(birthday);
    }

    return record;
  }

  get name(): string {
    return this._name.value;
  }

  get phones(): PhoneNumber[] {
    return [...this._phones];
  }

  get birthday(): Birthday | undefined {
    return this._birthday;
  }

  addPhone(phone: string): PhoneNumber {
    const phoneNumber = new PhoneNumber(phone);
    this.checkNotDuplicate(phone);
    this._phones.push(phoneNumber);

    return phoneNumber;
  }

  removePhone(phone: string): void {
    const index = this._phones.findIndex((p) => p.equals(phone));

    if (index >= 0) {
      this._phones.splice(index, 1);
    }
  }

  /**
   * Replaces `oldPhone` with `newPhone`, appending the new number at the end.
   * `newPhone` is validated and checked against the other phones before
   * anything is removed, so a failure leaves the phone list as it was.
   */
  editPhone(oldPhone: string, newPhone: string): PhoneNumber {
    if (!this.findPhone(oldPhone)) {
      throw AddressBookException.PhoneNotFound({
        message: `Phone ${oldPhone} not found for contact ${this.name}.`,
        parameter: { name: this.name, phone: oldPhone },
      });
    }

    const phoneNumber = new PhoneNumber(newPhone);

    if (newPhone !== oldPhone) {
      this.checkNotDuplicate(newPhone);
    }

    this.removePhone(oldPhone);
    this._phones.push(phoneNumber);

    return phoneNumber;
  }

  private checkNotDuplicate(phone: string): void {
    if (this.findPhone(phone)) {
      throw AddressBookException.DuplicatePhone({
        message: `Phone ${phone} already exists for contact ${this.name}.`,
        parameter: { name: this.name, phone },
      });
    }
  }

  findPhone(phone: string): PhoneNumber | undefined {
    return this._phones.find((p) => p.equals(phone));
  }

  setBirthday(birthday: string): Birthday {
    this._birthday = new Birthday(birthday);

    return this._birthday;
  }

  toString(): string {
    const phones =
      this._phones.length > 0
        ? this._phones.map((p) => p.phoneNumber).join(', ')
        : ContactRecord.NO_PHONES;
    const birthday = this._birthday?.toString() ?? ContactRecord.NO_BIRTHDAY;

    return `Contact name: ${this.name}, phones: ${phones}, birthday: ${birthday}`;
  }
}
