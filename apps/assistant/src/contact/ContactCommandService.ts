import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Clock, LocalDate } from '@js-joda/core';
import { isNumberString } from 'class-validator';
import { AddressBook } from '@app/address-book/domain/AddressBook';
import { ContactRecord } from '@app/address-book/domain/ContactRecord';
import { AddressBookException } from '@app/address-book/exception/AddressBookException';
import { Environment } from '@app/config/env/Environment';
import { throwIfIsNil } from '@app/common/util/throwIfIsNil';
import { CommandException } from '../command/CommandException';

@Injectable()
export class ContactCommandService {
  constructor(
    private readonly addressBook: AddressBook,
    private readonly configService: ConfigService<Environment, true>,
    private readonly clock: Clock,
  ) {}

  addContact(name: string, phone: string): string {
    const record = this.addressBook.find(name);

    if (record) {
      record.addPhone(phone);

      return `Phone ${phone} added to contact ${record.name}.`;
    }

    // the phone is validated before the contact is stored
    const created = ContactRecord.create(name, [phone]);
    this.addressBook.addRecord(created);

    return `Contact ${created.name} added with phone ${phone}.`;
  }

  changePhone(name: string, oldPhone: string, newPhone: string): string {
    this.getRecord(name).editPhone(oldPhone, newPhone);

    return `Contact ${name}: phone ${oldPhone} changed to ${newPhone}.`;
  }

  showPhones(name: string): string {
    const phones = this.getRecord(name).phones;

    return phones.length > 0
      ? phones.map((phone) => phone.phoneNumber).join(', ')
      : `Contact ${name} has no phones.`;
  }

  deleteContact(name: string): string {
    this.getRecord(name);
    this.addressBook.delete(name);

    return `Contact ${name} deleted.`;
  }

  showAll(): string {
    const records = this.addressBook.getRecords();

    return records.length > 0
      ? records.map((record) => record.toString()).join('\n')
      : 'The address book is empty.';
  }

  addBirthday(name: string, birthday: string): string {
    const saved = this.getRecord(name).setBirthday(birthday);

    return `Birthday of ${name} set to ${saved.toString()}.`;
  }

  showBirthday(name: string): string {
    const birthday = this.getRecord(name).birthday;

    return birthday ? birthday.toString() : `Birthday of ${name} is not set.`;
  }

  upcomingBirthdays(days?: string): string {
    const windowDays =
      days === undefined ? this.defaultWindowDays : this.parseWindowDays(days);
    const upcoming = this.addressBook.upcomingBirthdays(
      windowDays,
      LocalDate.now(this.clock),
    );

    if (upcoming.length === 0) {
      return `No birthdays in the next ${windowDays} days.`;
    }

    return upcoming
      .map(({ name, congratulationDate }) => `${name}: ${congratulationDate}`)
      .join('\n');
  }

  private get defaultWindowDays(): number {
    return this.configService.get('addressBook', { infer: true })
      .upcomingWindowDays;
  }

  private parseWindowDays(days: string): number {
    if (!isNumberString(days, { no_symbols: true })) {
      throw CommandException.InvalidArguments(
        `Days must be a whole number of zero or more: ${days}`,
        { days },
      );
    }

    return Number(days);
  }

  private getRecord(name: string): ContactRecord {
    return throwIfIsNil(() =>
      AddressBookException.NotFound({
        message: `Contact ${name} not found.`,
        parameter: { name },
      }),
    )(this.addressBook.find(name));
  }
}
