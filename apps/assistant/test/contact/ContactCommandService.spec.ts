import { Test } from '@nestjs/testing';
import { Clock } from '@js-joda/core';
import { Configuration } from '@app/config/Configuration';
import { AddressBook } from '@app/address-book/domain/AddressBook';
import { AddressBookException } from '@app/address-book/exception/AddressBookException';
import { EAddressBookError } from '@app/address-book/exception/EAddressBookError';
import { ContactModule } from '../../src/contact/ContactModule';
import { ContactCommandService } from '../../src/contact/ContactCommandService';
import { CommandException } from '../../src/command/CommandException';
import { NEW_YEAR_CLOCK } from '../fixture';

describe('ContactCommandService', () => {
  let service: ContactCommandService;
  let addressBook: AddressBook;

  beforeEach(async () => {
    const module = await Test.createTestingModule({
      imports: [Configuration.getModule(), ContactModule],
    })
      .overrideProvider(Clock)
      .useValue(NEW_YEAR_CLOCK)
      .compile();

    service = module.get(ContactCommandService);
    addressBook = module.get(AddressBook);
  });

  describe('addContact', () => {
    it('creates a new contact', () => {
      // when
      const result = service.addContact('John', '1234567890');

      // then
      expect(result).toBe('Contact John added with phone 1234567890.');
      expect(addressBook.find('John')?.toString()).toBe(
        'Contact name: John, phones: 1234567890, birthday: not set',
      );
    });

    it('adds a phone to an existing contact', () => {
      // given
      service.addContact('John', '1234567890');

      // when
      const result = service.addContact('John', '5555555555');

      // then
      expect(result).toBe('Phone 5555555555 added to contact John.');
      expect(addressBook.size).toBe(1);
      expect(service.showPhones('John')).toBe('1234567890, 5555555555');
    });

    it('does not create a contact for an invalid phone', () => {
      // when
      const result = () => service.addContact('John', '123');

      // then
      expect(result).toThrow(AddressBookException);
      expect(addressBook.find('John')).toBeUndefined();
    });
  });

  describe('changePhone', () => {
    it('replaces the phone', () => {
      // given
      service.addContact('John', '1234567890');

      // when
      const result = service.changePhone('John', '1234567890', '1112223333');

      // then
      expect(result).toBe('Contact John: phone 1234567890 changed to 1112223333.');
      expect(service.showPhones('John')).toBe('1112223333');
    });

    it('fails for an unknown contact', () => {
      // when
      const result = () =>
        service.changePhone('Nobody', '1234567890', '1112223333');

      // then
      expect(result).toThrow('Contact Nobody not found.');
    });
  });

  it('showPhones fails with NotFoundError for an unknown contact', () => {
    // when
    let code: EAddressBookError | undefined;
    try {
      service.showPhones('Nobody');
    } catch (e) {
      code = e instanceof AddressBookException ? e.code : undefined;
    }

    // then
    expect(code).toBe(EAddressBookError.NOT_FOUND);
  });

  describe('deleteContact', () => {
    it('removes the contact', () => {
      // given
      service.addContact('John', '1234567890');

      // when
      const result = service.deleteContact('John');

      // then
      expect(result).toBe('Contact John deleted.');
      expect(addressBook.size).toBe(0);
    });

    it('fails for an unknown contact', () => {
      // when
      const result = () => service.deleteContact('Nobody');

      // then
      expect(result).toThrow('Contact Nobody not found.');
    });
  });

  describe('showAll', () => {
    it('lists every contact on its own line', () => {
      // given
      service.addContact('John', '1234567890');
      service.addContact('Jane', '5555555555');
      service.addBirthday('Jane', '15.06.1992');

      // when
      const result = service.showAll();

      // then
      expect(result).toBe(
        [
          'Contact name: John, phones: 1234567890, birthday: not set',
          'Contact name: Jane, phones: 5555555555, birthday: 15.06.1992',
        ].join('\n'),
      );
    });

    it('reports an empty book', () => {
      // when
      const result = service.showAll();

      // then
      expect(result).toBe('The address book is empty.');
    });
  });

  describe('birthday', () => {
    it('sets and shows the birthday', () => {
      // given
      service.addContact('John', '1234567890');

      // when
      const result = service.addBirthday('John', '03.01.1990');

      // then
      expect(result).toBe('Birthday of John set to 03.01.1990.');
      expect(service.showBirthday('John')).toBe('03.01.1990');
    });

    it('reports a missing birthday', () => {
      // given
      service.addContact('John', '1234567890');

      // when
      const result = service.showBirthday('John');

      // then
      expect(result).toBe('Birthday of John is not set.');
    });

    it('fails to set a birthday for an unknown contact', () => {
      // when
      const result = () => service.addBirthday('Nobody', '03.01.1990');

      // then
      expect(result).toThrow('Contact Nobody not found.');
    });
  });

  describe('upcomingBirthdays', () => {
    beforeEach(() => {
      service.addContact('John', '1234567890');
      service.addBirthday('John', '03.01.1990');
      service.addContact('Jane', '5555555555');
      service.addBirthday('Jane', '06.01.1985');
      service.addContact('Bill', '1112223333');
      service.addBirthday('Bill', '20.01.1980');
    });

    it('uses the configured window and the injected clock', () => {
      // when
      const result = service.upcomingBirthdays();

      // then
      expect(result).toBe(['John: 03.01.2024', 'Jane: 08.01.2024'].join('\n'));
    });

    it('takes the window from the argument', () => {
      // when
      const result = service.upcomingBirthdays('30');

      // then
      expect(result).toBe(
        ['John: 03.01.2024', 'Jane: 08.01.2024', 'Bill: 22.01.2024'].join('\n'),
      );
    });

    it('reports when nobody has a birthday in the window', () => {
      // when
      const result = service.upcomingBirthdays('1');

      // then
      expect(result).toBe('No birthdays in the next 1 days.');
    });

    it.each(['-1', '1.5', 'week'])('rejects the window %p', (days) => {
      // when
      const result = () => service.upcomingBirthdays(days);

      // then
      expect(result).toThrow(CommandException);
      expect(result).toThrow(
        `Days must be a whole number of zero or more: ${days}`,
      );
    });
  });
});
