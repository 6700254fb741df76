import { Module } from '@nestjs/common';
import { AddressBook } from '@app/address-book/domain/AddressBook';

@Module({
  providers: [
    {
      provide: AddressBook,
      useFactory: () => new AddressBook(),
    },
  ],
  exports: [AddressBook],
})
export class AddressBookModule {}
