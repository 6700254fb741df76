import { Module } from '@nestjs/common';
import { Clock } from '@js-joda/core';
import { AddressBookModule } from '@app/address-book/AddressBookModule';
import { ContactCommandService } from './ContactCommandService';

@Module({
  imports: [AddressBookModule],
  providers: [
    ContactCommandService,
    {
      provide: Clock,
      useFactory: () => Clock.systemDefaultZone(),
    },
  ],
  exports: [ContactCommandService],
})
export class ContactModule {}
