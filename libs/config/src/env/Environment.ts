import { IsNotEmpty, ValidateNested } from 'class-validator';
import { Type } from 'class-transformer';
import { AddressBookEnvironment } from '@app/config/env/AddressBookEnvironment';
import { AssistantEnvironment } from '@app/config/env/AssistantEnvironment';

export class Environment {
  @ValidateNested()
  @IsNotEmpty()
  @Type(() => AddressBookEnvironment)
  addressBook!: AddressBookEnvironment;

  @ValidateNested()
  @IsNotEmpty()
  @Type(() => AssistantEnvironment)
  assistant!: AssistantEnvironment;
}
