import { IsInt, IsNotEmpty, Min } from 'class-validator';

export class AddressBookEnvironment {
  @IsNotEmpty()
  @IsInt()
  @Min(0)
  upcomingWindowDays!: number;
}
