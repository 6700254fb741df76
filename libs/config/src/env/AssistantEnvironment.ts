import { IsNotEmpty, IsString } from 'class-validator';

export class AssistantEnvironment {
  @IsNotEmpty()
  @IsString()
  prompt!: string;
}
