import { Module } from '@nestjs/common';
import { Configuration } from '@app/config/Configuration';
import { LoggerModule } from '@app/logger/LoggerModule';
import { ContactModule } from './contact/ContactModule';
import { AssistantService } from './AssistantService';
import { AssistantRepl } from './AssistantRepl';

@Module({
  imports: [LoggerModule, Configuration.getModule(), ContactModule],
  providers: [AssistantService, AssistantRepl],
})
export class AssistantModule {}
