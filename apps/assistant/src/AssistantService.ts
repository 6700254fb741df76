import { Injectable } from '@nestjs/common';
import { Logger } from '@app/logger/Logger';
import { AddressBookException } from '@app/address-book/exception/AddressBookException';
import { CommandInput } from './command/CommandInput';
import { CommandResult } from './command/CommandResult';
import { CommandException } from './command/CommandException';
import { ECommand } from './command/ECommand';
import { ContactCommandService } from './contact/ContactCommandService';

@Injectable()
export class AssistantService {
  constructor(
    private readonly contactCommandService: ContactCommandService,
    private readonly logger: Logger,
  ) {}

  handle(line: string): CommandResult {
    const input = CommandInput.parse(line);

    if (input.isEmpty) {
      return CommandResult.reply('Please enter a command.');
    }

    const command = ECommand.of(input.command);

    if (!command) {
      return CommandResult.reply(
        `Unknown command. Try: ${ECommand.names().join(', ')}.`,
      );
    }

    try {
      return this.execute(command, command.requireArgs(input.args));
    } catch (e) {
      if (e instanceof AddressBookException || e instanceof CommandException) {
        this.logger.info(
          `${e.name}: message = ${e.message} command = ${command.name}`,
          { args: input.args, parameter: e.parameter },
        );

        return CommandResult.reply(e.message);
      }

      throw e;
    }
  }

  private execute(command: ECommand, args: string[]): CommandResult {
    const contacts = this.contactCommandService;
    const [name, first, second] = args;

    switch (command) {
      case ECommand.HELLO:
        return CommandResult.reply('How can I help you?');
      case ECommand.ADD:
        return CommandResult.reply(contacts.addContact(name, first));
      case ECommand.CHANGE:
        return CommandResult.reply(contacts.changePhone(name, first, second));
      case ECommand.PHONE:
        return CommandResult.reply(contacts.showPhones(name));
      case ECommand.DELETE:
        return CommandResult.reply(contacts.deleteContact(name));
      case ECommand.ALL:
        return CommandResult.reply(contacts.showAll());
      case ECommand.ADD_BIRTHDAY:
        return CommandResult.reply(contacts.addBirthday(name, first));
      case ECommand.SHOW_BIRTHDAY:
        return CommandResult.reply(contacts.showBirthday(name));
      case ECommand.BIRTHDAYS:
        return CommandResult.reply(
          contacts.upcomingBirthdays(args.length > 0 ? args[0] : undefined),
        );
      case ECommand.EXIT:
        return CommandResult.exit('Good bye!');
      default:
        throw new Error(`Unhandled command: ${command.name}`);
    }
  }
}
