import { createInterface } from 'readline';
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Environment } from '@app/config/env/Environment';
import { AssistantService } from './AssistantService';

@Injectable()
export class AssistantRepl {
  static readonly WELCOME = 'Welcome to the assistant bot!';

  constructor(
    private readonly assistantService: AssistantService,
    private readonly configService: ConfigService<Environment, true>,
  ) {}

  /**
   * Answers one line at a time until an exit command or the end of input.
   */
  async run(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout,
  ): Promise<void> {
    const prompt = this.configService.get('assistant', { infer: true }).prompt;
    const rl = createInterface({ input, crlfDelay: Infinity });

    output.write(`${AssistantRepl.WELCOME}\n${prompt}`);

    try {
      for await (const line of rl) {
        const result = this.assistantService.handle(line);

        if (result.exit) {
          output.write(`${result.message}\n`);

          return;
        }

        output.write(`${result.message}\n${prompt}`);
      }
    } finally {
      rl.close();
    }
  }
}
