import { readFileSync } from 'fs';
import * as process from 'process';
import * as yaml from 'js-yaml';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { ConfigModule } from '@nestjs/config';
import { Environment } from '@app/config/env/Environment';

export class Configuration {
  static getModule() {
    return ConfigModule.forRoot({
      cache: true,
      isGlobal: true,
      ignoreEnvFile: true,
      load: [() => Configuration.getEnv()],
    });
  }

  static getEnv(nodeEnv?: string): Environment {
    return this.parse(this.readYml(nodeEnv));
  }

  static parse(yml: unknown): Environment {
    const environment = plainToInstance(Environment, yml ?? {});
    this.validate(environment);

    return environment;
  }

  private static readYml(nodeEnv = process.env.NODE_ENV): unknown {
    const suffix = !nodeEnv || nodeEnv === 'test' ? 'local' : nodeEnv;

    return yaml.load(readFileSync(`env/env.${suffix}.yml`, 'utf8'));
  }

  private static validate(environment: Environment) {
    const errors = validateSync(environment);

    if (errors.length > 0) {
      throw new Error(errors.toString());
    }
  }
}
