import { Module } from '@nestjs/common';

import { envs, VALIDATOR_OPTIONS } from '../../config';
import type { ValidatorOptions } from './interfaces';
import { ValidationsController } from './validations.controller';
import { ValidationsService } from './validations.service';

@Module({
  controllers: [ValidationsController],
  providers: [
    ValidationsService,
    {
      provide: VALIDATOR_OPTIONS,
      useFactory: (): ValidatorOptions => ({ onlyNifByDefault: envs.onlyNifByDefault }),
    },
  ],
})
export class ValidationsModule {}
