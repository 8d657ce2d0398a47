import { Module } from '@nestjs/common';

import { ValidationsModule } from './modules/validations/validations.module';

@Module({
  imports: [ValidationsModule],
})
export class AppModule {}
