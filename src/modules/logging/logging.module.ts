import { Global, Module } from '@nestjs/common';

import { ModelLogger } from './model-logger.service';

@Global()
@Module({
  providers: [ModelLogger],
  exports: [ModelLogger],
})
export class LoggingModule {}
