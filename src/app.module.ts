import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER } from '@nestjs/core';
import { validate } from './config/env.validation';
import { SummariesModule } from './logic/summaries/summaries.module';
import { SummaryErrorFilter } from './logic/summaries/summary-error.filter';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate }),
    SummariesModule,
  ],
  providers: [{ provide: APP_FILTER, useClass: SummaryErrorFilter }],
})
export class AppModule {}
