import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import * as path from 'path';
import { validateEnvironment } from './config/env.validation';
import { InvoiceModule } from './invoice/invoice.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: process.env.ENV_FILE
        ? path.resolve(process.cwd(), process.env.ENV_FILE)
        : '.env',
      validate: validateEnvironment,
    }),
    InvoiceModule,
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
