import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { ChatModule } from './logic/chat/chat.module';
import { validateEnv } from './utils/env';
import { buildDataSourceOptions, connectWithRetry, databaseEnvFrom } from './utils/database';
import { AppExceptionFilter } from './utils/app-exception.filter';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        ...buildDataSourceOptions(databaseEnvFrom(configService)),
        // connectWithRetry owns the startup retry policy
        retryAttempts: 0,
        toRetry: () => false,
      }),
      dataSourceFactory: async (options) => {
        if (!options) {
          throw new Error('Missing data source options');
        }
        return connectWithRetry(() => new DataSource(options));
      },
      inject: [ConfigService],
    }),
    ChatModule,
  ],
  providers: [{ provide: APP_FILTER, useClass: AppExceptionFilter }],
})
export class AppModule {}
