import { Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import binanceFuturesConfig from './binance-futures.config';
import loggingConfig from './logging.config';

@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      load: [binanceFuturesConfig, loggingConfig],
    }),
  ],
})
export class ConfigModule {}
