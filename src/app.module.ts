import { Module } from '@nestjs/common';
import { CliModule } from './cli/cli.module';
import { RotatingFileLogger } from './common/logging/rotating-file.logger';
import { ConfigModule } from './config/config.module';
import { FuturesOrdersModule } from './modules/futures-orders/futures-orders.module';

@Module({
  imports: [ConfigModule, FuturesOrdersModule, CliModule],
  providers: [RotatingFileLogger],
})
export class AppModule {}
